import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ProviderError } from '../errors';
import { createLogger } from '../logger';
import {
  GeminiTranscriber,
  OpenAITranscriber,
  buildTranscriptionPrompt,
  createTranscriber
} from './transcriptionService';
import type { AppConfig } from '../config';

const { generateContent, GoogleGenAI } = vi.hoisted(() => {
  const generateContent = vi.fn();
  const GoogleGenAI = vi.fn(function () {
    return { models: { generateContent } };
  });
  return { generateContent, GoogleGenAI };
});

vi.mock('@google/genai', () => ({ GoogleGenAI }));

const silent = createLogger('test', () => {});
const audio = { content: Buffer.from('abc'), filename: 'clip.wav', contentType: 'audio/wav' };
const openAIConfig = { apiKey: 'test-key', baseUrl: 'https://api.example.test/v1', language: '', temperature: 0 };

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const mockFetch = (response: Response | Error) => {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

const sentForm = (init: RequestInit | undefined): FormData => {
  const body = init?.body;
  if (!(body instanceof FormData)) throw new Error('expected a multipart body');
  return body;
};

describe('buildTranscriptionPrompt', () => {
  it('asks for an empty answer on silence', () => {
    expect(buildTranscriptionPrompt('', false)).toBe(
      'Transcribe the audio faithfully. If the audio is silent, noisy or contains no speech, return an empty string.'
    );
  });

  it('names the language and asks previews to be terse', () => {
    const prompt = buildTranscriptionPrompt('it', true);
    expect(prompt).toContain('ISO 639-1 code "it"');
    expect(prompt.endsWith('Answer tersely and leave out uncertain punctuation.')).toBe(true);
  });
});

describe('OpenAITranscriber', () => {
  it('posts the audio as multipart and returns the trimmed text', async () => {
    const fetchMock = mockFetch(jsonResponse({ text: '  transcribed text  ' }));
    const transcriber = new OpenAITranscriber(openAIConfig, silent);

    const text = await transcriber.transcribe(audio, { model: 'gpt-4o-mini-transcribe' });

    expect(text).toBe('transcribed text');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe('https://api.example.test/v1/audio/transcriptions');
    expect(init?.method).toBe('POST');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');

    const form = sentForm(init);
    expect(form.get('model')).toBe('gpt-4o-mini-transcribe');
    expect(form.get('temperature')).toBe('0');
    expect(form.get('response_format')).toBe('json');
    expect(form.get('prompt')).toBe(buildTranscriptionPrompt('', false));
    expect(form.get('language')).toBeNull();
    const file = form.get('file');
    expect(file).toBeInstanceOf(File);
    if (file instanceof File) {
      expect(file.name).toBe('clip.wav');
      expect(file.size).toBe(3);
    }
  });

  it('adds the language and the preview prompt when asked', async () => {
    const fetchMock = mockFetch(jsonResponse({ text: 'ok' }));
    const transcriber = new OpenAITranscriber({ ...openAIConfig, language: 'it' }, silent);

    await transcriber.transcribe(audio, { model: 'whisper-1', preview: true });

    const form = sentForm(fetchMock.mock.calls[0][1]);
    expect(form.get('language')).toBe('it');
    expect(form.get('prompt')).toBe(buildTranscriptionPrompt('it', true));
  });

  it('returns an empty string when the answer has no text', async () => {
    mockFetch(jsonResponse({}));
    const transcriber = new OpenAITranscriber(openAIConfig, silent);

    await expect(transcriber.transcribe(audio, { model: 'm' })).resolves.toBe('');
  });

  it('uses the provider error message from a JSON error body', async () => {
    mockFetch(jsonResponse({ error: { message: 'Invalid API key' } }, 401));
    const transcriber = new OpenAITranscriber(openAIConfig, silent);

    const failure = transcriber.transcribe(audio, { model: 'm' });
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toMatchObject({
      message: 'Invalid API key',
      statusCode: 401,
      detail: '{"error":{"message":"Invalid API key"}}'
    });
  });

  it('falls back to status and body for a non-JSON error', async () => {
    mockFetch(new Response('gateway timeout', { status: 504 }));
    const transcriber = new OpenAITranscriber(openAIConfig, silent);

    await expect(transcriber.transcribe(audio, { model: 'm' })).rejects.toThrow('HTTP 504: gateway timeout');
  });

  it('wraps network failures', async () => {
    mockFetch(new Error('connection refused'));
    const transcriber = new OpenAITranscriber(openAIConfig, silent);

    await expect(transcriber.transcribe(audio, { model: 'm' })).rejects.toThrow(
      'Provider request failed: connection refused'
    );
  });
});

describe('GeminiTranscriber', () => {
  beforeEach(() => {
    generateContent.mockReset();
    GoogleGenAI.mockClear();
  });

  it('sends the audio inline and returns the trimmed text', async () => {
    generateContent.mockResolvedValue({ text: ' ciao a tutti ' });
    const transcriber = new GeminiTranscriber({ apiKey: 'test-key', language: 'it', temperature: 0 }, silent);

    const text = await transcriber.transcribe(audio, { model: 'gemini-2.5-flash' });

    expect(text).toBe('ciao a tutti');
    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-key', httpOptions: { timeout: 300000 } });
    expect(generateContent).toHaveBeenCalledWith({
      model: 'gemini-2.5-flash',
      contents: [
        {
          role: 'user',
          parts: [
            { inlineData: { mimeType: 'audio/wav', data: 'YWJj' } },
            { text: buildTranscriptionPrompt('it', false) }
          ]
        }
      ],
      config: { temperature: 0 }
    });
  });

  it('uses the short timeout for previews', async () => {
    generateContent.mockResolvedValue({ text: undefined });
    const transcriber = new GeminiTranscriber({ apiKey: 'test-key', language: '', temperature: 0 }, silent);

    await expect(transcriber.transcribe(audio, { model: 'gemini-2.5-flash', preview: true })).resolves.toBe('');
    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-key', httpOptions: { timeout: 60000 } });
  });

  it('turns SDK failures into provider errors', async () => {
    generateContent.mockRejectedValue(Object.assign(new Error('quota exceeded'), { status: 429 }));
    const transcriber = new GeminiTranscriber({ apiKey: 'test-key', language: '', temperature: 0 }, silent);

    await expect(transcriber.transcribe(audio, { model: 'gemini-2.5-flash' })).rejects.toMatchObject({
      name: 'ProviderError',
      message: 'quota exceeded',
      statusCode: 429
    });
  });
});

describe('createTranscriber', () => {
  const base: AppConfig = {
    provider: 'openai',
    apiKey: 'test-key',
    baseUrl: 'https://api.example.test/v1',
    transcribeModel: 't',
    previewModel: 'p',
    textModel: 'x',
    language: '',
    temperature: 0,
    logoName: 'L',
    liveDraft: true,
    host: '127.0.0.1',
    port: 0,
    saveRoot: '/tmp/unused',
    maxUploadBytes: 1024
  };

  it('picks the implementation for the configured provider', () => {
    expect(createTranscriber(base, silent)).toBeInstanceOf(OpenAITranscriber);
    expect(createTranscriber({ ...base, provider: 'google' }, silent)).toBeInstanceOf(GeminiTranscriber);
  });
});
