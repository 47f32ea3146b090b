import { GoogleGenAI } from "@google/genai";
import { z } from 'zod';
import type { AppConfig } from '../config';
import { createLogger, type Logger } from '../logger';
import { ProviderError } from '../errors';
import { providerFetch, readJson, toProviderError } from './providerHttp';

const FULL_TIMEOUT_MS = 300_000;
const PREVIEW_TIMEOUT_MS = 60_000;

export interface AudioInput {
  content: Buffer;
  filename: string;
  contentType: string;
}

export interface TranscribeOptions {
  model: string;
  preview?: boolean;
}

export interface Transcriber {
  transcribe(audio: AudioInput, options: TranscribeOptions): Promise<string>;
}

const transcriptionResponseSchema = z.object({
  text: z.string().nullish()
});

export const buildTranscriptionPrompt = (language: string, preview: boolean): string => {
  let prompt = 'Transcribe the audio faithfully.';
  if (language) {
    prompt += ` The speech is in the language with ISO 639-1 code "${language}"; write the transcript in that language.`;
  }
  prompt += ' If the audio is silent, noisy or contains no speech, return an empty string.';
  if (preview) {
    prompt += ' Answer tersely and leave out uncertain punctuation.';
  }
  return prompt;
};

export class OpenAITranscriber implements Transcriber {
  private log: Logger;

  constructor(
    private readonly config: Pick<AppConfig, 'apiKey' | 'baseUrl' | 'language' | 'temperature'>,
    log: Logger = createLogger('provider'),
  ) {
    this.log = log;
  }

  async transcribe(audio: AudioInput, { model, preview = false }: TranscribeOptions): Promise<string> {
    const formData = new FormData();
    const blob = new Blob([new Uint8Array(audio.content)], { type: audio.contentType || 'application/octet-stream' });
    formData.append('file', blob, audio.filename || 'audio.wav');
    formData.append('model', model);
    formData.append('temperature', String(this.config.temperature));
    formData.append('response_format', 'json');
    formData.append('prompt', buildTranscriptionPrompt(this.config.language, preview));
    if (this.config.language) {
      formData.append('language', this.config.language);
    }

    const response = await providerFetch(
      `${this.config.baseUrl}/audio/transcriptions`,
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        body: formData
      },
      { timeoutMs: preview ? PREVIEW_TIMEOUT_MS : FULL_TIMEOUT_MS, log: this.log },
    );

    const payload = transcriptionResponseSchema.safeParse(await readJson(response));
    return payload.success ? (payload.data.text || '').trim() : '';
  }
}

export class GeminiTranscriber implements Transcriber {
  private log: Logger;

  constructor(
    private readonly config: Pick<AppConfig, 'apiKey' | 'language' | 'temperature'>,
    log: Logger = createLogger('provider'),
  ) {
    this.log = log;
  }

  async transcribe(audio: AudioInput, { model, preview = false }: TranscribeOptions): Promise<string> {
    if (!this.config.apiKey) {
      throw new ProviderError("Gemini API Key is not set.");
    }

    // A fresh client per request, so the timeout follows the request kind.
    const ai = new GoogleGenAI({
      apiKey: this.config.apiKey,
      httpOptions: { timeout: preview ? PREVIEW_TIMEOUT_MS : FULL_TIMEOUT_MS }
    });

    this.log.info(`-> generateContent ${model} (${audio.content.length} bytes of audio)`);
    try {
      const response = await ai.models.generateContent({
        model,
        contents: [
          {
            role: 'user',
            parts: [
              { inlineData: { mimeType: audio.contentType || 'audio/wav', data: audio.content.toString('base64') } },
              { text: buildTranscriptionPrompt(this.config.language, preview) }
            ]
          }
        ],
        config: {
          temperature: this.config.temperature
        }
      });
      this.log.info(`<- generateContent ${model}`);
      return (response.text || '').trim();
    } catch (error) {
      this.log.error(`x generateContent ${model}`, error);
      throw toProviderError(error);
    }
  }
}

export const createTranscriber = (config: AppConfig, log?: Logger): Transcriber =>
  config.provider === 'google' ? new GeminiTranscriber(config, log) : new OpenAITranscriber(config, log);
