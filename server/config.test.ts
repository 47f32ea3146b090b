import os from 'os';
import path from 'path';
import { mkdir, mkdtemp, rm } from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, normalizeLanguage, resolveDesktopDir } from './config';
import { ConfigError } from './errors';

describe('normalizeLanguage', () => {
  it('keeps the first two letters, lower-cased', () => {
    expect(normalizeLanguage('it-IT')).toBe('it');
    expect(normalizeLanguage(' EN ')).toBe('en');
  });

  it('drops values that are not a language code', () => {
    expect(normalizeLanguage('1x')).toBe('');
    expect(normalizeLanguage('e')).toBe('');
    expect(normalizeLanguage(undefined)).toBe('');
  });
});

describe('loadConfig', () => {
  let home: string;

  beforeEach(async () => {
    home = await mkdtemp(path.join(os.tmpdir(), 'config-home-'));
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it('applies defaults for the OpenAI provider', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key' }, home);

    expect(config).toEqual({
      provider: 'openai',
      apiKey: 'test-key',
      baseUrl: 'https://api.openai.com/v1',
      transcribeModel: 'gpt-4o-mini-transcribe',
      previewModel: 'gpt-4o-mini-transcribe',
      textModel: 'gpt-4o-mini',
      language: '',
      temperature: 0,
      logoName: 'Session Scribe',
      liveDraft: true,
      host: '127.0.0.1',
      port: 8000,
      saveRoot: path.join(home, 'Session Scribe'),
      maxUploadBytes: 104857600
    });
  });

  it('reads the Gemini key and models for the Google provider', () => {
    const config = loadConfig(
      { LLM_PROVIDER: 'Google', GEMINI_API_KEY: 'test-key', TRANSCRIBE_MODEL: 'gemini-x' },
      home,
    );

    expect(config.provider).toBe('google');
    expect(config.apiKey).toBe('test-key');
    expect(config.transcribeModel).toBe('gemini-x');
    expect(config.previewModel).toBe('gemini-x');
    expect(config.textModel).toBe('gemini-2.5-flash');
  });

  it('parses explicit values', () => {
    const config = loadConfig(
      {
        OPENAI_API_KEY: 'test-key',
        OPENAI_BASE_URL: 'http://localhost:11434/v1/',
        PREVIEW_TRANSCRIBE_MODEL: 'whisper-1',
        LANGUAGE: 'fr-CA',
        TEMPERATURE: '0.4',
        LIVE_DRAFT_ENABLED: 'FALSE',
        PORT: '9001',
        SAVE_DIR: path.join(home, 'out'),
        MAX_UPLOAD_MB: '2'
      },
      home,
    );

    expect(config.baseUrl).toBe('http://localhost:11434/v1');
    expect(config.previewModel).toBe('whisper-1');
    expect(config.language).toBe('fr');
    expect(config.temperature).toBe(0.4);
    expect(config.liveDraft).toBe(false);
    expect(config.port).toBe(9001);
    expect(config.saveRoot).toBe(path.join(home, 'out'));
    expect(config.maxUploadBytes).toBe(2097152);
  });

  it('requires the API key of the selected provider', () => {
    expect(() => loadConfig({}, home)).toThrow('OPENAI_API_KEY: required when LLM_PROVIDER is openai');
    expect(() => loadConfig({ LLM_PROVIDER: 'google', OPENAI_API_KEY: 'test-key' }, home)).toThrow(
      'GEMINI_API_KEY: required when LLM_PROVIDER is google'
    );
  });

  it('reports every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ OPENAI_API_KEY: 'test-key', PORT: 'abc', TEMPERATURE: '5', LLM_PROVIDER: 'azure' }, home);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues.map(issue => issue.split(':')[0]).sort()).toEqual(['LLM_PROVIDER', 'PORT', 'TEMPERATURE']);
  });
});

describe('resolveDesktopDir', () => {
  let home: string;

  beforeEach(async () => {
    home = await mkdtemp(path.join(os.tmpdir(), 'desktop-home-'));
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it('prefers a localized desktop folder when present', async () => {
    await mkdir(path.join(home, 'Bureau'));
    expect(resolveDesktopDir(home)).toBe(path.join(home, 'Bureau'));
  });

  it('falls back to the home directory', () => {
    expect(resolveDesktopDir(home)).toBe(home);
  });
});
