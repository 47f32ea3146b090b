import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import type { LLMProvider } from '../types';
import { ConfigError } from './errors';

export const APP_FOLDER_NAME = 'Session Scribe';
export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

const DEFAULT_MODELS: Record<LLMProvider, { transcribe: string; text: string }> = {
  openai: { transcribe: 'gpt-4o-mini-transcribe', text: 'gpt-4o-mini' },
  google: { transcribe: 'gemini-2.5-flash', text: 'gemini-2.5-flash' }
};

// Localized names macOS and Windows give the desktop folder.
const DESKTOP_CANDIDATES = ['Desktop', 'Scrivania', 'Bureau', 'Escritorio'];

export interface AppConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl: string;
  transcribeModel: string;
  previewModel: string;
  textModel: string;
  language: string;
  temperature: number;
  logoName: string;
  liveDraft: boolean;
  host: string;
  port: number;
  saveRoot: string;
  maxUploadBytes: number;
}

/**
 * Keeps only a two-letter language code ("it", "en"): "it-IT" becomes "it",
 * anything that does not start with two ASCII letters becomes "".
 */
export const normalizeLanguage = (value: string | undefined): string => {
  if (!value) return '';
  const match = value.trim().match(/^([A-Za-z]{2})/);
  return match ? match[1].toLowerCase() : '';
};

export const resolveDesktopDir = (homeDir: string): string => {
  for (const name of DESKTOP_CANDIDATES) {
    const candidate = path.join(homeDir, name);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
  }
  return homeDir;
};

const optionalString = z
  .string()
  .optional()
  .transform(value => value?.trim() || undefined);

const numberWithDefault = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(value => (value?.trim() ? Number(value) : fallback));

const envSchema = z
  .object({
    LLM_PROVIDER: z
      .string()
      .optional()
      .transform(value => value?.trim().toLowerCase() || 'openai')
      .pipe(z.enum(['openai', 'google'])),
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
    GEMINI_API_KEY: optionalString,
    TRANSCRIBE_MODEL: optionalString,
    PREVIEW_TRANSCRIBE_MODEL: optionalString,
    TEXT_MODEL: optionalString,
    LANGUAGE: z.string().optional(),
    TEMPERATURE: numberWithDefault(0).pipe(z.number().min(0).max(2)),
    LOGO_NAME: optionalString,
    LIVE_DRAFT_ENABLED: z
      .string()
      .optional()
      .transform(value => (value?.trim() ? value.trim().toLowerCase() === 'true' : true)),
    HOST: optionalString,
    PORT: numberWithDefault(8000).pipe(z.number().int().min(0).max(65535)),
    SAVE_DIR: optionalString,
    MAX_UPLOAD_MB: numberWithDefault(100).pipe(z.number().positive())
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['OPENAI_API_KEY'], message: 'required when LLM_PROVIDER is openai' });
    }
    if (env.LLM_PROVIDER === 'google' && !env.GEMINI_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GEMINI_API_KEY'], message: 'required when LLM_PROVIDER is google' });
    }
  });

export const loadConfig = (env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration in environment / .env', issues);
  }

  const values = parsed.data;
  const provider = values.LLM_PROVIDER;
  const defaults = DEFAULT_MODELS[provider];
  const transcribeModel = values.TRANSCRIBE_MODEL || defaults.transcribe;

  return {
    provider,
    apiKey: (provider === 'google' ? values.GEMINI_API_KEY : values.OPENAI_API_KEY) || '',
    baseUrl: (values.OPENAI_BASE_URL || DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, ''),
    transcribeModel,
    previewModel: values.PREVIEW_TRANSCRIBE_MODEL || transcribeModel,
    textModel: values.TEXT_MODEL || defaults.text,
    language: normalizeLanguage(values.LANGUAGE),
    temperature: values.TEMPERATURE,
    logoName: values.LOGO_NAME || APP_FOLDER_NAME,
    liveDraft: values.LIVE_DRAFT_ENABLED,
    host: values.HOST || '127.0.0.1',
    port: values.PORT,
    saveRoot: values.SAVE_DIR ? path.resolve(values.SAVE_DIR) : path.join(resolveDesktopDir(homeDir), APP_FOLDER_NAME),
    maxUploadBytes: Math.round(values.MAX_UPLOAD_MB * 1024 * 1024)
  };
};
