import { GoogleGenAI } from "@google/genai";
import { z } from 'zod';
import type { Insights } from '../../types';
import type { AppConfig } from '../config';
import { ProviderError, errorMessage } from '../errors';
import { createLogger, type Logger } from '../logger';
import { providerFetch, readJson, toProviderError } from './providerHttp';
import { toSentences } from './textCleanup';

const SUMMARY_TIMEOUT_MS = 120_000;
const SUMMARY_TEMPERATURE = 0.2;
const MAX_NOTES = 10;
const FALLBACK_SUMMARY_SENTENCES = 5;

type LLMConfig = Pick<AppConfig, 'provider' | 'apiKey' | 'baseUrl' | 'textModel'>;

export interface InsightsService {
  summarize(text: string): Promise<Insights>;
}

export const INSIGHTS_SYSTEM_PROMPT =
  'You are an assistant that writes a concise summary and bullet-point notes from a transcript. ' +
  'Use a clear, natural style in the language of the transcript. Do not invent content. ' +
  'Return ONLY JSON with the keys "summary" (3-6 sentences) and "notes" (5-10 short items).';

const insightsSchema = z.object({
  summary: z.string().nullish(),
  notes: z.array(z.unknown()).nullish()
});

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() })
      })
    )
    .min(1)
});

const cleanOutput = (text: string): string => {
  return text
    .trim()
    .replace(/^```[a-z]*\s*\n/i, '')
    .replace(/\n?```\s*$/, '')
    .trim();
};

/** Parses the model's JSON answer; throws when it is not the expected shape. */
export const parseInsights = (raw: string): Insights => {
  const parsed = insightsSchema.parse(JSON.parse(cleanOutput(raw)));
  const notes = (parsed.notes || [])
    .filter((note): note is string => typeof note === 'string' && note.trim() !== '')
    .map(note => note.trim());

  return {
    summary: (parsed.summary || '').trim(),
    notes: notes.slice(0, MAX_NOTES)
  };
};

/** Summary made of the transcript's own first sentences, used when the model is unavailable. */
export const extractiveInsights = (text: string): Insights => {
  const sentences = toSentences(text);
  return {
    summary: sentences.slice(0, FALLBACK_SUMMARY_SENTENCES).join(' '),
    notes: sentences.slice(FALLBACK_SUMMARY_SENTENCES, FALLBACK_SUMMARY_SENTENCES * 2)
  };
};

const generateWithGoogle = async (text: string, config: LLMConfig, log: Logger): Promise<string> => {
  if (!config.apiKey) {
    throw new ProviderError("Gemini API Key is not set.");
  }

  const ai = new GoogleGenAI({ apiKey: config.apiKey, httpOptions: { timeout: SUMMARY_TIMEOUT_MS } });
  log.info(`-> generateContent ${config.textModel}`);
  try {
    const response = await ai.models.generateContent({
      model: config.textModel || 'gemini-2.5-flash',
      contents: text,
      config: {
        systemInstruction: INSIGHTS_SYSTEM_PROMPT,
        temperature: SUMMARY_TEMPERATURE,
        responseMimeType: 'application/json'
      }
    });
    log.info(`<- generateContent ${config.textModel}`);
    return response.text || '';
  } catch (error) {
    throw toProviderError(error);
  }
};

const generateWithOpenAI = async (text: string, config: LLMConfig, log: Logger): Promise<string> => {
  const url = `${config.baseUrl.replace(/\/$/, '')}/chat/completions`;

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };

  if (config.apiKey) {
    headers['Authorization'] = `Bearer ${config.apiKey}`;
  }

  const payload = {
    model: config.textModel,
    messages: [
      { role: "system", content: INSIGHTS_SYSTEM_PROMPT },
      { role: "user", content: text }
    ],
    temperature: SUMMARY_TEMPERATURE,
    response_format: { type: 'json_object' },
    stream: false
  };

  const response = await providerFetch(
    url,
    { method: 'POST', headers, body: JSON.stringify(payload) },
    { timeoutMs: SUMMARY_TIMEOUT_MS, log },
  );

  const data = chatCompletionSchema.parse(await readJson(response));
  return data.choices[0].message.content || '';
};

export const createInsightsService = (config: LLMConfig, log: Logger = createLogger('insights')): InsightsService => ({
  summarize: async (text: string): Promise<Insights> => {
    try {
      const rawOutput = config.provider === 'google'
        ? await generateWithGoogle(text, config, log)
        : await generateWithOpenAI(text, config, log);
      return parseInsights(rawOutput);
    } catch (error) {
      log.warn(`Falling back to extractive summary: ${errorMessage(error)}`);
      return extractiveInsights(text);
    }
  }
});
