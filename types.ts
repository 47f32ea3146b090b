export enum PartStatus {
  PENDING = 'PENDING',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  SKIPPED = 'SKIPPED'
}

export type LLMProvider = 'openai' | 'google';

/** Settings the server injects into the page as `window.__APP_CONFIG__`. */
export interface ClientConfig {
  logoName: string;
  liveDraft: boolean;
  language: string;
}

export interface UploadResponse {
  text: string;
  formatted: string;
}

export interface PreviewResponse {
  text: string;
}

export interface SaveResponse {
  saved: boolean;
  path?: string;
  error?: string;
}

export interface Insights {
  summary: string;
  notes: string[];
}

export interface ErrorResponse {
  error: string;
  detail?: string;
}

export interface TranscriptPart {
  part: number;
  status: PartStatus;
  text: string;
  formatted: string;
  error?: string;
}

export interface LogEntry {
  timestamp: number;
  level: 'info' | 'success' | 'warn' | 'error';
  message: string;
}

export interface SessionState {
  sid: string | null;
  title: string;
  parts: TranscriptPart[];
  draft: string;
  insights: Insights | null;
  isRecording: boolean;
  isBusy: boolean;
  logs: LogEntry[];
  startTime: number | null;
}

export interface SavedSession {
  sid: string;
  title: string;
  parts: TranscriptPart[];
  insights: Insights | null;
  savedAt: string;
}
