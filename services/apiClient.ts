import type { ErrorResponse, Insights, PreviewResponse, SaveResponse, UploadResponse } from '../types';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface UploadBlockInput {
  audio: Blob;
  filename: string;
  title: string;
  sid: string;
  part?: number;
}

export interface SaveTextInput {
  text: string;
  sid: string;
  title: string;
}

type Guard<T> = (value: unknown) => value is T;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isErrorResponse: Guard<ErrorResponse> = (value): value is ErrorResponse =>
  isRecord(value) && typeof value.error === 'string';

const isUploadResponse: Guard<UploadResponse> = (value): value is UploadResponse =>
  isRecord(value) && typeof value.text === 'string' && typeof value.formatted === 'string';

const isPreviewResponse: Guard<PreviewResponse> = (value): value is PreviewResponse =>
  isRecord(value) && typeof value.text === 'string';

const isSaveResponse: Guard<SaveResponse> = (value): value is SaveResponse =>
  isRecord(value) && typeof value.saved === 'boolean';

const isInsights: Guard<Insights> = (value): value is Insights =>
  isRecord(value) &&
  typeof value.summary === 'string' &&
  Array.isArray(value.notes) &&
  value.notes.every(note => typeof note === 'string');

export class ApiClient {
  constructor(private readonly baseUrl: string = '') {}

  private async request<T>(path: string, init: RequestInit, guard: Guard<T>): Promise<T> {
    const response = await fetch(`${this.baseUrl}${path}`, init);
    const body = await response.text();

    let json: unknown = null;
    try {
      json = body ? JSON.parse(body) : null;
    } catch {
      // Not JSON, reported below with the raw body.
    }

    if (!response.ok) {
      if (isErrorResponse(json)) {
        throw new ApiError(json.error, response.status, json.detail);
      }
      throw new ApiError(`HTTP ${response.status}: ${body}`, response.status);
    }

    if (!guard(json)) {
      throw new ApiError(`Unexpected response from ${path}`, response.status);
    }
    return json;
  }

  private postJson<T>(path: string, payload: unknown, guard: Guard<T>): Promise<T> {
    return this.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload)
    }, guard);
  }

  uploadBlock({ audio, filename, title, sid, part }: UploadBlockInput): Promise<UploadResponse> {
    const form = new FormData();
    form.append('file', audio, filename);
    form.append('title', title);
    form.append('sid', sid);
    if (part !== undefined) {
      form.append('part', String(part));
    }
    return this.request('/upload', { method: 'POST', body: form }, isUploadResponse);
  }

  uploadPreview(audio: Blob): Promise<PreviewResponse> {
    const form = new FormData();
    form.append('file', audio, 'preview.wav');
    return this.request('/upload_preview', { method: 'POST', body: form }, isPreviewResponse);
  }

  saveAudio(audio: Blob, filename: string, sid: string): Promise<SaveResponse> {
    const form = new FormData();
    form.append('file', audio, filename);
    form.append('sid', sid);
    return this.request('/save_audio', { method: 'POST', body: form }, isSaveResponse);
  }

  saveText(input: SaveTextInput): Promise<SaveResponse> {
    return this.postJson('/save_text', input, isSaveResponse);
  }

  summarize(text: string): Promise<Insights> {
    return this.postJson('/summarize', { text }, isInsights);
  }
}

export const apiClient = new ApiClient();
