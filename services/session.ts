import { PartStatus, type Insights, type SavedSession, type TranscriptPart } from '../types';

export const AUTOSAVE_KEY = 'session_scribe_autosave_v1';

const pad = (value: number) => String(value).padStart(2, '0');

/** "Weekly sync" started at 2026-10-18 14:03:22 becomes "Weekly_sync_20261018_140322". */
export const createSessionId = (title: string, date: Date): string => {
  const slug = title
    .trim()
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 40) || 'session';
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${slug}_${stamp}`;
};

export const titleFromFileName = (fileName: string): string => {
  const dot = fileName.lastIndexOf('.');
  return (dot > 0 ? fileName.slice(0, dot) : fileName).trim();
};

/** Cumulative transcript of the completed parts, in part order. */
export const joinTranscript = (parts: TranscriptPart[]): string =>
  [...parts]
    .filter(part => part.status === PartStatus.COMPLETED && part.text.trim() !== '')
    .sort((a, b) => a.part - b.part)
    .map(part => part.text.trim())
    .join('\n\n');

export const upsertPart = (parts: TranscriptPart[], next: TranscriptPart): TranscriptPart[] => {
  const others = parts.filter(part => part.part !== next.part);
  return [...others, next].sort((a, b) => a.part - b.part);
};

export const formatElapsed = (seconds: number): string => {
  const whole = Math.max(0, Math.floor(seconds));
  return `${pad(Math.floor(whole / 60))}:${pad(whole % 60)}`;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const PART_STATUSES: readonly unknown[] = Object.values(PartStatus);

const isTranscriptPart = (value: unknown): value is TranscriptPart =>
  isRecord(value) &&
  typeof value.part === 'number' &&
  PART_STATUSES.includes(value.status) &&
  typeof value.text === 'string' &&
  typeof value.formatted === 'string';

const isInsights = (value: unknown): value is Insights =>
  isRecord(value) &&
  typeof value.summary === 'string' &&
  Array.isArray(value.notes) &&
  value.notes.every(note => typeof note === 'string');

const isSavedSession = (value: unknown): value is SavedSession =>
  isRecord(value) &&
  typeof value.sid === 'string' &&
  typeof value.title === 'string' &&
  Array.isArray(value.parts) &&
  value.parts.every(isTranscriptPart) &&
  (value.insights === null || isInsights(value.insights));

export const saveSession = (storage: Pick<Storage, 'setItem'>, session: SavedSession): void => {
  storage.setItem(AUTOSAVE_KEY, JSON.stringify(session));
};

export const loadSession = (storage: Pick<Storage, 'getItem'>): SavedSession | null => {
  const raw = storage.getItem(AUTOSAVE_KEY);
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isSavedSession(parsed) ? parsed : null;
  } catch {
    return null;
  }
};
