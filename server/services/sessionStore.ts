import path from 'path';
import { mkdir, writeFile } from 'fs/promises';
import { createLogger, type Logger } from '../logger';

const UNSAFE_NAME_CHARS = /[^A-Za-z0-9._-]+/g;
const MAX_NAME_LENGTH = 60;
const FALLBACK_NAME = 'session';
const DEFAULT_EXTENSION = '.wav';

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** File-system safe session name. Never resolves to "." or "..". */
export const safeName = (value: string | null | undefined): string => {
  if (!value) return FALLBACK_NAME;
  const name = value.replace(UNSAFE_NAME_CHARS, '_').slice(0, MAX_NAME_LENGTH);
  if (!name || /^\.+$/.test(name)) return FALLBACK_NAME;
  return name;
};

/** YYYYMMDD_HHMMSS in local time. */
export const timestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const extensionOf = (filename: string | null | undefined): string =>
  path.extname(filename || '').toLowerCase() || DEFAULT_EXTENSION;

export interface FileNameOptions {
  sid?: string;
  part?: number;
  ext: string;
  date: Date;
}

/** Name of one incremental block (or a one-off upload) of a session. */
export const partFileName = ({ sid, part, ext, date }: FileNameOptions): string => {
  if (!sid) return `rec_${timestamp(date)}${ext}`;
  const base = safeName(sid);
  if (part !== undefined) return `${base}_part${pad(part, 3)}${ext}`;
  return `${base}_${timestamp(date)}${ext}`;
};

export const fullFileName = ({ sid, ext, date }: Omit<FileNameOptions, 'part'>): string =>
  sid ? `${safeName(sid)}_full${ext}` : `rec_${timestamp(date)}_full${ext}`;

export const withExtension = (filename: string, ext: string): string =>
  `${filename.slice(0, filename.length - path.extname(filename).length)}${ext}`;

export class SessionStore {
  private log: Logger;

  constructor(
    public readonly root: string,
    log: Logger = createLogger('save'),
  ) {
    this.log = log;
  }

  async ensureRoot(): Promise<void> {
    await mkdir(this.root, { recursive: true });
  }

  folderFor(sid?: string): string {
    return sid ? path.join(this.root, safeName(sid)) : this.root;
  }

  async save(content: Buffer | string, sid: string | undefined, filename: string): Promise<string> {
    const folder = this.folderFor(sid);
    await mkdir(folder, { recursive: true });

    const filePath = path.join(folder, path.basename(filename));
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
    await writeFile(filePath, bytes);

    this.log.info(`${filePath} (${bytes.length} bytes)`);
    return filePath;
  }
}
