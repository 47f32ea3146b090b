import os from 'os';
import path from 'path';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createLogger } from '../logger';
import {
  SessionStore,
  extensionOf,
  fullFileName,
  partFileName,
  safeName,
  timestamp,
  withExtension
} from './sessionStore';

const date = new Date(2026, 0, 2, 3, 4, 5);

describe('safeName', () => {
  it('replaces runs of unsafe characters with an underscore', () => {
    expect(safeName('Team meeting #1/2')).toBe('Team_meeting_1_2');
  });

  it('falls back to "session" for empty or dot-only names', () => {
    expect(safeName('')).toBe('session');
    expect(safeName(undefined)).toBe('session');
    expect(safeName('..')).toBe('session');
  });

  it('keeps traversal attempts inside a single folder name', () => {
    expect(safeName('../etc')).toBe('.._etc');
  });

  it('truncates to 60 characters', () => {
    expect(safeName('a'.repeat(80))).toHaveLength(60);
  });
});

describe('file names', () => {
  it('formats the local timestamp', () => {
    expect(timestamp(date)).toBe('20260102_030405');
  });

  it('takes the lower-cased extension or defaults to .wav', () => {
    expect(extensionOf('clip.MP3')).toBe('.mp3');
    expect(extensionOf('blob')).toBe('.wav');
    expect(extensionOf(undefined)).toBe('.wav');
  });

  it('names part files by zero-padded part number', () => {
    expect(partFileName({ sid: 'Talk 1', part: 7, ext: '.wav', date })).toBe('Talk_1_part007.wav');
    expect(partFileName({ sid: 'Talk 1', part: 0, ext: '.wav', date })).toBe('Talk_1_part000.wav');
  });

  it('uses the timestamp when there is no part or no session', () => {
    expect(partFileName({ sid: 'Talk 1', ext: '.m4a', date })).toBe('Talk_1_20260102_030405.m4a');
    expect(partFileName({ ext: '.wav', date })).toBe('rec_20260102_030405.wav');
  });

  it('names full-session files', () => {
    expect(fullFileName({ sid: 'Talk 1', ext: '.webm', date })).toBe('Talk_1_full.webm');
    expect(fullFileName({ ext: '.html', date })).toBe('rec_20260102_030405_full.html');
  });

  it('swaps the extension of a file name', () => {
    expect(withExtension('Talk_1_part007.wav', '.html')).toBe('Talk_1_part007.html');
  });
});

describe('SessionStore', () => {
  let root: string;
  let lines: string[];
  let store: SessionStore;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'session-store-'));
    lines = [];
    store = new SessionStore(path.join(root, 'saves'), createLogger('save', line => lines.push(line)));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes session files into the session folder', async () => {
    const filePath = await store.save(Buffer.from('abc'), 'Talk 1', 'Talk_1_part001.wav');

    expect(filePath).toBe(path.join(root, 'saves', 'Talk_1', 'Talk_1_part001.wav'));
    expect(await readFile(filePath, 'utf-8')).toBe('abc');
    expect(lines).toEqual([`[save] ${filePath} (3 bytes)`]);
  });

  it('writes files without a session directly into the root', async () => {
    const filePath = await store.save('<p>é</p>', undefined, 'rec_20260102_030405.html');

    expect(filePath).toBe(path.join(root, 'saves', 'rec_20260102_030405.html'));
    expect(await readFile(filePath, 'utf-8')).toBe('<p>é</p>');
    expect(lines[0]).toBe(`[save] ${filePath} (9 bytes)`);
  });

  it('creates the root on demand', async () => {
    await store.ensureRoot();
    expect((await stat(path.join(root, 'saves'))).isDirectory()).toBe(true);
  });
});
