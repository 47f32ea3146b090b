import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PartStatus, type Insights, type LogEntry, type SaveResponse, type TranscriptPart } from '../types';
import type { SaveTextInput } from './apiClient';
import { publishTranscript } from './transcriptPublisher';

const part = (n: number, status: PartStatus, text = ''): TranscriptPart => ({ part: n, status, text, formatted: text });

describe('publishTranscript', () => {
  const saveText = vi.fn<(input: SaveTextInput) => Promise<SaveResponse>>();
  const summarize = vi.fn<(text: string) => Promise<Insights>>();
  const sink = { saveText, summarize };
  let logs: Array<[string, LogEntry['level'] | undefined]>;
  const addLog = (message: string, level?: LogEntry['level']) => {
    logs.push([message, level]);
  };

  beforeEach(() => {
    saveText.mockReset();
    summarize.mockReset();
    logs = [];
  });

  it('re-saves the full transcript with a recovered part and refreshes the insights', async () => {
    saveText.mockResolvedValue({ saved: true, path: '/saves/Standup/Standup_full.html' });
    summarize.mockResolvedValue({ summary: 'Both parts.', notes: ['one', 'two'] });
    const parts = [part(1, PartStatus.COMPLETED, 'First part.'), part(2, PartStatus.COMPLETED, 'Recovered part.')];

    const insights = await publishTranscript(sink, { sid: 'Standup', title: ' Daily ', parts, saveFullText: true }, addLog);

    expect(saveText).toHaveBeenCalledWith({ text: 'First part.\n\nRecovered part.', sid: 'Standup', title: 'Daily' });
    expect(summarize).toHaveBeenCalledWith('First part.\n\nRecovered part.');
    expect(insights).toEqual({ summary: 'Both parts.', notes: ['one', 'two'] });
    expect(logs).toEqual([
      ['Transcript saved: /saves/Standup/Standup_full.html', 'success'],
      ['AI Insights ready (2 notes).', 'success']
    ]);
  });

  it('only summarizes a single upload', async () => {
    summarize.mockResolvedValue({ summary: 'S.', notes: [] });

    await publishTranscript(sink, { sid: 'Talk', title: '', parts: [part(1, PartStatus.COMPLETED, 'Hello.')], saveFullText: false }, addLog);

    expect(saveText).not.toHaveBeenCalled();
    expect(summarize).toHaveBeenCalledWith('Hello.');
  });

  it('saves an empty document but skips the summary when nothing was transcribed', async () => {
    saveText.mockResolvedValue({ saved: true, path: '/saves/S/S_full.html' });

    const insights = await publishTranscript(sink, { sid: 'S', title: '', parts: [part(1, PartStatus.FAILED)], saveFullText: true }, addLog);

    expect(saveText).toHaveBeenCalledWith({ text: '', sid: 'S', title: 'Transcription' });
    expect(summarize).not.toHaveBeenCalled();
    expect(insights).toBeNull();
    expect(logs[1]).toEqual(['Nothing to summarize.', 'warn']);
  });

  it('still summarizes when saving fails', async () => {
    saveText.mockRejectedValue(new Error('disk full'));
    summarize.mockRejectedValue(new Error('offline'));

    const insights = await publishTranscript(sink, { sid: 'S', title: 't', parts: [part(1, PartStatus.COMPLETED, 'Hi.')], saveFullText: true }, addLog);

    expect(insights).toBeNull();
    expect(logs).toEqual([
      ['Saving transcript failed: disk full', 'error'],
      ['Summary failed: offline', 'error']
    ]);
  });
});
