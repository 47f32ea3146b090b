import type { Insights, LogEntry, SaveResponse, TranscriptPart } from '../types';
import { DEFAULT_TITLE } from '../constants';
import type { SaveTextInput } from './apiClient';
import { joinTranscript } from './session';

export interface TranscriptSink {
  saveText(input: SaveTextInput): Promise<SaveResponse>;
  summarize(text: string): Promise<Insights>;
}

export type ActivityLog = (message: string, level?: LogEntry['level']) => void;

export interface PublishInput {
  sid: string;
  title: string;
  parts: TranscriptPart[];
  /** Recordings keep `<sid>_full.html` in step with their parts; single uploads only get insights. */
  saveFullText: boolean;
}

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Writes the session's full transcript document and asks for AI Insights.
 * Failures are reported through `addLog`; the insights are null when there are none.
 */
export const publishTranscript = async (
  sink: TranscriptSink,
  { sid, title, parts, saveFullText }: PublishInput,
  addLog: ActivityLog,
): Promise<Insights | null> => {
  const transcript = joinTranscript(parts);

  if (saveFullText) {
    try {
      const saved = await sink.saveText({ text: transcript, sid, title: title.trim() || DEFAULT_TITLE });
      addLog(`Transcript saved: ${saved.path ?? sid}`, 'success');
    } catch (error) {
      addLog(`Saving transcript failed: ${describeError(error)}`, 'error');
    }
  }

  if (!transcript.trim()) {
    addLog('Nothing to summarize.', 'warn');
    return null;
  }

  try {
    const insights = await sink.summarize(transcript);
    addLog(`AI Insights ready (${insights.notes.length} notes).`, 'success');
    return insights;
  } catch (error) {
    addLog(`Summary failed: ${describeError(error)}`, 'error');
    return null;
  }
};
