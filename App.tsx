import React, { useState, useEffect, useRef, useCallback } from 'react';
import { Save, Trash2, AudioLines } from 'lucide-react';
import { PartStatus, type LogEntry, type SavedSession, type SessionState, type TranscriptPart } from './types';
import { apiClient } from './services/apiClient';
import { readClientConfig } from './services/clientConfig';
import { MicrophoneRecorder } from './services/microphoneRecorder';
import { PcmTimeline } from './services/pcmTimeline';
import { createWavBlob } from './services/wavEncoder';
import { publishTranscript } from './services/transcriptPublisher';
import {
  AUTOSAVE_KEY,
  createSessionId,
  loadSession,
  saveSession,
  titleFromFileName,
  upsertPart
} from './services/session';
import { Terminal } from './components/Terminal';
import { FileUploader } from './components/FileUploader';
import { TranscriptView } from './components/TranscriptView';
import { InsightsPanel } from './components/InsightsPanel';
import { RecorderControls } from './components/RecorderControls';
import { BLOCK_SECONDS, DEFAULT_TITLE, PREVIEW_SECONDS, TARGET_SAMPLE_RATE } from './constants';

const clientConfig = readClientConfig();

interface PartAudio {
  audio: Blob;
  filename: string;
  numbered: boolean;
}

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

const initialState: SessionState = {
  sid: null,
  title: '',
  parts: [],
  draft: '',
  insights: null,
  isRecording: false,
  isBusy: false,
  logs: [],
  startTime: null
};

const App: React.FC = () => {
  // --- State ---
  const [state, setState] = useState<SessionState>(initialState);
  const [elapsed, setElapsed] = useState(0);
  const [isSummarizing, setIsSummarizing] = useState(false);

  // Async callbacks read these instead of closing over stale state
  const stateRef = useRef(state);
  const partsRef = useRef<TranscriptPart[]>([]);
  const partAudioRef = useRef(new Map<number, PartAudio>());
  const pendingRef = useRef(new Set<Promise<void>>());
  const recorderRef = useRef(new MicrophoneRecorder(TARGET_SAMPLE_RATE));
  const timelineRef = useRef(new PcmTimeline(TARGET_SAMPLE_RATE));
  const nextPartRef = useRef(1);
  const tickRef = useRef<number | null>(null);
  const lastPreviewRef = useRef(0);
  const previewInFlightRef = useRef(false);
  const recordedSessionRef = useRef(false);

  useEffect(() => { stateRef.current = state; }, [state]);

  // --- Helpers ---

  const addLog = useCallback((message: string, level: LogEntry['level'] = 'info') => {
    setState(prev => ({
      ...prev,
      logs: [...prev.logs, { timestamp: Date.now(), level, message }]
    }));
  }, []);

  const applyPart = useCallback((next: TranscriptPart) => {
    partsRef.current = upsertPart(partsRef.current, next);
    const parts = partsRef.current;
    setState(prev => ({ ...prev, parts }));
  }, []);

  const track = useCallback((task: Promise<void>) => {
    pendingRef.current.add(task);
    void task.finally(() => pendingRef.current.delete(task));
  }, []);

  // --- Restore / Auto-Save ---

  useEffect(() => {
    try {
      const saved = loadSession(localStorage);
      if (saved) {
        partsRef.current = saved.parts;
        nextPartRef.current = saved.parts.reduce((max, p) => Math.max(max, p.part), 0) + 1;
        setState(prev => ({
          ...prev,
          sid: saved.sid,
          title: saved.title,
          parts: saved.parts,
          insights: saved.insights,
          logs: [{ timestamp: Date.now(), level: 'success', message: `Restored session "${saved.sid}" from browser storage.` }]
        }));
      }
    } catch (e) {
      console.error('Failed to restore auto-save', e);
    }
  }, []);

  useEffect(() => {
    if (!state.sid || state.parts.length === 0) return;
    const saved: SavedSession = {
      sid: state.sid,
      title: state.title,
      parts: state.parts,
      insights: state.insights,
      savedAt: new Date().toISOString()
    };
    saveSession(localStorage, saved);
  }, [state.sid, state.title, state.parts, state.insights]);

  // --- Transcription ---

  const transcribePart = useCallback(async (part: number, { audio, filename, numbered }: PartAudio) => {
    const { sid, title } = stateRef.current;
    if (!sid) return;

    applyPart({ part, status: PartStatus.PROCESSING, text: '', formatted: '' });
    try {
      const result = await apiClient.uploadBlock({
        audio,
        filename,
        title: title.trim() || DEFAULT_TITLE,
        sid,
        part: numbered ? part : undefined
      });
      if (!result.text) {
        applyPart({ part, status: PartStatus.SKIPPED, text: '', formatted: '' });
        addLog(`Part ${part}: no speech.`, 'warn');
        return;
      }
      applyPart({ part, status: PartStatus.COMPLETED, text: result.text, formatted: result.formatted });
      addLog(`Part ${part} transcribed (${result.text.length} chars).`, 'success');
    } catch (error) {
      const message = describeError(error);
      applyPart({ part, status: PartStatus.FAILED, text: '', formatted: '', error: message });
      addLog(`Part ${part} failed: ${message}`, 'error');
    }
  }, [addLog, applyPart]);

  // Saves <sid>_full.html (recordings only) and refreshes AI Insights from the current parts
  const publish = useCallback(async () => {
    const { sid, title } = stateRef.current;
    if (!sid) return;
    setIsSummarizing(true);
    try {
      const insights = await publishTranscript(
        apiClient,
        { sid, title, parts: partsRef.current, saveFullText: recordedSessionRef.current },
        addLog
      );
      if (insights) {
        setState(prev => ({ ...prev, insights }));
      }
    } finally {
      setIsSummarizing(false);
    }
  }, [addLog]);

  const flushBlock = useCallback(() => {
    const samples = timelineRef.current.takeBlock();
    if (samples.length === 0) return;

    const part = nextPartRef.current++;
    const entry: PartAudio = {
      audio: createWavBlob(samples, TARGET_SAMPLE_RATE),
      filename: `part${String(part).padStart(3, '0')}.wav`,
      numbered: true
    };
    partAudioRef.current.set(part, entry);
    track(transcribePart(part, entry));
  }, [track, transcribePart]);

  const sendPreview = useCallback(async () => {
    if (previewInFlightRef.current) return;
    previewInFlightRef.current = true;
    try {
      const samples = timelineRef.current.lastSeconds(PREVIEW_SECONDS);
      const { text } = await apiClient.uploadPreview(createWavBlob(samples, TARGET_SAMPLE_RATE));
      if (stateRef.current.isRecording) {
        setState(prev => ({ ...prev, draft: text }));
      }
    } catch (error) {
      console.warn('Live draft failed', error);
    } finally {
      previewInFlightRef.current = false;
    }
  }, []);

  const onTick = useCallback(() => {
    const timeline = timelineRef.current;
    setElapsed(timeline.durationSeconds);

    if (timeline.pendingSamples >= BLOCK_SECONDS * TARGET_SAMPLE_RATE) {
      flushBlock();
    }
    if (clientConfig.liveDraft && timeline.durationSeconds - lastPreviewRef.current >= PREVIEW_SECONDS) {
      lastPreviewRef.current = timeline.durationSeconds;
      void sendPreview();
    }
  }, [flushBlock, sendPreview]);

  const resetSession = (sid: string, title: string) => {
    partsRef.current = [];
    partAudioRef.current.clear();
    nextPartRef.current = 1;
    lastPreviewRef.current = 0;
    timelineRef.current.reset();
    setElapsed(0);
    const next = { ...stateRef.current, sid, title, parts: [], draft: '', insights: null };
    stateRef.current = next;
    setState(prev => ({ ...prev, sid, title, parts: [], draft: '', insights: null }));
  };

  // --- Recording ---

  const handleStart = async () => {
    const title = stateRef.current.title.trim() || DEFAULT_TITLE;
    const startTime = Date.now();
    resetSession(createSessionId(title, new Date(startTime)), title);
    recordedSessionRef.current = true;

    try {
      await recorderRef.current.start(samples => timelineRef.current.push(samples));
    } catch (error) {
      addLog(`Microphone unavailable: ${describeError(error)}`, 'error');
      return;
    }

    stateRef.current = { ...stateRef.current, isRecording: true, startTime };
    setState(prev => ({ ...prev, isRecording: true, startTime }));
    tickRef.current = window.setInterval(onTick, 1000);
    addLog(`Recording session ${stateRef.current.sid ?? ''}.`, 'info');
  };

  const handleStop = async () => {
    if (tickRef.current !== null) {
      window.clearInterval(tickRef.current);
      tickRef.current = null;
    }
    await recorderRef.current.stop();
    stateRef.current = { ...stateRef.current, isRecording: false };
    setState(prev => ({ ...prev, isRecording: false, isBusy: true, draft: '' }));

    try {
      flushBlock();
      await Promise.allSettled([...pendingRef.current]);

      const { sid } = stateRef.current;
      if (!sid) return;
      const timeline = timelineRef.current;

      if (timeline.length > 0) {
        try {
          const saved = await apiClient.saveAudio(createWavBlob(timeline.all(), TARGET_SAMPLE_RATE), 'recording.wav', sid);
          addLog(`Audio saved: ${saved.path ?? sid}`, 'success');
        } catch (error) {
          addLog(`Saving audio failed: ${describeError(error)}`, 'error');
        }
      }

      await publish();
    } finally {
      setState(prev => ({ ...prev, isBusy: false }));
    }
  };

  // Stop the microphone if the page goes away mid-recording
  useEffect(() => () => {
    if (tickRef.current !== null) window.clearInterval(tickRef.current);
    void recorderRef.current.stop();
  }, []);

  // --- Upload ---

  const handleFileSelected = async (file: File) => {
    const title = stateRef.current.title.trim() || titleFromFileName(file.name) || DEFAULT_TITLE;
    resetSession(createSessionId(title, new Date()), title);
    recordedSessionRef.current = false;
    setState(prev => ({ ...prev, isBusy: true }));
    addLog(`Uploading ${file.name} (${(file.size / 1024).toFixed(1)}KB)...`, 'info');

    try {
      const entry: PartAudio = { audio: file, filename: file.name, numbered: false };
      partAudioRef.current.set(1, entry);
      await transcribePart(1, entry);
      await publish();
    } finally {
      setState(prev => ({ ...prev, isBusy: false }));
    }
  };

  const handleRetry = (part: number) => {
    const entry = partAudioRef.current.get(part);
    if (!entry) return;
    addLog(`Retrying part ${part}...`, 'info');
    const task = transcribePart(part, entry);
    track(task);
    if (!stateRef.current.isRecording) {
      void task.then(publish);
    }
  };

  // --- Export / Clear ---

  const handleExport = () => {
    if (!state.sid) return;
    const saved: SavedSession = {
      sid: state.sid,
      title: state.title,
      parts: state.parts,
      insights: state.insights,
      savedAt: new Date().toISOString()
    };
    const blob = new Blob([JSON.stringify(saved, null, 2)], { type: 'application/json' });
    const url = URL.createObjectURL(blob);
    const a = document.createElement('a');
    a.href = url;
    a.download = `${state.sid}.json`;
    a.click();
    URL.revokeObjectURL(url);
    addLog('Session exported.', 'success');
  };

  const handleClear = () => {
    if (confirm('Clear the saved session from this browser?')) {
      localStorage.removeItem(AUTOSAVE_KEY);
      partsRef.current = [];
      partAudioRef.current.clear();
      setState(prev => ({ ...initialState, logs: [...prev.logs, { timestamp: Date.now(), level: 'warn', message: 'Browser auto-save cleared.' }] }));
    }
  };

  const completed = state.parts.filter(p => p.status === PartStatus.COMPLETED).length;
  const status = state.isRecording
    ? 'Recording'
    : state.isBusy
      ? 'Working...'
      : state.sid
        ? `${completed} / ${state.parts.length} parts transcribed`
        : 'Ready';

  // --- Render ---

  return (
    <div className="flex flex-col h-screen bg-gray-900 text-white font-sans">

      {/* Header */}
      <header className="bg-gray-800 border-b border-gray-700 h-16 shrink-0 flex items-center justify-between px-6 z-10">
        <div className="flex items-center gap-3">
          <div className="bg-blue-600 p-2 rounded-lg">
            <AudioLines className="w-5 h-5 text-white" />
          </div>
          <h1 className="text-xl font-bold tracking-tight">{clientConfig.logoName}</h1>
          <span className="text-sm text-gray-500">{status}</span>
        </div>

        <div className="flex items-center gap-4">
          <button
            onClick={handleExport}
            disabled={!state.sid || state.parts.length === 0}
            className="text-gray-400 hover:text-white disabled:opacity-30 transition-colors"
            title="Export session as JSON"
          >
            <Save className="w-5 h-5" />
          </button>

          <button
            onClick={handleClear}
            disabled={state.isRecording || state.isBusy}
            className="text-gray-600 hover:text-red-400 disabled:opacity-30 transition-colors"
            title="Clear browser auto-save"
          >
            <Trash2 className="w-4 h-4" />
          </button>
        </div>
      </header>

      {/* Main Content */}
      <main className="flex-1 flex overflow-hidden">

        {/* Left Panel: controls, parts and activity */}
        <div className="w-1/2 min-w-[350px] max-w-[640px] flex flex-col border-r border-gray-700 bg-[#1e1e1e]">
          <div className="p-4 border-b border-gray-700 bg-gray-800/50 shrink-0 space-y-4">
            <RecorderControls
              title={state.title}
              onTitleChange={title => setState(prev => ({ ...prev, title }))}
              isRecording={state.isRecording}
              isBusy={state.isBusy}
              elapsedSeconds={elapsed}
              onStart={() => void handleStart()}
              onStop={() => void handleStop()}
            />
            <FileUploader
              onFileSelected={file => void handleFileSelected(file)}
              onRejected={name => addLog(`Unsupported file type: ${name}`, 'warn')}
              disabled={state.isRecording || state.isBusy}
            />
          </div>

          <TranscriptView
            parts={state.parts}
            draft={state.draft}
            onRetry={handleRetry}
            canRetry={part => partAudioRef.current.has(part)}
          />

          <div className="h-56 border-t border-gray-700 flex flex-col shrink-0">
            <Terminal logs={state.logs} />
          </div>
        </div>

        {/* Right Panel: AI Insights */}
        <div className="flex-1 bg-gray-900 p-4 relative">
          <InsightsPanel insights={state.insights} isLoading={isSummarizing} />
        </div>

      </main>

      <div className="h-8 bg-gray-800 border-t border-gray-700 flex items-center justify-between px-4 text-xs text-gray-500 shrink-0">
        <span>{state.sid ?? 'No session'}</span>
        <span>Live draft {clientConfig.liveDraft ? 'on' : 'off'}{clientConfig.language ? ` · ${clientConfig.language}` : ''}</span>
      </div>

    </div>
  );
};

export default App;
