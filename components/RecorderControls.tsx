import React from 'react';
import { Mic, Square } from 'lucide-react';
import { formatElapsed } from '../services/session';

interface RecorderControlsProps {
  title: string;
  onTitleChange: (title: string) => void;
  isRecording: boolean;
  isBusy: boolean;
  elapsedSeconds: number;
  onStart: () => void;
  onStop: () => void;
}

export const RecorderControls: React.FC<RecorderControlsProps> = ({
  title,
  onTitleChange,
  isRecording,
  isBusy,
  elapsedSeconds,
  onStart,
  onStop
}) => (
  <div className="flex flex-col gap-3">
    <input
      type="text"
      value={title}
      onChange={e => onTitleChange(e.target.value)}
      disabled={isRecording || isBusy}
      placeholder="Session title"
      className="bg-gray-900 border border-gray-600 rounded-md px-3 py-2 text-sm text-white placeholder-gray-500 focus:outline-none focus:border-blue-500 disabled:opacity-50"
    />
    <div className="flex items-center justify-between gap-3">
      <button
        onClick={isRecording ? onStop : onStart}
        disabled={isBusy && !isRecording}
        className={`flex items-center gap-2 px-4 py-2 rounded-md font-medium text-sm transition-all shadow-lg disabled:opacity-40 ${
          isRecording ? 'bg-red-600/90 text-white hover:bg-red-600' : 'bg-green-600/90 text-white hover:bg-green-600'
        }`}
      >
        {isRecording ? (
          <><Square className="w-3 h-3 fill-current" /> Stop</>
        ) : (
          <><Mic className="w-4 h-4" /> Record</>
        )}
      </button>
      <span className={`font-mono text-sm ${isRecording ? 'text-red-400' : 'text-gray-500'}`}>
        {isRecording && <span className="inline-block w-2 h-2 rounded-full bg-red-500 animate-pulse mr-2" />}
        {formatElapsed(elapsedSeconds)}
      </span>
    </div>
  </div>
);
