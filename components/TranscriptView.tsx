import React, { useEffect, useRef } from 'react';
import { CheckCircle, Circle, AlertCircle, SkipForward, RefreshCw } from 'lucide-react';
import { PartStatus, type TranscriptPart } from '../types';

interface TranscriptViewProps {
  parts: TranscriptPart[];
  draft: string;
  onRetry: (part: number) => void;
  canRetry: (part: number) => boolean;
}

const getStatusIcon = (status: PartStatus) => {
  switch (status) {
    case PartStatus.COMPLETED: return <CheckCircle className="w-4 h-4 text-green-500" />;
    case PartStatus.PROCESSING: return <RefreshCw className="w-4 h-4 text-blue-500 animate-spin" />;
    case PartStatus.FAILED: return <AlertCircle className="w-4 h-4 text-red-500" />;
    case PartStatus.SKIPPED: return <SkipForward className="w-4 h-4 text-gray-500" />;
    default: return <Circle className="w-4 h-4 text-gray-600" />;
  }
};

export const TranscriptView: React.FC<TranscriptViewProps> = ({ parts, draft, onRetry, canRetry }) => {
  const endRef = useRef<HTMLDivElement>(null);

  // Follow the newest part while recording
  useEffect(() => {
    endRef.current?.scrollIntoView({ behavior: 'smooth', block: 'end' });
  }, [parts.length, draft]);

  return (
    <div className="flex-1 overflow-y-auto bg-gray-900/50 border-y border-gray-700">
      {parts.map(part => {
        const isFailed = part.status === PartStatus.FAILED;

        return (
          <div key={part.part} className="p-3 border-b border-gray-800 hover:bg-gray-800/60">
            <div className="flex items-start justify-between gap-2">
              <div className="flex items-center gap-3 min-w-0 flex-1">
                <div className="shrink-0">{getStatusIcon(part.status)}</div>
                <div className="text-xs font-mono text-gray-400">Part {String(part.part).padStart(3, '0')}</div>
              </div>

              {isFailed && canRetry(part.part) && (
                <button
                  onClick={() => onRetry(part.part)}
                  className="p-1.5 bg-gray-700 hover:bg-gray-600 rounded text-gray-300 hover:text-white transition-colors flex items-center gap-1 text-xs"
                  title="Send this part again"
                >
                  <RefreshCw className="w-3 h-3" />
                  Retry
                </button>
              )}
            </div>

            {part.formatted && (
              <div className="mt-2 ml-7 text-sm text-gray-200 whitespace-pre-wrap leading-relaxed">{part.formatted}</div>
            )}
            {part.status === PartStatus.SKIPPED && (
              <div className="mt-1 ml-7 text-xs text-gray-500">No speech detected</div>
            )}
            {isFailed && part.error && (
              <div className="mt-2 ml-7 text-xs text-red-400 bg-red-900/20 border border-red-900/30 p-2 rounded break-words font-mono">
                <span className="font-semibold select-none">Error: </span>
                {part.error}
              </div>
            )}
          </div>
        );
      })}

      {draft && (
        <div className="p-3 ml-7 text-sm italic text-gray-500">… {draft}</div>
      )}

      {parts.length === 0 && !draft && (
        <div className="p-8 text-center text-gray-500 text-sm">No transcript yet.</div>
      )}
      <div ref={endRef} />
    </div>
  );
};
