import React, { useEffect, useRef } from 'react';
import type { LogEntry } from '../types';

interface TerminalProps {
  logs: LogEntry[];
}

const LEVEL_STYLES: Record<LogEntry['level'], { color: string; marker: string }> = {
  info: { color: 'text-terminal-text', marker: '> ' },
  success: { color: 'text-terminal-green', marker: '✔ ' },
  warn: { color: 'text-terminal-yellow', marker: '! ' },
  error: { color: 'text-terminal-red', marker: '✖ ' }
};

const formatClock = (timestamp: number) =>
  new Date(timestamp).toLocaleTimeString([], { hour12: false, hour: '2-digit', minute: '2-digit', second: '2-digit' });

export const Terminal: React.FC<TerminalProps> = ({ logs }) => {
  const scrollRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    if (scrollRef.current) {
      scrollRef.current.scrollTop = scrollRef.current.scrollHeight;
    }
  }, [logs]);

  return (
    <div className="bg-terminal-bg flex flex-col h-full font-mono text-xs sm:text-sm">
      <div className="bg-gray-800 px-4 py-1 flex items-center gap-2 border-b border-gray-700 shrink-0">
        <span className="text-xs uppercase tracking-wider text-gray-500 font-semibold select-none">Activity</span>
      </div>
      <div ref={scrollRef} className="flex-1 p-4 overflow-y-auto space-y-1">
        {logs.length === 0 && (
          <div className="text-gray-500 italic">Press Record or upload an audio file.</div>
        )}
        {logs.map((log, idx) => {
          const style = LEVEL_STYLES[log.level];
          return (
            <div key={`${log.timestamp}-${idx}`} className="flex gap-3">
              <span className="text-gray-500 shrink-0 opacity-50">[{formatClock(log.timestamp)}]</span>
              <span className={`${style.color} break-all whitespace-pre-wrap`}>
                {style.marker}
                {log.message}
              </span>
            </div>
          );
        })}
      </div>
    </div>
  );
};
