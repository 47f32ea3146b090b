import React from 'react';
import { Sparkles, Loader2 } from 'lucide-react';
import type { Insights } from '../types';

interface InsightsPanelProps {
  insights: Insights | null;
  isLoading: boolean;
}

export const InsightsPanel: React.FC<InsightsPanelProps> = ({ insights, isLoading }) => {
  const isEmpty = !insights || (!insights.summary && insights.notes.length === 0);

  return (
    <div className="flex flex-col h-full bg-[#1e1e1e] rounded-lg border border-gray-700 overflow-hidden">
      <div className="bg-gray-800 px-4 py-2 border-b border-gray-700 flex items-center gap-2">
        <Sparkles className="w-4 h-4 text-blue-400" />
        <span className="text-sm font-semibold text-gray-300">AI Insights</span>
        {isLoading && <Loader2 className="w-4 h-4 text-gray-400 animate-spin ml-auto" />}
      </div>

      <div className="flex-1 overflow-y-auto p-6 space-y-6">
        {isEmpty && !isLoading && (
          <div className="text-gray-500 text-sm">The summary and notes appear here once a recording stops or an upload finishes.</div>
        )}

        {insights?.summary && (
          <section>
            <h2 className="text-xs uppercase tracking-wider text-gray-500 font-semibold mb-2">Summary</h2>
            <p className="text-gray-200 leading-relaxed whitespace-pre-wrap">{insights.summary}</p>
          </section>
        )}

        {insights && insights.notes.length > 0 && (
          <section>
            <h2 className="text-xs uppercase tracking-wider text-gray-500 font-semibold mb-2">Notes</h2>
            <ul className="list-disc pl-5 space-y-1 text-gray-200">
              {insights.notes.map((note, idx) => (
                <li key={idx}>{note}</li>
              ))}
            </ul>
          </section>
        )}
      </div>
    </div>
  );
};
