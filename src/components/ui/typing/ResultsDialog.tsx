'use client';

import React from 'react';

import { formatResultSummary } from '@/lib/typing';
import type { TypingResult } from '@/types';

interface ResultsDialogProps {
  result: TypingResult;
  onAcknowledge: () => void;
}

export function ResultsDialog({ result, onAcknowledge }: ResultsDialogProps): JSX.Element {
  const title = result.finishReason === 'completed' ? 'Test Complete!' : "Time's Up!";

  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center bg-black/60 p-4">
      <div
        role="dialog"
        aria-modal="true"
        aria-labelledby="results-title"
        className="bg-white text-neutral-800 rounded-3xl w-full max-w-md p-8 shadow-2xl"
      >
        <h2 id="results-title" className="text-2xl font-bold text-center mb-6">
          {title}
        </h2>
        <ul className="space-y-2 mb-8 text-center">
          {formatResultSummary(result).map((line) => (
            <li key={line} className="text-lg">
              {line}
            </li>
          ))}
        </ul>
        <button
          type="button"
          autoFocus
          onClick={onAcknowledge}
          className="w-full px-6 py-3 bg-neutral-800 text-white font-semibold rounded-xl hover:bg-neutral-700"
        >
          OK
        </button>
      </div>
    </div>
  );
}
