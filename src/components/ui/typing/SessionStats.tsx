import React from 'react';

import { formatClock } from '@/lib/typing';

interface SessionStatsProps {
  liveWpm: number;
  remainingSeconds: number;
  className?: string;
}

export function SessionStats({ liveWpm, remainingSeconds, className = '' }: SessionStatsProps): JSX.Element {
  return (
    <div className={`flex gap-6 rounded-xl px-4 py-2 select-none ${className}`}>
      <div className="flex flex-col items-center">
        <span className="text-[10px] font-bold uppercase tracking-widest">WPM</span>
        <span data-testid="live-wpm" className="text-xl font-bold">
          {Math.round(liveWpm)}
        </span>
      </div>
      <div className="flex flex-col items-center">
        <span className="text-[10px] font-bold uppercase tracking-widest">Time Left</span>
        <span data-testid="time-left" className="text-xl font-bold">
          {formatClock(remainingSeconds)}
        </span>
      </div>
    </div>
  );
}
