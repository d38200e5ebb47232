import React from 'react';

interface TimeProgressProps {
  elapsedSeconds: number;
  limitSeconds: number;
}

export function TimeProgress({ elapsedSeconds, limitSeconds }: TimeProgressProps): JSX.Element {
  const ratio = limitSeconds > 0 ? elapsedSeconds / limitSeconds : 0;
  const percent = Math.min(100, Math.max(0, Math.round(ratio * 100)));
  return (
    <div className="w-full">
      <div className="w-full bg-neutral-300 rounded-full h-2 overflow-hidden">
        <div
          data-testid="time-progress-bar"
          className="bg-neutral-800 h-2 rounded-full transition-all duration-500"
          style={{ width: `${percent}%` }}
        />
      </div>
      <p className="text-xs mt-1 text-right">{percent}% of time used</p>
    </div>
  );
}
