import React from 'react';

import type { SessionStatus } from '@/types';

interface TypingControlsProps {
  status: SessionStatus | null;
  startDisabled?: boolean;
  onStart: () => void;
  onReset: () => void;
}

export function TypingControls({
  status,
  startDisabled = false,
  onStart,
  onReset,
}: TypingControlsProps): JSX.Element {
  return (
    <div className="flex justify-center gap-4">
      <button
        type="button"
        onClick={onStart}
        disabled={startDisabled || status === 'finished'}
        className="px-8 py-4 bg-neutral-800 text-white text-lg font-bold rounded-xl hover:bg-neutral-700 disabled:opacity-40"
      >
        Start Test
      </button>
      <button
        type="button"
        onClick={onReset}
        disabled={status !== 'running'}
        className="px-8 py-4 bg-neutral-200 text-neutral-800 text-lg font-bold rounded-xl hover:bg-neutral-300 disabled:opacity-40"
      >
        Reset Test
      </button>
    </div>
  );
}
