'use client';

import React, { useEffect } from 'react';

interface RouteErrorProps {
  error: Error & { digest?: string };
  reset: () => void;
}

export default function RouteError({ error, reset }: RouteErrorProps): JSX.Element {
  useEffect(() => {
    console.error('[TypingTest] Failed to load the typing test', error);
  }, [error]);

  return (
    <div className="min-h-screen bg-neutral-100 flex items-center justify-center p-6">
      <div role="alert" className="max-w-md w-full bg-white rounded-2xl shadow-xl p-8 text-center space-y-4">
        <h1 className="text-2xl font-semibold text-neutral-800">Sentences could not be loaded</h1>
        <p className="text-sm text-neutral-600">
          The sentence file is missing or malformed. Check the server logs and try again.
        </p>
        {error.digest && <p className="text-xs font-mono text-neutral-400">Reference: {error.digest}</p>}
        <button
          type="button"
          onClick={reset}
          className="w-full rounded-lg bg-neutral-800 px-4 py-2 text-sm font-semibold text-white hover:bg-neutral-700"
        >
          Retry
        </button>
      </div>
    </div>
  );
}
