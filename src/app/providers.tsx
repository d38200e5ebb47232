'use client';

import type { ReactNode } from 'react';
import React from 'react';

import { ErrorBoundary } from '@/components/ui/layouts/ErrorBoundary';
import { AppStoreProvider } from '@/store';
import type { SentenceCorpus } from '@/types';

interface ProvidersProps {
  readonly children: ReactNode;
  readonly corpus: SentenceCorpus;
}

export function Providers({ children, corpus }: ProvidersProps): JSX.Element {
  return (
    <ErrorBoundary>
      <AppStoreProvider corpus={corpus}>{children}</AppStoreProvider>
    </ErrorBoundary>
  );
}
