'use client';

import { createContext, useContext, useEffect, useRef } from 'react';
import type { ReactNode } from 'react';
import { useStore } from 'zustand';
import type { StoreApi } from 'zustand/vanilla';

import { SentenceBank } from '@/lib/services';
import type { TimerScheduler } from '@/lib/typing';
import type { Clock, RandomSource, SentenceCorpus } from '@/types';

import { createAppStore, type AppStore } from '../create-app-store';

interface AppStoreProviderProps {
  readonly children: ReactNode;
  readonly corpus: SentenceCorpus;
  readonly random?: RandomSource;
  readonly clock?: Clock;
  readonly scheduler?: TimerScheduler;
  readonly durationLimitSeconds?: number;
}

type AppStoreApi = StoreApi<AppStore>;

const StoreContext = createContext<AppStoreApi | null>(null);

export function AppStoreProvider({
  children,
  corpus,
  random,
  clock,
  scheduler,
  durationLimitSeconds,
}: AppStoreProviderProps): JSX.Element {
  const storeRef = useRef<AppStoreApi>();

  if (!storeRef.current) {
    storeRef.current = createAppStore({
      sentenceBank: new SentenceBank(corpus, random),
      clock,
      scheduler,
      durationLimitSeconds,
    });
  }

  useEffect(() => {
    const store = storeRef.current;
    return () => {
      store?.getState().disposeTimer();
    };
  }, []);

  return <StoreContext.Provider value={storeRef.current}>{children}</StoreContext.Provider>;
}

export const useAppStoreApi = (): AppStoreApi => {
  const store = useContext(StoreContext);
  if (!store) {
    throw new Error('useAppStore must be used within an AppStoreProvider.');
  }
  return store;
};

export const useAppStore = <TSelected,>(
  selector: (state: AppStore) => TSelected,
  equalityFn?: (left: TSelected, right: TSelected) => boolean,
): TSelected => useStore(useAppStoreApi(), selector, equalityFn);
