export type { AppStore, CreateAppStoreOptions } from './create-app-store';
export { createAppStore } from './create-app-store';
export { AppStoreProvider, useAppStore, useAppStoreApi } from './providers/app-store-provider';
export type { TypingSessionView } from './slices/typing-session.slice';
