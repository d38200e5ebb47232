export { difficultySchema, parseDifficulty } from './difficulty.schema';
export { themeNameSchema, typingPreferencesSchema } from './typing-preferences.schema';
