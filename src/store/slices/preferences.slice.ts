import { ValidationError } from '@/lib/errors';
import { themeNameSchema } from '@/lib/validators';
import type { ThemeName } from '@/types';

import type { StoreSetter } from '../types';

export interface PreferencesSlice {
  theme: ThemeName;
  setTheme: (theme: unknown) => ThemeName;
}

interface CreatePreferencesSliceParams {
  set: StoreSetter<PreferencesSlice>;
  initialTheme: ThemeName;
}

export const createPreferencesSlice = ({
  set,
  initialTheme,
}: CreatePreferencesSliceParams): PreferencesSlice => ({
  theme: initialTheme,

  setTheme: (value: unknown): ThemeName => {
    const result = themeNameSchema.safeParse(value);
    if (!result.success) {
      throw new ValidationError('Invalid theme', result.error.flatten());
    }
    set({ theme: result.data });
    return result.data;
  },
});
