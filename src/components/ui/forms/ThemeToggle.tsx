import React from 'react';

import type { ThemeName } from '@/types';

const THEMES: readonly { value: ThemeName; label: string }[] = [
  { value: 'light', label: 'Light' },
  { value: 'dark', label: 'Dark' },
];

interface ThemeToggleProps {
  value: ThemeName;
  onChange: (theme: ThemeName) => void;
  activeClassName: string;
}

export function ThemeToggle({ value, onChange, activeClassName }: ThemeToggleProps): JSX.Element {
  return (
    <div role="radiogroup" aria-label="Theme" className="flex gap-2">
      {THEMES.map((theme) => {
        const selected = theme.value === value;
        return (
          <button
            key={theme.value}
            type="button"
            role="radio"
            aria-checked={selected}
            onClick={() => onChange(theme.value)}
            className={`px-4 py-2 rounded-lg text-sm font-bold ${selected ? activeClassName : ''}`}
          >
            {theme.label}
          </button>
        );
      })}
    </div>
  );
}
