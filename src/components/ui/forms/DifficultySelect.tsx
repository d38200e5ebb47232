import React from 'react';

import { DIFFICULTY_LABELS } from '@/config/typing.config';
import { DIFFICULTIES, type Difficulty } from '@/types';

interface DifficultySelectProps {
  value: Difficulty;
  available: readonly Difficulty[];
  disabled?: boolean;
  onChange: (value: string) => void;
  className?: string;
}

export function DifficultySelect({
  value,
  available,
  disabled = false,
  onChange,
  className = '',
}: DifficultySelectProps): JSX.Element {
  return (
    <label className="flex items-center gap-2 font-bold">
      <span className="sr-only">Difficulty</span>
      <select
        aria-label="Difficulty"
        value={value}
        disabled={disabled}
        onChange={(event) => onChange(event.target.value)}
        className={`rounded-lg px-3 py-2 font-bold ${className}`}
      >
        {DIFFICULTIES.map((difficulty) => (
          <option key={difficulty} value={difficulty} disabled={!available.includes(difficulty)}>
            {DIFFICULTY_LABELS[difficulty]}
          </option>
        ))}
      </select>
    </label>
  );
}
