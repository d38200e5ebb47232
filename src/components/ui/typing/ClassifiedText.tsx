import React from 'react';

import { toCharacters } from '@/lib/typing';
import type { CharacterClassification, ThemePalette } from '@/types';

interface ClassifiedTextProps {
  text: string;
  classifications: readonly CharacterClassification[];
  palette: ThemePalette;
}

export function ClassifiedText({ text, classifications, palette }: ClassifiedTextProps): JSX.Element {
  const characters = toCharacters(text);

  return (
    <p aria-label="Typed text feedback" className="font-mono text-lg whitespace-pre-wrap break-words min-h-[1.75rem]">
      {characters.map((char, index) => {
        const classification = classifications[index] ?? 'extra';
        return (
          <span key={index} data-classification={classification} className={palette[classification]}>
            {char}
          </span>
        );
      })}
    </p>
  );
}
