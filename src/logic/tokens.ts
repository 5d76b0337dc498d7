// src/logic/tokens.ts
// Script/transcript tokenization with annotation detection.

import { codePointLength, stripToWord } from './normalize';

export type Token = {
  text: string;
  offset: number; // code-point offset of the token in its source string
  isAnnotation: boolean;
};

/**
 * Bracketed cues ([pause], [beat]) and tokens with no letter or digit
 * (emoji, lone punctuation) are never required to be spoken.
 */
export function isAnnotationToken(word: string): boolean {
  if (word.startsWith('[') && word.endsWith(']')) return true;
  return stripToWord(word) === '';
}

/**
 * Split on single spaces, the way a whitespace-collapsed script is laid out.
 * Offsets are only exact for collapsed input.
 */
export function tokenizeReference(text: string): Token[] {
  const out: Token[] = [];
  let offset = 0;
  for (const part of text.split(' ')) {
    if (part) {
      out.push({ text: part, offset, isAnnotation: isAnnotationToken(part) });
    }
    offset += codePointLength(part) + 1;
  }
  return out;
}

// Whitespace tokenization for transcripts; punctuation stays attached.
export function splitWords(text: string): string[] {
  return String(text || '').split(/\s+/).filter(Boolean);
}
