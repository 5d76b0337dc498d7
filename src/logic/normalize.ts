// src/logic/normalize.ts
// Text canonicalization shared by the aligners and the caption segmenter.

const NON_WORD_CHARS = /[^\p{L}\p{N}\s]/gu;
const WORD_CHAR = /[\p{L}\p{N}]/u;

/**
 * Canonical form used for comparison: lowercase, letters/digits/whitespace only,
 * whitespace runs collapsed to one space. `normalize(normalize(s)) === normalize(s)`.
 */
export function normalize(text: string): string {
  return String(text || '')
    .toLowerCase()
    .replace(NON_WORD_CHARS, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Whitespace-only cleanup. Case and punctuation survive, so the result is still
 * fit for display and for annotation detection.
 */
export function collapseWhitespace(text: string): string {
  return String(text || '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

export function isWordChar(ch: string): boolean {
  return WORD_CHAR.test(ch);
}

// Lowercased letters/digits of a single token ("Fox," -> "fox").
export function stripToWord(token: string): string {
  return Array.from(String(token || '').toLowerCase())
    .filter(isWordChar)
    .join('');
}

export function codePointLength(text: string): number {
  return Array.from(text).length;
}

export default normalize;
