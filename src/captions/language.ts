// Source-language resolution for committed caption text.
// An explicit setting wins; 'auto' falls back to a light script/hint-word
// heuristic, then to the recognizer locale.

import { languageRoot } from '../translate/translator';

const TURKISH_LETTERS = /[ğüşöçıİĞÜŞÖÇ]/;
const TURKISH_HINTS = new Set(['bir', 've', 'için', 'de', 'bu', 'şu', 'çok', 'ama', 'çünkü', 'ile']);

export type LanguageSettings = {
  sourceLanguage: string;
  locale: string;
};

export function detectLanguageHeuristic(text: string): string | undefined {
  if (TURKISH_LETTERS.test(text)) return 'tr';
  const hits = text.toLowerCase().split(/\s+/).filter((w) => TURKISH_HINTS.has(w)).length;
  return hits >= 2 ? 'tr' : undefined;
}

export function resolveSourceLanguage(text: string, settings: LanguageSettings): string | undefined {
  if (settings.sourceLanguage && settings.sourceLanguage !== 'auto') return settings.sourceLanguage;
  return detectLanguageHeuristic(text) ?? languageRoot(settings.locale);
}
