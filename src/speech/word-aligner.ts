// word-aligner.ts: token-level resynchronizing aligner
// Complements the character aligner: whole-word substitutions by the
// recognizer ("their" for "there") and skipped words are handled here.

import { isFuzzyMatch } from '../logic/fuzzy';
import { codePointLength, stripToWord } from '../logic/normalize';
import { tokenizeReference } from '../logic/tokens';

export const WORD_LOOKAHEAD = 3;

function wordsMatch(a: string, b: string): boolean {
  return a === b || isFuzzyMatch(a, b);
}

/**
 * Returns the number of code points of `referenceWindow` the spoken words
 * account for. Each passed script word contributes its length plus one for
 * the following space (none after the last word), so the value is directly
 * comparable with {@link alignCharacters}.
 */
export function alignWords(referenceWindow: string, spokenText: string): number {
  const sourceTokens = tokenizeReference(referenceWindow);
  const sourceWords = sourceTokens.map((tok) => tok.text);
  const spokenWords = String(spokenText || '').toLowerCase().split(/\s+/).filter(Boolean);
  const lastIdx = sourceWords.length - 1;

  // length of script word i plus its trailing space
  const span = (i: number): number => codePointLength(sourceWords[i]) + (i < lastIdx ? 1 : 0);

  let si = 0;
  let ri = 0;
  let matched = 0;

  while (si < sourceWords.length && ri < spokenWords.length) {
    if (sourceTokens[si].isAnnotation) {
      matched += span(si);
      si++;
      continue;
    }

    const srcWord = stripToWord(sourceWords[si]);
    const spkWord = stripToWord(spokenWords[ri]);

    if (wordsMatch(srcWord, spkWord)) {
      matched += span(si);
      si++;
      ri++;
      continue;
    }

    // recognizer inserted words: skip ahead in the spoken stream
    let resynced = false;
    const maxSpkSkip = Math.min(WORD_LOOKAHEAD, spokenWords.length - ri - 1);
    for (let skip = 1; skip <= maxSpkSkip; skip++) {
      if (wordsMatch(srcWord, stripToWord(spokenWords[ri + skip]))) {
        ri += skip;
        resynced = true;
        break;
      }
    }
    if (resynced) continue;

    // reader jumped ahead or recognizer dropped words: skip script words
    const maxSrcSkip = Math.min(WORD_LOOKAHEAD, sourceWords.length - si - 1);
    for (let skip = 1; skip <= maxSrcSkip; skip++) {
      if (wordsMatch(stripToWord(sourceWords[si + skip]), spkWord)) {
        for (let s = 0; s < skip; s++) matched += codePointLength(sourceWords[si + s]) + 1;
        si += skip;
        resynced = true;
        break;
      }
    }
    if (resynced) continue;

    ri++;
  }

  while (si < sourceTokens.length && sourceTokens[si].isAnnotation) {
    matched += span(si);
    si++;
  }

  return matched;
}

export default alignWords;
