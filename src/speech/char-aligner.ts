// char-aligner.ts: character-level resynchronizing aligner
// Walks the script window and the recognized text with two pointers, skipping
// punctuation/whitespace on either side. A mismatch first tries to resync by
// looking a few characters ahead in the recognized text (extra characters),
// then in the script (dropped characters); otherwise it is taken as a
// one-for-one substitution.

import { isWordChar, normalize } from '../logic/normalize';

export const CHAR_LOOKAHEAD = 3;

function findAhead(stream: string[], from: number, target: string, maxSkip: number): number {
  const limit = Math.min(maxSkip, stream.length - from - 1);
  for (let skip = 1; skip <= limit; skip++) {
    if (stream[from + skip] === target) return from + skip;
  }
  return -1;
}

/**
 * @param referenceWindow script text starting at the match start offset (original case/punctuation)
 * @param spokenText raw recognizer transcript
 * @returns code points of `referenceWindow` covered by the furthest good match
 */
export function alignCharacters(referenceWindow: string, spokenText: string): number {
  // per-code-point lowercase keeps indices aligned with the original window
  const src = Array.from(referenceWindow).map((ch) => ch.toLowerCase());
  const spk = Array.from(normalize(spokenText));

  let si = 0;
  let ri = 0;
  let lastGood = 0;

  while (si < src.length && ri < spk.length) {
    const sc = src[si];
    const rc = spk[ri];

    if (!isWordChar(sc)) {
      si++;
      continue;
    }
    if (!isWordChar(rc)) {
      ri++;
      continue;
    }

    if (sc === rc) {
      si++;
      ri++;
      lastGood = si;
      continue;
    }

    const nextRi = findAhead(spk, ri, sc, CHAR_LOOKAHEAD);
    if (nextRi >= 0) {
      ri = nextRi; // realignment only, nothing matched yet
      continue;
    }

    const nextSi = findAhead(src, si, rc, CHAR_LOOKAHEAD);
    if (nextSi >= 0) {
      si = nextSi;
      continue;
    }

    si++;
    ri++;
    lastGood = si;
  }

  return lastGood;
}

export default alignCharacters;
