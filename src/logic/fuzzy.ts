// src/logic/fuzzy.ts
// Decides whether a recognized word "counts as" a script word.
// Inputs are expected to be stripped to lowercase letters/digits already.

import { editDistance } from './edit-distance';

function sharedPrefixLength(a: string[], b: string[]): number {
  const limit = Math.min(a.length, b.length);
  let n = 0;
  while (n < limit && a[n] === b[n]) n++;
  return n;
}

export function isFuzzyMatch(a: string, b: string): boolean {
  if (!a || !b) return false;
  if (a === b) return true;
  // phonetic truncation: "not" ~ "notch"
  if (a.startsWith(b) || b.startsWith(a)) return true;
  if (a.includes(b) || b.includes(a)) return true;

  const left = Array.from(a);
  const right = Array.from(b);
  const shorter = Math.min(left.length, right.length);
  const shared = sharedPrefixLength(left, right);
  if (shorter >= 2 && shared >= Math.max(2, Math.floor((shorter * 3) / 5))) return true;

  const dist = editDistance(a, b);
  if (shorter <= 4) return dist <= 1;
  if (shorter <= 8) return dist <= 2;
  return dist <= Math.floor(Math.max(left.length, right.length) / 3);
}

export default isFuzzyMatch;
