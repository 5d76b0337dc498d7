// src/logic/edit-distance.ts

/**
 * Levenshtein distance with unit costs, computed over a single DP row.
 * Works on code points so astral characters count once.
 */
export function editDistance(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (!left.length) return right.length;
  if (!right.length) return left.length;

  const row: number[] = [];
  for (let j = 0; j <= right.length; j++) row.push(j);

  for (let i = 1; i <= left.length; i++) {
    let prev = row[0];
    row[0] = i;
    for (let j = 1; j <= right.length; j++) {
      const temp = row[j];
      row[j] = left[i - 1] === right[j - 1]
        ? prev
        : Math.min(prev, row[j], row[j - 1]) + 1;
      prev = temp;
    }
  }
  return row[right.length];
}

export default editDistance;
