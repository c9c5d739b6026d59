/**
 * Fuzzy string similarity on a 0..100 scale.
 * ratio() is the indel similarity 200·LCS / (|a| + |b|); tokenSortRatio()
 * applies it to the token-sorted strings.
 */

import { tokenSortKey } from './normalize.js';

/** Length of the longest common subsequence, two rolling rows */
export function lcsLength(a: string, b: string): number {
  const xs = [...a];
  const ys = [...b];
  if (xs.length === 0 || ys.length === 0) return 0;

  let prev = new Array<number>(ys.length + 1).fill(0);
  let curr = new Array<number>(ys.length + 1).fill(0);

  for (let i = 1; i <= xs.length; i++) {
    for (let j = 1; j <= ys.length; j++) {
      curr[j] = xs[i - 1] === ys[j - 1]
        ? prev[j - 1] + 1
        : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[ys.length];
}

export function ratio(a: string, b: string): number {
  if (a === b) return 100;
  if (a.length === 0 || b.length === 0) return 0;
  const total = [...a].length + [...b].length;
  return (200 * lcsLength(a, b)) / total;
}

export function tokenSortRatio(a: string, b: string): number {
  return ratio(tokenSortKey(a), tokenSortKey(b));
}

/**
 * Best score ratio() could reach for strings of these lengths.
 * Used to skip candidates that cannot matter.
 */
export function ratioUpperBound(lenA: number, lenB: number): number {
  if (lenA === 0 && lenB === 0) return 100;
  if (lenA === 0 || lenB === 0) return 0;
  return (200 * Math.min(lenA, lenB)) / (lenA + lenB);
}
