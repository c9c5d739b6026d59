/**
 * Title normalisation
 * "Star Wars: A New Hope (1977)" → { base: "star wars a new hope", year: 1977 }
 */

import type { NormalizedTitle } from '../shared/types.js';

const TRAILING_YEAR = /\s*\((\d{4})\)$/;

export function normalizeTitle(raw: string): NormalizedTitle {
  const trimmed = raw.trim();
  const m = TRAILING_YEAR.exec(trimmed);
  const stem = m ? trimmed.slice(0, m.index) : trimmed;

  const base = stem
    .toLowerCase()
    .replace(/\s*&\s*/g, ' and ')          // "Tom & Jerry" and "Tom and Jerry" compare equal
    .replace(/[^\p{L}\p{N}\s]/gu, '')      // strip punctuation
    .replace(/\s+/g, ' ')
    .trim();

  return m ? { base, year: Number(m[1]) } : { base };
}

/** Whitespace tokens sorted, so word order stops mattering */
export function tokenSortKey(base: string): string {
  return base.split(' ').filter(Boolean).sort().join(' ');
}
