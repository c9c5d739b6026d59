/**
 * TitleMatcher, no I/O.
 * Constructed with a snapshot of candidate MediaItems, normalised once.
 *
 * Year policy: a candidate is eligible only when its score reaches the
 * threshold AND the years agree (or either side has none). A year mismatch
 * rejects the candidate outright, even with an identical title.
 */

import { validateThreshold } from '../shared/config.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import type { MatchResult, MediaItem } from '../shared/types.js';
import { normalizeTitle, tokenSortKey } from './normalize.js';
import { ratio, ratioUpperBound } from './similarity.js';

export interface MatcherOptions {
  /** Compare normalised titles for equality instead of fuzzy scoring */
  exact?: boolean;
  logger?: Logger;
}

interface PreparedCandidate {
  item: MediaItem;
  base: string;
  sortKey: string;
  keyLength: number;
  year?: number;
}

interface Scored {
  item: MediaItem;
  score: number;
}

export function yearsCompatible(a: number | undefined, b: number | undefined): boolean {
  return a == null || b == null || a === b;
}

function prepare(item: MediaItem): PreparedCandidate {
  const norm = normalizeTitle(item.title);
  const sortKey = tokenSortKey(norm.base);
  return {
    item,
    base: norm.base,
    sortKey,
    keyLength: [...sortKey].length,
    year: item.year ?? norm.year,
  };
}

export class TitleMatcher {
  private readonly candidates: PreparedCandidate[];
  private readonly exact: boolean;
  private readonly logger: Logger;

  constructor(candidates: readonly MediaItem[], opts: MatcherOptions = {}) {
    this.candidates = candidates.map(prepare);
    this.exact = opts.exact ?? false;
    this.logger = opts.logger ?? silentLogger;
  }

  get size(): number {
    return this.candidates.length;
  }

  match(queryTitle: string, queryYear: number | undefined, threshold: number): MatchResult {
    validateThreshold(threshold);

    const norm = normalizeTitle(queryTitle);
    const year = queryYear ?? norm.year;
    const sortKey = tokenSortKey(norm.base);
    const keyLength = [...sortKey].length;

    let top: Scored | undefined;
    let best: Scored | undefined;

    for (const c of this.candidates) {
      // Skip pairs that can neither become eligible nor beat the top raw score
      if (!this.exact) {
        const bound = ratioUpperBound(keyLength, c.keyLength);
        if (bound < threshold && top && bound <= top.score) continue;
      }

      const equal = norm.base === c.base;
      const score = this.exact ? (equal ? 100 : 0) : ratio(sortKey, c.sortKey);

      if (!top || score > top.score) top = { item: c.item, score };

      // Exact mode only ever accepts equal titles, whatever the threshold
      const passes = this.exact ? equal : score >= threshold;
      if (passes && yearsCompatible(year, c.year) && (!best || score > best.score)) {
        best = { item: c.item, score };
      }
    }

    if (best) {
      return { query: queryTitle, bestCandidate: best.item, score: best.score, matched: true };
    }

    if (top) {
      this.logger.debug(
        `no match for "${queryTitle}"${year != null ? ` (${year})` : ''}: ` +
        `closest "${top.item.title}"${top.item.year != null ? ` (${top.item.year})` : ''} ` +
        `scored ${top.score.toFixed(1)}`
      );
    }
    return { query: queryTitle, bestCandidate: top?.item, score: top?.score ?? 0, matched: false };
  }
}

/**
 * One-off lookup. Use a TitleMatcher directly when matching many queries
 * against the same candidates.
 */
export function findMatch(
  queryTitle: string,
  queryYear: number | undefined,
  candidates: readonly MediaItem[],
  threshold: number,
  opts: MatcherOptions = {}
): MatchResult {
  return new TitleMatcher(candidates, opts).match(queryTitle, queryYear, threshold);
}
