/**
 * Cross-catalog comparison
 * Reports every source item without a counterpart in the target.
 * Read-only over both catalogs; source order is preserved.
 */

import { TitleMatcher, type MatcherOptions } from '../matching/engine.js';
import type { ComparisonReport, MediaItem } from '../shared/types.js';

export type CompareOptions = MatcherOptions;

export function compare(
  sourceItems: readonly MediaItem[],
  targetItems: readonly MediaItem[],
  threshold: number,
  opts: CompareOptions = {}
): ComparisonReport {
  const matcher = new TitleMatcher(targetItems, opts);
  const missing: ComparisonReport = [];

  for (const item of sourceItems) {
    const result = matcher.match(item.title, item.year, threshold);
    if (!result.matched) missing.push(item);
  }

  return missing;
}
