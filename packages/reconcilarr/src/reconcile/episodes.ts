/**
 * Episode pairing for matched shows
 * Episodes are keyed on (season, episode number); titles are ignored.
 */

import type { EpisodeItem, EpisodePair } from '../shared/types.js';

function episodeKey(ep: EpisodeItem): string | undefined {
  if (ep.season == null || ep.episode == null) return undefined;
  return `${ep.season}x${ep.episode}`;
}

/** "S01E02", or "S?E?" when a number is missing */
export function episodeCode(ep: EpisodeItem): string {
  const pad = (n: number | undefined) => (n != null ? String(n).padStart(2, '0') : '?');
  return `S${pad(ep.season)}E${pad(ep.episode)}`;
}

export interface EpisodePairing {
  pairs: EpisodePair[];
  /** Source episodes with no number, or no counterpart in the target */
  unpaired: EpisodeItem[];
}

/** Pairs in source order; the first target episode with a key wins */
export function pairEpisodes(source: readonly EpisodeItem[], target: readonly EpisodeItem[]): EpisodePairing {
  const byKey = new Map<string, EpisodeItem>();
  for (const ep of target) {
    const key = episodeKey(ep);
    if (key && !byKey.has(key)) byKey.set(key, ep);
  }

  const result: EpisodePairing = { pairs: [], unpaired: [] };
  for (const ep of source) {
    const key = episodeKey(ep);
    const match = key ? byKey.get(key) : undefined;
    if (match) {
      result.pairs.push({ source: ep, target: match });
    } else {
      result.unpaired.push(ep);
    }
  }
  return result;
}
