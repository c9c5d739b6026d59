import type { EpisodeItem, MediaItem } from '../shared/types.js';

/** Items backed by more than one media source ("combined versions") */
export function findDuplicates(items: readonly MediaItem[]): MediaItem[] {
  return items.filter((item) => item.partCount > 1);
}

/** The episodes of a show that have combined versions */
export function combinedEpisodes(show: MediaItem): EpisodeItem[] {
  return (show.episodes ?? []).filter((ep) => ep.partCount > 1);
}
