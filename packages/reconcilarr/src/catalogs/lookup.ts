import type { MediaItem } from '../shared/types.js';

/** Case-insensitive exact title lookup; first hit wins */
export function findByTitle(items: readonly MediaItem[], title: string): MediaItem | undefined {
  const wanted = title.trim().toLowerCase();
  return items.find((item) => item.title.trim().toLowerCase() === wanted);
}
