/**
 * Jellyfin catalog adapter
 * Movies map 1:1. Series pull their episodes to find the show folder and
 * the largest number of media sources behind a single episode.
 */

import type { Logger } from '../../shared/logger.js';
import type { CatalogAdapter, EpisodeItem, MediaItem, MediaKind } from '../../shared/types.js';
import { findByTitle } from '../lookup.js';
import { showFolderFromEpisode } from '../paths.js';
import type { JellyfinClient, JfItem } from './client.js';

function itemPaths(item: JfItem): string[] {
  const fromSources = item.MediaSources
    .map((s) => s.Path)
    .filter((p): p is string => Boolean(p));
  if (fromSources.length > 0) return [...new Set(fromSources)];
  return item.Path ? [item.Path] : [];
}

const JF_DATE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?/;

/** "2021-03-04T12:34:56.0000000Z" → Date (UTC, whole seconds) */
export function parseJellyfinDate(raw: string | undefined): Date | undefined {
  const m = raw ? JF_DATE.exec(raw) : null;
  if (!m) return undefined;
  const [, y, mo, d, h, mi, sec] = m;
  return new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(sec ?? 0)));
}

export function jfEpisodeToItem(ep: JfItem): EpisodeItem {
  return {
    id: ep.Id,
    title: ep.Name,
    season: ep.ParentIndexNumber,
    episode: ep.IndexNumber,
    paths: itemPaths(ep),
    watched: ep.UserData?.Played ?? false,
    partCount: Math.max(1, ep.MediaSources.length),
  };
}

export function jfMovieToItem(movie: JfItem): MediaItem {
  return {
    id: movie.Id,
    title: movie.Name,
    year: movie.ProductionYear,
    kind: 'movie',
    paths: itemPaths(movie),
    watched: movie.UserData?.Played ?? false,
    partCount: Math.max(1, movie.MediaSources.length),
    addedAt: parseJellyfinDate(movie.DateCreated),
  };
}

export function jfSeriesToItem(series: JfItem, episodes: JfItem[]): MediaItem {
  const firstPath = episodes.map((ep) => itemPaths(ep)[0]).find(Boolean);
  const watched = episodes.length > 0
    ? episodes.every((ep) => ep.UserData?.Played === true)
    : series.UserData?.Played ?? false;

  return {
    id: series.Id,
    title: series.Name,
    year: series.ProductionYear,
    kind: 'show',
    paths: firstPath ? [showFolderFromEpisode(firstPath)] : [],
    watched,
    partCount: Math.max(1, ...episodes.map((ep) => ep.MediaSources.length)),
    addedAt: parseJellyfinDate(series.DateCreated),
    episodes: episodes.map(jfEpisodeToItem),
  };
}

export class JellyfinCatalog implements CatalogAdapter {
  readonly server = 'jellyfin' as const;

  constructor(private readonly client: JellyfinClient, private readonly logger?: Logger) {}

  async listItems(kind: MediaKind): Promise<MediaItem[]> {
    if (kind === 'movie') {
      const movies = await this.client.getItems('Movie');
      return movies.map(jfMovieToItem);
    }

    const series = await this.client.getItems('Series');
    const shows: MediaItem[] = [];
    for (const s of series) {
      const episodes = await this.client.getItems('Episode', { parentId: s.Id });
      shows.push(jfSeriesToItem(s, episodes));
    }
    this.logger?.debug(`jellyfin: ${shows.length} shows`);
    return shows;
  }

  async getItem(title: string, kind: MediaKind): Promise<MediaItem | undefined> {
    return findByTitle(await this.listItems(kind), title);
  }

  async setWatched(itemId: string, watched: boolean): Promise<void> {
    await this.client.setPlayed(itemId, watched);
  }
}
