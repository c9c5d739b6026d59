/**
 * Plex catalog adapter
 * Reads every configured movie / show section and converts to MediaItem.
 */

import type { Logger } from '../../shared/logger.js';
import type { CatalogAdapter, EpisodeItem, MediaItem, MediaKind, ReconcilarrConfig } from '../../shared/types.js';
import { findByTitle } from '../lookup.js';
import { showFolderFromEpisode } from '../paths.js';
import type { PlexClient, PlexMetadata } from './client.js';

function toDate(epochSeconds: number | undefined): Date | undefined {
  return epochSeconds != null ? new Date(epochSeconds * 1000) : undefined;
}

export function plexEpisodeToItem(ep: PlexMetadata): EpisodeItem {
  return {
    id: ep.ratingKey,
    title: ep.title,
    season: ep.parentIndex,
    episode: ep.index,
    paths: ep.media.flatMap((m) => m.files),
    watched: ep.viewCount > 0,
    partCount: Math.max(1, ep.media.length),
  };
}

export function plexMovieToItem(movie: PlexMetadata): MediaItem {
  return {
    id: movie.ratingKey,
    title: movie.title,
    year: movie.year,
    kind: 'movie',
    paths: movie.media.flatMap((m) => m.files),
    watched: movie.viewCount > 0,
    partCount: Math.max(1, movie.media.length),
    addedAt: toDate(movie.addedAt),
  };
}

export function plexShowToItem(show: PlexMetadata, episodes: PlexMetadata[]): MediaItem {
  const firstPath = episodes.flatMap((ep) => ep.media.flatMap((m) => m.files))[0];
  const leafCount = show.leafCount ?? episodes.length;
  const viewed = show.viewedLeafCount ?? episodes.filter((ep) => ep.viewCount > 0).length;

  return {
    id: show.ratingKey,
    title: show.title,
    year: show.year,
    kind: 'show',
    paths: firstPath ? [showFolderFromEpisode(firstPath)] : [],
    watched: leafCount > 0 && viewed >= leafCount,
    partCount: Math.max(1, ...episodes.map((ep) => ep.media.length)),
    addedAt: toDate(show.addedAt),
    episodes: episodes.map(plexEpisodeToItem),
  };
}

export class PlexCatalog implements CatalogAdapter {
  readonly server = 'plex' as const;

  constructor(
    private readonly client: PlexClient,
    private readonly sections: Pick<ReconcilarrConfig['plex'], 'movieSections' | 'showSections'>,
    private readonly logger?: Logger
  ) {}

  async listItems(kind: MediaKind): Promise<MediaItem[]> {
    const only = kind === 'movie' ? this.sections.movieSections : this.sections.showSections;
    const sections = await this.client.getSectionsOfType(kind, only);
    const items: MediaItem[] = [];

    for (const section of sections) {
      const entries = await this.client.getSectionItems(section.key);
      this.logger?.debug(`plex: ${entries.length} items in "${section.title}"`);

      for (const entry of entries) {
        if (kind === 'movie') {
          items.push(plexMovieToItem(entry));
        } else {
          items.push(plexShowToItem(entry, await this.client.getEpisodes(entry.ratingKey)));
        }
      }
    }
    return items;
  }

  async getItem(title: string, kind: MediaKind): Promise<MediaItem | undefined> {
    return findByTitle(await this.listItems(kind), title);
  }

  async setWatched(itemId: string, watched: boolean): Promise<void> {
    await this.client.setWatched(itemId, watched);
  }

  async setAddedAt(itemId: string, addedAt: Date): Promise<void> {
    await this.client.setAddedAt(itemId, addedAt);
  }
}
