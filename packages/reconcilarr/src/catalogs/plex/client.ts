/**
 * Plex Media Server client (JSON API)
 * Auth via X-Plex-Token. Writes are scrobble / unscrobble and the library date edit.
 */

import { AdapterError } from '../../shared/errors.js';
import { silentLogger, type Logger } from '../../shared/logger.js';
import type { ReconcilarrConfig } from '../../shared/types.js';
import {
  asObjectArray,
  isObject,
  requestJson,
  requestNoContent,
  toInt,
  toStringSafe,
  type JsonObject,
} from '../http.js';

const LIBRARY_IDENTIFIER = 'com.plexapp.plugins.library';

export type PlexSectionType = 'movie' | 'show';

export interface PlexSection {
  key: string;
  title: string;
  type?: string;
}

export interface PlexMedia {
  files: string[];
}

export interface PlexMetadata {
  ratingKey: string;
  title: string;
  type?: string;
  year?: number;
  index?: number;             // episodes: episode number
  parentIndex?: number;       // episodes: season number
  addedAt?: number;           // epoch seconds
  viewCount: number;
  leafCount?: number;         // shows: episode count
  viewedLeafCount?: number;   // shows: watched episode count
  media: PlexMedia[];
}

export function parsePlexMetadata(raw: JsonObject): PlexMetadata | undefined {
  const ratingKey = toStringSafe(raw.ratingKey).trim();
  if (!ratingKey) return undefined;
  return {
    ratingKey,
    title: toStringSafe(raw.title),
    type: toStringSafe(raw.type) || undefined,
    year: toInt(raw.year),
    index: toInt(raw.index),
    parentIndex: toInt(raw.parentIndex),
    addedAt: toInt(raw.addedAt),
    viewCount: toInt(raw.viewCount) ?? 0,
    leafCount: toInt(raw.leafCount),
    viewedLeafCount: toInt(raw.viewedLeafCount),
    media: asObjectArray(raw.Media).map((m) => ({
      files: asObjectArray(m.Part)
        .map((p) => toStringSafe(p.file))
        .filter(Boolean),
    })),
  };
}

export class PlexClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(config: Pick<ReconcilarrConfig, 'plex' | 'http'>, logger: Logger = silentLogger) {
    this.baseUrl = config.plex.url.replace(/\/$/, '');
    this.token = config.plex.token;
    this.timeoutMs = config.http.timeoutMs;
    this.logger = logger;
  }

  async getSections(): Promise<PlexSection[]> {
    const container = await this.getContainer('/library/sections');
    return asObjectArray(container.Directory)
      .map((d) => ({
        key: toStringSafe(d.key).trim(),
        title: toStringSafe(d.title).trim(),
        type: typeof d.type === 'string' ? d.type.trim() : undefined,
      }))
      .filter((d) => d.key && d.title);
  }

  /**
   * Sections of a given type, optionally limited to the named ones.
   * A configured name that does not exist is an error.
   */
  async getSectionsOfType(type: PlexSectionType, only: readonly string[] = []): Promise<PlexSection[]> {
    const sections = (await this.getSections()).filter((s) => s.type === type);
    if (only.length === 0) return sections;

    return only.map((name) => {
      const found = sections.find((s) => s.title.toLowerCase() === name.toLowerCase());
      if (!found) throw new AdapterError('plex', `Library section not found: ${name}`);
      return found;
    });
  }

  async getSectionItems(sectionKey: string): Promise<PlexMetadata[]> {
    const container = await this.getContainer(`/library/sections/${encodeURIComponent(sectionKey)}/all`);
    return this.metadataList(container);
  }

  /** Every episode of a show, in season/episode order */
  async getEpisodes(showRatingKey: string): Promise<PlexMetadata[]> {
    const container = await this.getContainer(`/library/metadata/${encodeURIComponent(showRatingKey)}/allLeaves`);
    return this.metadataList(container);
  }

  async setWatched(ratingKey: string, watched: boolean): Promise<void> {
    const qs = new URLSearchParams({ key: ratingKey, identifier: LIBRARY_IDENTIFIER });
    await requestNoContent({
      server: 'plex',
      url: `${this.baseUrl}/:/${watched ? 'scrobble' : 'unscrobble'}?${qs}`,
      headers: { 'X-Plex-Token': this.token },
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });
  }

  /** Library section an item lives in, needed to edit its fields */
  async getLibrarySectionId(ratingKey: string): Promise<string> {
    const container = await this.getContainer(`/library/metadata/${encodeURIComponent(ratingKey)}`);
    const [item] = asObjectArray(container.Metadata);
    const id = toStringSafe(item?.librarySectionID ?? container.librarySectionID).trim();
    if (!id) throw new AdapterError('plex', `No library section for item ${ratingKey}`);
    return id;
  }

  /** Overwrite (and lock) the date a movie was added to the library */
  async setAddedAt(ratingKey: string, addedAt: Date): Promise<void> {
    const sectionId = await this.getLibrarySectionId(ratingKey);
    const qs = new URLSearchParams({
      type: '1',
      id: ratingKey,
      'addedAt.value': String(Math.round(addedAt.getTime() / 1000)),
      'addedAt.locked': '1',
    });
    await requestNoContent({
      server: 'plex',
      url: `${this.baseUrl}/library/sections/${encodeURIComponent(sectionId)}/all?${qs}`,
      method: 'PUT',
      headers: { 'X-Plex-Token': this.token },
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });
  }

  // ──────────────────────────────────────────────────────────────────
  // HTTP transport
  // ──────────────────────────────────────────────────────────────────

  private metadataList(container: JsonObject): PlexMetadata[] {
    // Plex returns items under Metadata, older servers under Video / Directory
    const raw = container.Metadata ?? container.Video ?? container.Directory;
    return asObjectArray(raw)
      .map(parsePlexMetadata)
      .filter((m): m is PlexMetadata => m !== undefined);
  }

  private async getContainer(apiPath: string): Promise<JsonObject> {
    const data = await requestJson({
      server: 'plex',
      url: `${this.baseUrl}${apiPath}`,
      headers: { 'X-Plex-Token': this.token },
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });
    if (!isObject(data) || !isObject(data.MediaContainer)) {
      throw new AdapterError('plex', `Malformed response from ${apiPath}: missing MediaContainer`);
    }
    return data.MediaContainer;
  }
}
