/**
 * Jellyfin API client
 * Auth via X-Emby-Token. Reads are user-scoped so UserData.Played reflects
 * the configured user; the only writes are played/unplayed markers.
 */

import { AdapterError } from '../../shared/errors.js';
import { silentLogger, type Logger } from '../../shared/logger.js';
import type { ReconcilarrConfig } from '../../shared/types.js';
import {
  asObjectArray,
  isObject,
  requestJson,
  requestNoContent,
  requireObject,
  toInt,
  toStringSafe,
  type HttpMethod,
  type JsonObject,
} from '../http.js';

const DEFAULT_BATCH_SIZE = 250;
const CACHE_TTL_MS = 30_000; // responses for idempotent reads are reused for 30s

const ITEM_FIELDS = 'Path,MediaSources,ProductionYear,DateCreated';

interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export interface JfMediaSource {
  Id: string;
  Path?: string;
}

export interface JfItem {
  Id: string;
  Name: string;
  Type: string;
  ProductionYear?: number;
  DateCreated?: string;         // ISO 8601, UTC
  Path?: string;
  ParentIndexNumber?: number;   // season
  IndexNumber?: number;         // episode
  MediaSources: JfMediaSource[];
  UserData?: {
    Played: boolean;
    PlayCount?: number;
  };
}

export type JfItemType = 'Movie' | 'Series' | 'Episode';

export interface JellyfinClientOptions {
  batchSize?: number;
  logger?: Logger;
}

function optionalString(value: unknown): string | undefined {
  const s = toStringSafe(value);
  return s ? s : undefined;
}

/** Validate one entry of an Items response */
export function parseJfItem(raw: JsonObject): JfItem | undefined {
  const id = toStringSafe(raw.Id);
  if (!id) return undefined;
  const userData = isObject(raw.UserData) ? raw.UserData : undefined;
  return {
    Id: id,
    Name: toStringSafe(raw.Name),
    Type: toStringSafe(raw.Type),
    ProductionYear: toInt(raw.ProductionYear),
    DateCreated: optionalString(raw.DateCreated),
    Path: optionalString(raw.Path),
    ParentIndexNumber: toInt(raw.ParentIndexNumber),
    IndexNumber: toInt(raw.IndexNumber),
    MediaSources: asObjectArray(raw.MediaSources).map((s) => ({
      Id: toStringSafe(s.Id),
      Path: optionalString(s.Path),
    })),
    UserData: userData
      ? { Played: userData.Played === true, PlayCount: toInt(userData.PlayCount) }
      : undefined,
  };
}

export class JellyfinClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly userName: string;
  private readonly timeoutMs: number;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private userId?: string;
  private cache = new Map<string, CacheEntry<unknown>>();

  constructor(config: Pick<ReconcilarrConfig, 'jellyfin' | 'http'>, opts: JellyfinClientOptions = {}) {
    this.baseUrl = config.jellyfin.url.replace(/\/$/, '');
    this.apiKey = config.jellyfin.apiKey;
    this.userName = config.jellyfin.user;
    this.userId = config.jellyfin.userId;
    this.timeoutMs = config.http.timeoutMs;
    this.batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
    this.logger = opts.logger ?? silentLogger;
  }

  // ──────────────────────────────────────────────────────────────────
  // Users
  // ──────────────────────────────────────────────────────────────────

  /** Configured user id, or the id of the user whose name matches (case-insensitive) */
  async getUserId(): Promise<string> {
    if (this.userId) return this.userId;

    const data = await this.get('/Users', true);
    if (!Array.isArray(data)) throw new AdapterError('jellyfin', 'Malformed response: expected a user list');

    const wanted = this.userName.toLowerCase();
    const user = asObjectArray(data).find((u) => toStringSafe(u.Name).toLowerCase() === wanted);
    const id = user ? toStringSafe(user.Id) : '';
    if (!id) throw new AdapterError('jellyfin', `User "${this.userName}" not found`);

    this.userId = id;
    return id;
  }

  // ──────────────────────────────────────────────────────────────────
  // Items (batched)
  // ──────────────────────────────────────────────────────────────────

  async getItems(type: JfItemType, opts: { parentId?: string } = {}): Promise<JfItem[]> {
    const userId = await this.getUserId();
    const items: JfItem[] = [];
    let startIndex = 0;

    while (true) {
      const qs = new URLSearchParams({
        IncludeItemTypes: type,
        Recursive: 'true',
        Fields: ITEM_FIELDS,
        SortBy: type === 'Episode' ? 'ParentIndexNumber,IndexNumber' : 'SortName',
        SortOrder: 'Ascending',
        StartIndex: String(startIndex),
        Limit: String(this.batchSize),
      });
      if (opts.parentId) qs.set('ParentId', opts.parentId);

      const data = requireObject('jellyfin', await this.get(`/Users/${userId}/Items?${qs}`, true), 'an Items page');
      const page = asObjectArray(data.Items);
      for (const raw of page) {
        const item = parseJfItem(raw);
        if (item) items.push(item);
      }

      // Without a total, keep going while pages come back full
      const total = toInt(data.TotalRecordCount);
      startIndex += this.batchSize;
      if (page.length === 0) break;
      if (total == null ? page.length < this.batchSize : startIndex >= total) break;
    }

    return items;
  }

  // ──────────────────────────────────────────────────────────────────
  // Played state
  // ──────────────────────────────────────────────────────────────────

  async setPlayed(itemId: string, played: boolean): Promise<void> {
    const userId = await this.getUserId();
    await this.send(played ? 'POST' : 'DELETE', `/Users/${userId}/PlayedItems/${encodeURIComponent(itemId)}`);
    this.clearCache();
  }

  // ──────────────────────────────────────────────────────────────────
  // HTTP transport
  // ──────────────────────────────────────────────────────────────────

  private url(apiPath: string): string {
    return `${this.baseUrl}${apiPath.startsWith('/') ? '' : '/'}${apiPath}`;
  }

  private async get(apiPath: string, cacheable = false): Promise<unknown> {
    // Return cached response if still fresh
    if (cacheable) {
      const entry = this.cache.get(apiPath);
      if (entry && entry.expiresAt > Date.now()) return entry.data;
    }

    const data = await requestJson({
      server: 'jellyfin',
      url: this.url(apiPath),
      headers: { 'X-Emby-Token': this.apiKey },
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });

    if (cacheable) {
      this.cache.set(apiPath, { data, expiresAt: Date.now() + CACHE_TTL_MS });
    }
    return data;
  }

  private async send(method: HttpMethod, apiPath: string): Promise<void> {
    await requestNoContent({
      server: 'jellyfin',
      url: this.url(apiPath),
      method,
      headers: { 'X-Emby-Token': this.apiKey },
      timeoutMs: this.timeoutMs,
      logger: this.logger,
    });
  }

  /** Clear the internal response cache (after a write) */
  clearCache(): void {
    this.cache.clear();
  }
}
