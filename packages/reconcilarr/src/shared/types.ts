/**
 * Reconcilarr shared types
 * Backend-agnostic - adapters convert to these shapes at the boundary
 */

// ============================================================================
// Configuration
// ============================================================================

export interface ReconcilarrConfig {
  plex: {
    url: string;
    token: string;
    movieSections: string[];  // empty = every section of type movie
    showSections: string[];   // empty = every section of type show
  };

  jellyfin: {
    url: string;
    apiKey: string;
    user: string;
    userId?: string;  // skips the /Users lookup when set
  };

  matching: {
    threshold: number;  // 0..100
  };

  http: {
    timeoutMs: number;
  };
}

// ============================================================================
// Catalog records
// ============================================================================

export type ServerName = 'plex' | 'jellyfin';

export const SERVER_NAMES: readonly ServerName[] = ['plex', 'jellyfin'];

export type MediaKind = 'movie' | 'show';

/** CLI spelling of a MediaKind */
export type LibraryName = 'movies' | 'tv';

export interface MediaItem {
  id: string;            // backend-native, opaque
  title: string;
  year?: number;
  kind: MediaKind;
  paths: string[];       // shows: the show folder of the first episode
  watched: boolean;      // shows: every episode watched
  partCount: number;     // >= 1; > 1 means combined versions
  addedAt?: Date;        // when the server added it to the library
  episodes?: EpisodeItem[];  // shows only, in season/episode order
}

/** One episode of a show; matched across servers by season and number */
export interface EpisodeItem {
  id: string;
  title: string;
  season?: number;
  episode?: number;
  paths: string[];
  watched: boolean;
  partCount: number;
}

/**
 * Backend capability used by every engine. One variant per server,
 * picked by createCatalog() from configuration.
 */
export interface CatalogAdapter {
  readonly server: ServerName;
  listItems(kind: MediaKind): Promise<MediaItem[]>;
  getItem(title: string, kind: MediaKind): Promise<MediaItem | undefined>;
  /** Accepts movie, show and episode ids */
  setWatched(itemId: string, watched: boolean): Promise<void>;
  /** Only servers whose library dates can be edited implement this */
  setAddedAt?(itemId: string, addedAt: Date): Promise<void>;
}

/** Write side of a catalog, all the sync engine needs to apply a plan */
export type SyncWriter = Pick<CatalogAdapter, 'setWatched' | 'setAddedAt'>;

// ============================================================================
// Matching
// ============================================================================

export interface NormalizedTitle {
  base: string;
  year?: number;
}

export interface MatchResult {
  query: string;
  bestCandidate?: MediaItem;
  score: number;       // 0..100
  matched: boolean;    // score >= threshold AND year-compatible
}

/** Source items with no counterpart in the target, in source order */
export type ComparisonReport = MediaItem[];

// ============================================================================
// Sync
// ============================================================================

export interface SyncDirection {
  from: ServerName;
  to: ServerName;
}

export type SyncActionType = 'mark-watched' | 'mark-unwatched' | 'set-added-at';

export interface EpisodePair {
  source: EpisodeItem;
  target: EpisodeItem;
}

export interface WatchedAction {
  action: 'mark-watched' | 'mark-unwatched';
  source: MediaItem;
  target: MediaItem;
  /** Set when the write goes to one episode of the target show */
  episode?: EpisodePair;
}

export interface AddedAtAction {
  action: 'set-added-at';
  source: MediaItem;
  target: MediaItem;
  addedAt: Date;
}

export type SyncAction = WatchedAction | AddedAtAction;

export interface SyncPlan {
  direction: SyncDirection;
  actions: SyncAction[];
  unmatched: MediaItem[];
}
