import { requireServer } from '../shared/config.js';
import { ConfigurationError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import {
  SERVER_NAMES,
  type CatalogAdapter,
  type LibraryName,
  type MediaKind,
  type ReconcilarrConfig,
  type ServerName,
} from '../shared/types.js';
import { JellyfinCatalog } from './jellyfin/adapter.js';
import { JellyfinClient } from './jellyfin/client.js';
import { PlexCatalog } from './plex/adapter.js';
import { PlexClient } from './plex/client.js';

/** Build the adapter for a server; fails before any I/O if it is not configured */
export function createCatalog(
  server: ServerName,
  config: ReconcilarrConfig,
  logger: Logger = silentLogger
): CatalogAdapter {
  requireServer(config, server);
  switch (server) {
    case 'plex':
      return new PlexCatalog(new PlexClient(config, logger), config.plex, logger);
    case 'jellyfin':
      return new JellyfinCatalog(new JellyfinClient(config, { logger }), logger);
  }
}

export function parseServer(raw: string): ServerName {
  const value = raw.trim().toLowerCase();
  const server = SERVER_NAMES.find((s) => s === value);
  if (!server) {
    throw new ConfigurationError(`Unknown server "${raw}". SERVER must be 'plex' or 'jellyfin'.`);
  }
  return server;
}

const LIBRARIES: Record<LibraryName, MediaKind> = {
  movies: 'movie',
  tv: 'show',
};

export function parseLibrary(raw: string): MediaKind {
  const value = raw.trim().toLowerCase();
  if (value === 'movies' || value === 'tv') return LIBRARIES[value];
  throw new ConfigurationError(`Unknown library "${raw}". LIBRARY must be 'movies' or 'tv'.`);
}
