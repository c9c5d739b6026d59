/**
 * Watched-status sync
 * planSync() decides, applySyncPlan() writes. The source catalog is
 * authoritative for the direction being synced: the target's watched flag
 * is set to the source's value, whichever way that goes. Matched shows are
 * synced episode by episode, paired on season and episode number.
 *
 * Each target item is claimed by the first source item that matches it, so
 * a plan never contains two writes to the same target.
 */

import { TitleMatcher } from '../matching/engine.js';
import { ApplyError, ConfigurationError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import {
  SERVER_NAMES,
  type MediaItem,
  type ServerName,
  type SyncAction,
  type SyncDirection,
  type SyncPlan,
  type SyncWriter,
  type WatchedAction,
} from '../shared/types.js';
import { episodeCode, pairEpisodes } from './episodes.js';

/** Library dates closer than this are left alone */
export const ADDED_AT_TOLERANCE_MS = 12 * 60 * 60 * 1000;

export interface SyncOptions {
  logger?: Logger;
  onProgress?: (done: number, total: number) => void;
  /** Also copy movie library dates to the target (planning only) */
  syncAddedAt?: boolean;
}

export interface ApplyFailure {
  action: SyncAction;
  error: ApplyError;
}

export interface ApplyResult {
  applied: SyncAction[];
  failed: ApplyFailure[];
}

function isServerName(value: string): value is ServerName {
  return SERVER_NAMES.some((s) => s === value);
}

/** "plex,jellyfin" → { from: 'plex', to: 'jellyfin' } */
export function parseDirection(raw: string): SyncDirection {
  const parts = raw.toLowerCase().replace(/\s+/g, '').split(',');
  const [from, to] = parts;
  if (parts.length !== 2 || !isServerName(from) || !isServerName(to) || from === to) {
    throw new ConfigurationError(
      `Unknown sync direction "${raw}". Use 'plex,jellyfin' or 'jellyfin,plex'.`
    );
  }
  return { from, to };
}

// ──────────────────────────────────────────────────────────────────
// Planning
// ──────────────────────────────────────────────────────────────────

function watchedType(watched: boolean): WatchedAction['action'] {
  return watched ? 'mark-watched' : 'mark-unwatched';
}

function watchedActions(source: MediaItem, target: MediaItem, logger: Logger): WatchedAction[] {
  if (source.episodes && target.episodes) {
    const { pairs, unpaired } = pairEpisodes(source.episodes, target.episodes);
    if (unpaired.length > 0) {
      logger.debug(`"${source.title}": ${unpaired.length} episode(s) without a counterpart in "${target.title}"`);
    }
    return pairs
      .filter((pair) => pair.source.watched !== pair.target.watched)
      .map((episode): WatchedAction => ({ action: watchedType(episode.source.watched), source, target, episode }));
  }

  if (source.watched === target.watched) return [];
  return [{ action: watchedType(source.watched), source, target }];
}

function addedAtChange(source: MediaItem, target: MediaItem): Date | undefined {
  if (source.kind !== 'movie' || !source.addedAt || !target.addedAt) return undefined;
  const drift = Math.abs(source.addedAt.getTime() - target.addedAt.getTime());
  return drift > ADDED_AT_TOLERANCE_MS ? source.addedAt : undefined;
}

export function planSync(
  direction: SyncDirection,
  itemsFrom: readonly MediaItem[],
  itemsTo: readonly MediaItem[],
  threshold: number,
  opts: SyncOptions = {}
): SyncPlan {
  const logger = opts.logger ?? silentLogger;
  const matcher = new TitleMatcher(itemsTo, { logger });
  const plan: SyncPlan = { direction, actions: [], unmatched: [] };
  const claimed = new Map<string, MediaItem>();

  let done = 0;
  for (const source of itemsFrom) {
    done++;
    opts.onProgress?.(done, itemsFrom.length);

    const result = matcher.match(source.title, source.year, threshold);
    const target = result.bestCandidate;
    if (!result.matched || !target) {
      plan.unmatched.push(source);
      continue;
    }

    const owner = claimed.get(target.id);
    if (owner) {
      logger.debug(`"${source.title}" also matches "${target.title}", already paired with "${owner.title}"`);
      continue;
    }
    claimed.set(target.id, source);

    if (opts.syncAddedAt) {
      const addedAt = addedAtChange(source, target);
      if (addedAt) plan.actions.push({ action: 'set-added-at', source, target, addedAt });
    }
    plan.actions.push(...watchedActions(source, target, logger));
  }

  return plan;
}

// ──────────────────────────────────────────────────────────────────
// Applying
// ──────────────────────────────────────────────────────────────────

/** Id the action writes to: the episode's for episode actions */
export function targetId(action: SyncAction): string {
  return action.action !== 'set-added-at' && action.episode ? action.episode.target.id : action.target.id;
}

/** Target title, with the episode code for episode actions */
export function targetLabel(action: SyncAction): string {
  return action.action !== 'set-added-at' && action.episode
    ? `${action.target.title} ${episodeCode(action.episode.target)}`
    : action.target.title;
}

/** "2021-03-04 12:34" (UTC) */
export function formatAddedAt(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

async function write(action: SyncAction, writer: SyncWriter): Promise<void> {
  const id = targetId(action);
  if (action.action === 'set-added-at') {
    if (!writer.setAddedAt) throw new Error('library dates cannot be edited on this server');
    await writer.setAddedAt(id, action.addedAt);
    return;
  }
  await writer.setWatched(id, action.action === 'mark-watched');
}

function summarize(action: SyncAction, to: ServerName): string {
  if (action.action === 'set-added-at') {
    return `Set added date in ${to}: ${targetLabel(action)} → ${formatAddedAt(action.addedAt)}`;
  }
  const state = action.action === 'mark-watched' ? 'watched' : 'unwatched';
  return `Marked ${state} in ${to}: ${targetLabel(action)}`;
}

/**
 * Writes every action in order. A failed write is recorded and the
 * remaining actions still run.
 */
export async function applySyncPlan(
  plan: SyncPlan,
  writer: SyncWriter,
  opts: SyncOptions = {}
): Promise<ApplyResult> {
  const logger = opts.logger ?? silentLogger;
  const result: ApplyResult = { applied: [], failed: [] };

  let done = 0;
  for (const action of plan.actions) {
    try {
      await write(action, writer);
      result.applied.push(action);
      logger.info(summarize(action, plan.direction.to));
    } catch (err) {
      const error = new ApplyError(targetId(action), err);
      result.failed.push({ action, error });
      logger.warn(`${targetLabel(action)}: ${error.message}`);
    }
    done++;
    opts.onProgress?.(done, plan.actions.length);
  }

  return result;
}
