/**
 * Console reports for each command
 */

import { green, yellow } from 'colorette';

import { NO_PATH } from '../export/csv.js';
import { heading } from '../shared/logger.js';
import { combinedEpisodes } from '../reconcile/duplicates.js';
import { episodeCode } from '../reconcile/episodes.js';
import { formatAddedAt, targetLabel, type ApplyResult } from '../reconcile/sync.js';
import type {
  ComparisonReport,
  MediaItem,
  MediaKind,
  ServerName,
  SyncAction,
  SyncDirection,
  SyncPlan,
} from '../shared/types.js';

export function libraryLabel(kind: MediaKind): string {
  return kind === 'movie' ? 'movies' : 'tv';
}

function yearSuffix(item: MediaItem): string {
  return item.year != null ? ` (${item.year})` : '';
}

/** Case-insensitive title order; stable for equal titles */
export function sortByTitle(items: readonly MediaItem[]): MediaItem[] {
  return [...items].sort((a, b) => a.title.toLowerCase().localeCompare(b.title.toLowerCase()));
}

// ──────────────────────────────────────────────────────────────────
// list / show
// ──────────────────────────────────────────────────────────────────

export function printItems(items: readonly MediaItem[], opts: { withPath?: boolean } = {}): void {
  for (const item of sortByTitle(items)) {
    if (opts.withPath) {
      const where = item.paths.length > 0 ? item.paths.join('; ') : NO_PATH;
      console.log(`${item.title} | ${where}`);
    } else {
      console.log(item.title);
    }
  }
  console.log(`Total: ${items.length}`);
}

export function printItemDetail(item: MediaItem, server: ServerName, score?: number): void {
  console.log(heading(`${item.title}${yearSuffix(item)}`));
  console.log(`  Server   : ${server}`);
  console.log(`  ID       : ${item.id}`);
  console.log(`  Kind     : ${item.kind}`);
  console.log(`  Year     : ${item.year ?? '?'}`);
  console.log(`  Watched  : ${item.watched ? 'yes' : 'no'}`);
  console.log(`  Parts    : ${item.partCount}`);
  if (item.episodes) console.log(`  Episodes : ${item.episodes.length}`);
  if (item.addedAt) console.log(`  Added    : ${formatAddedAt(item.addedAt)}`);
  if (score != null) console.log(`  Score    : ${score.toFixed(1)} (fuzzy match)`);
  if (item.paths.length === 0) {
    console.log(`  Path     : ${NO_PATH}`);
  } else {
    for (const p of item.paths) console.log(`  Path     : ${p}`);
  }
  console.log('');
}

// ──────────────────────────────────────────────────────────────────
// compare
// ──────────────────────────────────────────────────────────────────

export function printComparison(
  missing: ComparisonReport,
  ctx: { kind: MediaKind; source: ServerName; target: ServerName; sourceTotal: number }
): void {
  const library = libraryLabel(ctx.kind);
  if (missing.length === 0) {
    console.log(green(`No missing ${library} titles found from ${ctx.source} to ${ctx.target}.`));
    return;
  }
  console.log(
    `Titles in ${ctx.source} ${library} missing from ${ctx.target} ${library}: ` +
    `${missing.length} of ${ctx.sourceTotal}`
  );
  for (const item of sortByTitle(missing)) {
    console.log(`${item.title}${yearSuffix(item)}`);
  }
}

// ──────────────────────────────────────────────────────────────────
// sync
// ──────────────────────────────────────────────────────────────────

function describeAction(a: SyncAction, { from, to }: SyncDirection): string {
  const source = `${a.source.title}${yearSuffix(a.source)}`;
  if (a.action === 'set-added-at') {
    const current = a.target.addedAt ? formatAddedAt(a.target.addedAt) : '?';
    return `${source}: ${from} added ${formatAddedAt(a.addedAt)}, ${to} added ${current} → set added date`;
  }
  const state = a.action === 'mark-watched' ? 'watched' : 'unwatched';
  if (a.episode) {
    return (
      `${source} ${episodeCode(a.episode.source)}: ${from} ${state}, ` +
      `${to} "${a.episode.target.title}" → mark ${state}`
    );
  }
  return `${source}: ${from} ${state}, ${to} "${a.target.title}" → mark ${state}`;
}

export function printSyncPlan(plan: SyncPlan, opts: { dryRun: boolean }): void {
  const { from, to } = plan.direction;
  const prefix = opts.dryRun ? '[DRYRUN] ' : '';

  console.log(heading(`Sync ${from} → ${to}`));
  for (const item of plan.unmatched) {
    console.log(yellow(`  Unable to find in ${to}: ${item.title}${yearSuffix(item)}`));
  }
  for (const a of plan.actions) {
    console.log(`  ${prefix}${describeAction(a, plan.direction)}`);
  }
  console.log(`  Actions   : ${plan.actions.length}`);
  console.log(`  Unmatched : ${plan.unmatched.length}`);
  if (opts.dryRun && plan.actions.length > 0) {
    console.log(`  ${prefix}No changes written.`);
  }
}

export function printApplySummary(result: ApplyResult): void {
  console.log(heading('Sync complete'));
  console.log(`  ${result.applied.length} applied, ${result.failed.length} failed`);
  for (const f of result.failed.slice(0, 10)) {
    console.log(yellow(`    ${targetLabel(f.action)}: ${f.error.message}`));
  }
  if (result.failed.length > 10) {
    console.log(`    ... and ${result.failed.length - 10} more`);
  }
}

// ──────────────────────────────────────────────────────────────────
// duplicates
// ──────────────────────────────────────────────────────────────────

/** Movies print one line each; shows print one line per combined episode */
export function printDuplicates(items: readonly MediaItem[], server: ServerName, kind: MediaKind): void {
  const label = server === 'plex' ? '[Plex]' : '[Jellyfin]';
  if (kind === 'movie') {
    for (const item of sortByTitle(items)) {
      console.log(`${label} Movie with combined versions: ${item.title}${yearSuffix(item)} (${item.partCount} versions)`);
    }
    console.log(`Total: ${items.length}`);
    return;
  }

  let episodeCount = 0;
  for (const show of sortByTitle(items)) {
    const episodes = combinedEpisodes(show);
    if (episodes.length === 0) {
      console.log(`${label} Show with combined versions: ${show.title}${yearSuffix(show)} (${show.partCount} versions)`);
    }
    for (const ep of episodes) {
      console.log(
        `${label} Show: ${show.title} | Episode: ${ep.title} ` +
        `(Season ${ep.season ?? '?'}, Ep ${ep.episode ?? '?'}) has combined versions`
      );
    }
    episodeCount += episodes.length;
  }
  console.log(`Total: ${items.length} shows, ${episodeCount} episodes`);
}
