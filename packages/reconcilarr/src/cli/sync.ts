/**
 * reconcilarr sync <direction> <library>
 * Align watched status from one catalog to the other. The first server
 * named in DIRECTION is authoritative. Movie library dates are copied too
 * when the target can edit them (Plex).
 */

import { Command } from 'commander';

import { parseLibrary } from '../catalogs/factory.js';
import { applySyncPlan, parseDirection, planSync } from '../reconcile/sync.js';
import { printApplySummary, printSyncPlan } from '../report/report.js';
import { parseThreshold } from '../shared/config.js';
import { commandOptions, createContext, runCommand, type ContextFactory, type GlobalOptions } from './context.js';

interface SyncCommandOptions extends GlobalOptions {
  dryRun?: boolean;
  fuzzy?: string;
}

export function makeSyncCommand(contextFactory: ContextFactory = createContext): Command {
  return new Command('sync')
    .description('Sync watched status between servers')
    .argument('<direction>', '"plex,jellyfin" or "jellyfin,plex" (source,target)')
    .argument('<library>', '"movies" or "tv"')
    .option('--dry-run', 'Compute and print the plan without writing anything')
    .option('--fuzzy <n>', 'Fuzzy match threshold 0-100 (default from config, 85)')
    .action(async (rawDirection: string, rawLibrary: string, _opts: unknown, command: Command) => {
      const opts = commandOptions<SyncCommandOptions>(command);
      await runCommand(opts, async () => {
        const direction = parseDirection(rawDirection);
        const kind = parseLibrary(rawLibrary);
        const ctx = contextFactory(opts);
        const threshold = parseThreshold(opts.fuzzy, ctx.config.matching.threshold);
        const dryRun = Boolean(opts.dryRun);
        const from = ctx.catalog(direction.from);
        const to = ctx.catalog(direction.to);

        const [itemsFrom, itemsTo] = await Promise.all([from.listItems(kind), to.listItems(kind)]);

        const plan = planSync(direction, itemsFrom, itemsTo, threshold, {
          logger: ctx.logger,
          syncAddedAt: kind === 'movie' && to.setAddedAt !== undefined,
        });
        printSyncPlan(plan, { dryRun });
        if (dryRun) return;

        const result = await applySyncPlan(plan, to, { logger: ctx.logger });
        printApplySummary(result);
        if (result.failed.length > 0) process.exitCode = 1;
      });
    });
}
