/**
 * reconcilarr show <title> <library> <server>
 * Exact (case-insensitive) lookup first, fuzzy match over the catalog second.
 */

import { Command } from 'commander';

import { parseLibrary, parseServer } from '../catalogs/factory.js';
import { findByTitle } from '../catalogs/lookup.js';
import { findMatch } from '../matching/engine.js';
import { libraryLabel, printItemDetail } from '../report/report.js';
import { parseThreshold } from '../shared/config.js';
import { commandOptions, createContext, runCommand, type ContextFactory, type GlobalOptions } from './context.js';

interface ShowOptions extends GlobalOptions {
  fuzzy?: string;
}

export function makeShowCommand(contextFactory: ContextFactory = createContext): Command {
  return new Command('show')
    .description('Show details for a single title')
    .argument('<title>', 'Title to look up, e.g. "Heat (1995)"')
    .argument('<library>', '"movies" or "tv"')
    .argument('<server>', '"plex" or "jellyfin"')
    .option('--fuzzy <n>', 'Fuzzy match threshold 0-100 when no exact title exists')
    .action(async (title: string, rawLibrary: string, rawServer: string, _opts: unknown, command: Command) => {
      const opts = commandOptions<ShowOptions>(command);
      await runCommand(opts, async () => {
        const kind = parseLibrary(rawLibrary);
        const server = parseServer(rawServer);
        const ctx = contextFactory(opts);
        const threshold = parseThreshold(opts.fuzzy, ctx.config.matching.threshold);
        const catalog = ctx.catalog(server);

        const items = await catalog.listItems(kind);
        const exact = findByTitle(items, title);
        if (exact) {
          printItemDetail(exact, server);
          return;
        }

        const result = findMatch(title, undefined, items, threshold, { logger: ctx.logger });
        if (result.matched && result.bestCandidate) {
          printItemDetail(result.bestCandidate, server, result.score);
          return;
        }

        console.log(`Not found in ${server} ${libraryLabel(kind)}: ${title}`);
        if (result.bestCandidate) {
          console.log(`  Closest: ${result.bestCandidate.title} (score ${result.score.toFixed(1)}, threshold ${threshold})`);
        }
      });
    });
}
