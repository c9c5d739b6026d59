/**
 * reconcilarr duplicates <library> <server>
 * Items backed by more than one media source (combined versions).
 */

import { Command } from 'commander';

import { parseLibrary, parseServer } from '../catalogs/factory.js';
import { toRows, writeCsv } from '../export/csv.js';
import { findDuplicates } from '../reconcile/duplicates.js';
import { printDuplicates, sortByTitle } from '../report/report.js';
import { commandOptions, createContext, runCommand, type ContextFactory, type GlobalOptions } from './context.js';

interface DuplicatesOptions extends GlobalOptions {
  export?: string;
}

export function makeDuplicatesCommand(contextFactory: ContextFactory = createContext): Command {
  return new Command('duplicates')
    .description('List items with combined/duplicate versions')
    .argument('<library>', '"movies" or "tv"')
    .argument('<server>', '"plex" or "jellyfin"')
    .option('--export <csv>', 'Write the duplicates to a CSV file')
    .action(async (rawLibrary: string, rawServer: string, _opts: unknown, command: Command) => {
      const opts = commandOptions<DuplicatesOptions>(command);
      await runCommand(opts, async () => {
        const kind = parseLibrary(rawLibrary);
        const server = parseServer(rawServer);
        const ctx = contextFactory(opts);

        const duplicates = findDuplicates(await ctx.catalog(server).listItems(kind));
        printDuplicates(duplicates, server, kind);

        if (opts.export) {
          const file = writeCsv(opts.export, toRows(sortByTitle(duplicates)));
          console.log(`Exported to CSV: ${file}`);
        }
      });
    });
}
