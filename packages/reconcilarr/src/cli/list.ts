/**
 * reconcilarr list <library> <server>
 * Print every title in a catalog, optionally with file paths and CSV export.
 */

import { Command } from 'commander';

import { parseLibrary, parseServer } from '../catalogs/factory.js';
import { toRows, writeCsv } from '../export/csv.js';
import { printItems, sortByTitle } from '../report/report.js';
import { commandOptions, createContext, runCommand, type ContextFactory, type GlobalOptions } from './context.js';

interface ListOptions extends GlobalOptions {
  withPath?: boolean;
  export?: string;
}

export function makeListCommand(contextFactory: ContextFactory = createContext): Command {
  return new Command('list')
    .description('List every title in a library')
    .argument('<library>', '"movies" or "tv"')
    .argument('<server>', '"plex" or "jellyfin"')
    .option('--with-path', 'Include file paths (show folder for TV)')
    .option('--export <csv>', 'Also write the list to a CSV file (implies --with-path)')
    .action(async (rawLibrary: string, rawServer: string, _opts: unknown, command: Command) => {
      const opts = commandOptions<ListOptions>(command);
      await runCommand(opts, async () => {
        const kind = parseLibrary(rawLibrary);
        const server = parseServer(rawServer);
        const ctx = contextFactory(opts);

        const items = await ctx.catalog(server).listItems(kind);
        printItems(items, { withPath: Boolean(opts.withPath || opts.export) });

        if (opts.export) {
          const file = writeCsv(opts.export, toRows(sortByTitle(items)));
          console.log(`Exported to CSV: ${file}`);
        }
      });
    });
}
