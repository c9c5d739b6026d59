/**
 * reconcilarr compare <library> <source> <target>
 * Titles present in the source catalog and missing from the target.
 */

import { Command } from 'commander';

import { parseLibrary, parseServer } from '../catalogs/factory.js';
import { toRows, writeCsv } from '../export/csv.js';
import { compare } from '../reconcile/compare.js';
import { printComparison, sortByTitle } from '../report/report.js';
import { parseThreshold } from '../shared/config.js';
import { ConfigurationError } from '../shared/errors.js';
import { commandOptions, createContext, runCommand, type ContextFactory, type GlobalOptions } from './context.js';

interface CompareOptions extends GlobalOptions {
  fuzzy?: string;
  exact?: boolean;
  export?: string;
}

export function makeCompareCommand(contextFactory: ContextFactory = createContext): Command {
  return new Command('compare')
    .description('List titles in SOURCE that are missing from TARGET')
    .argument('<library>', '"movies" or "tv"')
    .argument('<source>', '"plex" or "jellyfin"')
    .argument('<target>', '"plex" or "jellyfin"')
    .option('--fuzzy <n>', 'Fuzzy match threshold 0-100 (default from config, 85)')
    .option('--exact', 'Require identical normalised titles instead of fuzzy scoring')
    .option('--export <csv>', 'Write the missing titles to a CSV file')
    .action(async (rawLibrary: string, rawSource: string, rawTarget: string, _opts: unknown, command: Command) => {
      const opts = commandOptions<CompareOptions>(command);
      await runCommand(opts, async () => {
        const kind = parseLibrary(rawLibrary);
        const source = parseServer(rawSource);
        const target = parseServer(rawTarget);
        if (source === target) {
          throw new ConfigurationError('SOURCE and TARGET must be different servers');
        }
        const ctx = contextFactory(opts);
        const threshold = parseThreshold(opts.fuzzy, ctx.config.matching.threshold);
        const sourceCatalog = ctx.catalog(source);
        const targetCatalog = ctx.catalog(target);

        const [sourceItems, targetItems] = await Promise.all([
          sourceCatalog.listItems(kind),
          targetCatalog.listItems(kind),
        ]);
        ctx.logger.debug(`${source}: ${sourceItems.length}, ${target}: ${targetItems.length}`);

        const missing = compare(sourceItems, targetItems, threshold, {
          exact: Boolean(opts.exact),
          logger: ctx.logger,
        });
        printComparison(missing, { kind, source, target, sourceTotal: sourceItems.length });

        if (opts.export) {
          const file = writeCsv(opts.export, toRows(sortByTitle(missing)));
          console.log(`Exported to CSV: ${file}`);
        }
      });
    });
}
