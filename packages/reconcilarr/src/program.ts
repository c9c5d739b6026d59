import { Command } from 'commander';

import { makeCompareCommand } from './cli/compare.js';
import { createContext, type ContextFactory } from './cli/context.js';
import { makeDuplicatesCommand } from './cli/duplicates.js';
import { makeListCommand } from './cli/list.js';
import { makeShowCommand } from './cli/show.js';
import { makeSyncCommand } from './cli/sync.js';

export const VERSION = '0.1.0';

export function buildProgram(contextFactory: ContextFactory = createContext): Command {
  const program = new Command();

  program
    .name('reconcilarr')
    .description('Compare, sync and de-duplicate Plex and Jellyfin catalogs')
    .version(VERSION)
    .option('-c, --config <path>', 'YAML config file (default: ./reconcilarr.yaml, ~/.reconcilarr/config.yaml)')
    .option('-v, --verbose', 'Log HTTP requests and match diagnostics')
    .option('-q, --quiet', 'Only log warnings and errors')
    .addHelpText('after', `
Examples:
  reconcilarr list movies plex --with-path --export movies.csv
  reconcilarr show "Heat (1995)" movies jellyfin
  reconcilarr sync jellyfin,plex movies --dry-run
  reconcilarr compare tv jellyfin plex --fuzzy 90
  reconcilarr duplicates movies plex`);

  // Register subcommands
  program.addCommand(makeListCommand(contextFactory));
  program.addCommand(makeShowCommand(contextFactory));
  program.addCommand(makeSyncCommand(contextFactory));
  program.addCommand(makeCompareCommand(contextFactory));
  program.addCommand(makeDuplicatesCommand(contextFactory));

  return program;
}
