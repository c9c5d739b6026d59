/**
 * Per-invocation command context: config, logger and catalog construction.
 * Commands receive a factory so tests can hand in in-memory catalogs.
 */

import type { Command } from 'commander';

import { createCatalog } from '../catalogs/factory.js';
import { loadConfig } from '../shared/config.js';
import { ReconcileError } from '../shared/errors.js';
import { createLogger, levelFromFlags, type Logger } from '../shared/logger.js';
import type { CatalogAdapter, ReconcilarrConfig, ServerName } from '../shared/types.js';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CommandContext {
  config: ReconcilarrConfig;
  logger: Logger;
  catalog(server: ServerName): CatalogAdapter;
}

export type ContextFactory = (globals: GlobalOptions) => CommandContext;

export const createContext: ContextFactory = (globals) => {
  const logger = createLogger({ level: levelFromFlags(globals) });
  const config = loadConfig({ configPath: globals.config });
  return {
    config,
    logger,
    catalog: (server) => createCatalog(server, config, logger),
  };
};

/** Options of a subcommand merged with the program-level ones */
export function commandOptions<T extends GlobalOptions>(command: Command): T {
  return command.optsWithGlobals<T>();
}

/**
 * Runs a command body. Known failures are printed and set a non-zero exit
 * code; anything else propagates.
 */
export async function runCommand(globals: GlobalOptions, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    if (!(err instanceof ReconcileError)) throw err;
    createLogger({ level: levelFromFlags(globals) }).error(err.message);
    process.exitCode = 1;
  }
}
