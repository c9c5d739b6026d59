#!/usr/bin/env node
/**
 * Reconcilarr - keep Plex and Jellyfin catalogs in agreement
 *
 * list / show / compare / sync watched status / find combined versions
 */

import { buildProgram } from './program.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
