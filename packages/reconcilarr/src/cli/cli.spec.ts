import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { buildProgram } from '../program.js';
import { buildConfig } from '../shared/config.js';
import { silentLogger } from '../shared/logger.js';
import type { ServerName } from '../shared/types.js';
import { makeEpisode, makeItem, makeShow, MemoryCatalog } from '../testing/memory-catalog.js';
import type { CommandContext, GlobalOptions } from './context.js';

function setup(plexItems = defaultPlex(), jellyfinItems = defaultJellyfin()) {
  const plex = new MemoryCatalog('plex', plexItems);
  const jellyfin = new MemoryCatalog('jellyfin', jellyfinItems);
  const factory = jest.fn<CommandContext, [GlobalOptions]>(() => ({
    config: buildConfig({}, {}),
    logger: silentLogger,
    catalog: (server: ServerName) => (server === 'plex' ? plex : jellyfin),
  }));
  const run = (...args: string[]) => buildProgram(factory).parseAsync(args, { from: 'user' });
  return { plex, jellyfin, factory, run };
}

function defaultPlex() {
  return [
    makeItem('p1', 'The Matrix', 1999, { watched: true, paths: ['/movies/The Matrix.mkv'] }),
    makeItem('p2', 'Heat', 1995, { partCount: 2, paths: ['/movies/Heat.mkv', '/movies/Heat.4k.mkv'] }),
    makeItem('p3', 'Alien', 1979),
  ];
}

function defaultJellyfin() {
  return [
    makeItem('j1', 'The Matrix', 1999, { watched: false }),
    makeItem('j2', 'Heat', 1995),
  ];
}

describe('reconcilarr CLI', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  const printed = (): string[] => log.mock.calls.map((args: unknown[]) => args.map(String).join(' '));
  const errors = (): string[] => error.mock.calls.map((args: unknown[]) => args.map(String).join(' '));

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('list', () => {
    it('prints titles in order with a total', async () => {
      const { run } = setup();
      await run('list', 'movies', 'plex');
      expect(printed()).toEqual(['Alien', 'Heat', 'The Matrix', 'Total: 3']);
    });

    it('prints paths on request', async () => {
      const { run } = setup();
      await run('list', 'movies', 'plex', '--with-path');
      expect(printed()).toEqual([
        'Alien | (no path)',
        'Heat | /movies/Heat.mkv; /movies/Heat.4k.mkv',
        'The Matrix | /movies/The Matrix.mkv',
        'Total: 3',
      ]);
    });

    it('exports to CSV', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reconcilarr-cli-'));
      try {
        const file = path.join(dir, 'movies.csv');
        const { run } = setup();
        await run('list', 'movies', 'jellyfin', '--export', file);

        expect(printed()).toContain(`Exported to CSV: ${path.resolve(file)}`);
        expect(fs.readFileSync(file, 'utf-8')).toBe(
          'Title,Year,Path,Watched,Parts\r\n' +
          'Heat,1995,(no path),no,1\r\n' +
          'The Matrix,1999,(no path),no,1\r\n'
        );
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('rejects an unknown library before building a context', async () => {
      const { run, factory } = setup();
      await run('list', 'music', 'plex');

      expect(factory).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
      expect(errors()[0]).toContain(`error: Unknown library "music". LIBRARY must be 'movies' or 'tv'.`);
    });
  });

  describe('show', () => {
    it('prints an exact match', async () => {
      const { run } = setup();
      await run('show', 'heat', 'movies', 'plex');
      expect(printed()).toContain('  ID       : p2');
      expect(printed()).toContain('  Parts    : 2');
    });

    it('falls back to fuzzy matching', async () => {
      const { run } = setup();
      await run('show', 'Matrix', 'movies', 'plex', '--fuzzy', '70');
      expect(printed()).toContain('  ID       : p1');
      expect(printed()).toContain('  Score    : 75.0 (fuzzy match)');
    });

    it('reports the closest title when nothing matches', async () => {
      const { run } = setup();
      await run('show', 'Matrix', 'movies', 'plex');
      expect(printed()).toEqual([
        'Not found in plex movies: Matrix',
        '  Closest: The Matrix (score 75.0, threshold 85)',
      ]);
    });

    it('reads the catalog once for an exact and fuzzy lookup', async () => {
      const { run, plex } = setup();
      const listItems = jest.spyOn(plex, 'listItems');
      await run('show', 'Matrix', 'movies', 'plex', '--fuzzy', '70');

      expect(listItems).toHaveBeenCalledTimes(1);
      expect(printed()).toContain('  ID       : p1');
    });

    it('rejects an invalid threshold', async () => {
      const { run } = setup();
      await run('show', 'Matrix', 'movies', 'plex', '--fuzzy', '120');
      expect(process.exitCode).toBe(1);
      expect(errors()[0]).toContain('Match threshold must be between 0 and 100, got 120');
    });
  });

  describe('compare', () => {
    it('lists titles missing from the target', async () => {
      const { run } = setup();
      await run('compare', 'movies', 'plex', 'jellyfin');
      expect(printed()).toEqual([
        'Titles in plex movies missing from jellyfin movies: 1 of 3',
        'Alien (1979)',
      ]);
    });

    it('reports when nothing is missing', async () => {
      const { run } = setup();
      await run('compare', 'movies', 'jellyfin', 'plex');
      expect(printed()).toHaveLength(1);
      expect(printed()[0]).toContain('No missing movies titles found from jellyfin to plex.');
    });

    it('refuses to compare a server with itself', async () => {
      const { run } = setup();
      await run('compare', 'movies', 'plex', 'plex');
      expect(process.exitCode).toBe(1);
      expect(errors()[0]).toContain('SOURCE and TARGET must be different servers');
    });
  });

  describe('sync', () => {
    it('prints the plan without writing on a dry run', async () => {
      const { run, jellyfin } = setup();
      await run('sync', 'plex,jellyfin', 'movies', '--dry-run');

      expect(jellyfin.writes).toEqual([]);
      expect(printed()).toContain('  [DRYRUN] The Matrix (1999): plex watched, jellyfin "The Matrix" → mark watched');
      expect(printed()).toContain('  Actions   : 1');
      expect(printed()).toContain('  Unmatched : 1');
      expect(printed()).toContain('  [DRYRUN] No changes written.');
    });

    it('writes the plan to the target', async () => {
      const { run, jellyfin, plex } = setup();
      await run('sync', 'plex,jellyfin', 'movies');

      expect(jellyfin.writes).toEqual([{ itemId: 'j1', watched: true }]);
      expect(plex.writes).toEqual([]);
      expect(printed()).toContain('  1 applied, 0 failed');
      expect(process.exitCode).toBeUndefined();
    });

    it('sets a failing exit code when a write fails', async () => {
      const { run, jellyfin } = setup();
      jellyfin.failOn.add('j1');
      await run('sync', 'plex,jellyfin', 'movies');

      expect(printed()).toContain('  0 applied, 1 failed');
      expect(process.exitCode).toBe(1);
    });

    it('prints library date changes on a dry run', async () => {
      const { run, plex } = setup(
        [makeItem('p2', 'Heat', 1995, { addedAt: new Date('2020-01-02T00:00:00Z') })],
        [makeItem('j2', 'Heat', 1995, { addedAt: new Date('2020-01-01T00:00:00Z') })]
      );
      await run('sync', 'jellyfin,plex', 'movies', '--dry-run');

      expect(plex.dateWrites).toEqual([]);
      expect(printed()).toContain(
        '  [DRYRUN] Heat (1995): jellyfin added 2020-01-01 00:00, plex added 2020-01-02 00:00 → set added date'
      );
    });

    it('copies library dates to the target', async () => {
      const { run, plex } = setup(
        [makeItem('p2', 'Heat', 1995, { addedAt: new Date('2020-01-02T00:00:00Z') })],
        [makeItem('j2', 'Heat', 1995, { addedAt: new Date('2020-01-01T00:00:00Z') })]
      );
      await run('sync', 'jellyfin,plex', 'movies');

      expect(plex.dateWrites).toEqual([{ itemId: 'p2', addedAt: new Date('2020-01-01T00:00:00Z') }]);
      expect(printed()).toContain('  1 applied, 0 failed');
    });

    it('syncs shows episode by episode', async () => {
      const { run, jellyfin } = setup(
        [makeShow('p20', 'Firefly', 2002, [makeEpisode('pe1', 1, 1, { watched: true }), makeEpisode('pe2', 1, 2, { watched: true })])],
        [makeShow('j20', 'Firefly', 2002, [makeEpisode('je1', 1, 1, { watched: true }), makeEpisode('je2', 1, 2)])]
      );
      await run('sync', 'plex,jellyfin', 'tv');

      expect(jellyfin.writes).toEqual([{ itemId: 'je2', watched: true }]);
      expect(printed()).toContain('  Firefly (2002) S01E02: plex watched, jellyfin "Episode 2" → mark watched');
    });

    it('rejects an unknown direction', async () => {
      const { run, factory } = setup();
      await run('sync', 'plex,emby', 'movies');

      expect(factory).not.toHaveBeenCalled();
      expect(errors()[0]).toContain(`Unknown sync direction "plex,emby"`);
    });
  });

  describe('duplicates', () => {
    it('lists combined versions', async () => {
      const { run } = setup();
      await run('duplicates', 'movies', 'plex');
      expect(printed()).toEqual([
        '[Plex] Movie with combined versions: Heat (1995) (2 versions)',
        'Total: 1',
      ]);
    });

    it('lists each combined episode of a show', async () => {
      const { run } = setup([
        makeShow('p20', 'Firefly', 2002, [
          makeEpisode('pe1', 1, 1, { title: 'Serenity' }),
          makeEpisode('pe2', 1, 2, { title: 'The Train Job', partCount: 2 }),
        ]),
        makeShow('p21', 'Alias', 2001, [makeEpisode('pe3', 1, 1)]),
        makeItem('p22', 'Dark', 2017, { kind: 'show', partCount: 2 }),
      ]);
      await run('duplicates', 'tv', 'plex');

      expect(printed()).toEqual([
        '[Plex] Show with combined versions: Dark (2017) (2 versions)',
        '[Plex] Show: Firefly | Episode: The Train Job (Season 1, Ep 2) has combined versions',
        'Total: 2 shows, 1 episodes',
      ]);
    });
  });
});
