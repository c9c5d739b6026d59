import path from 'node:path';

const SEASON_DIR = /^(season\s?\d+|s\d{1,2})$/i;

function pathFlavor(p: string): path.PlatformPath {
  return p.includes('\\') && !p.includes('/') ? path.win32 : path.posix;
}

/**
 * Show folder for an episode file. Skips a season folder
 * ("Season 01", "Season1", "S01", "S1") when the episode sits in one.
 */
export function showFolderFromEpisode(episodePath: string): string {
  const flavor = pathFlavor(episodePath);
  const parent = flavor.dirname(episodePath);
  if (SEASON_DIR.test(flavor.basename(parent))) {
    return flavor.dirname(parent);
  }
  return parent;
}
