import { makeEpisode, makeItem, makeShow } from '../testing/memory-catalog.js';
import { combinedEpisodes, findDuplicates } from './duplicates.js';

describe('findDuplicates', () => {
  it('keeps only items with more than one part', () => {
    const items = [
      makeItem('a', 'Heat', 1995, { partCount: 2 }),
      makeItem('b', 'Alien', 1979),
      makeItem('c', 'Dune', 2021, { partCount: 3 }),
    ];
    expect(findDuplicates(items).map((i) => i.id)).toEqual(['a', 'c']);
  });

  it('returns an empty list when nothing is combined', () => {
    expect(findDuplicates([makeItem('a', 'Heat')])).toEqual([]);
    expect(findDuplicates([])).toEqual([]);
  });
});

describe('combinedEpisodes', () => {
  it('lists the episodes with more than one part', () => {
    const show = makeShow('s1', 'Firefly', 2002, [
      makeEpisode('e1', 1, 1),
      makeEpisode('e2', 1, 2, { partCount: 2 }),
      makeEpisode('e3', 1, 3, { partCount: 3 }),
    ]);
    expect(combinedEpisodes(show).map((ep) => ep.id)).toEqual(['e2', 'e3']);
  });

  it('returns nothing for a show without an episode list', () => {
    expect(combinedEpisodes(makeItem('s1', 'Firefly', 2002, { kind: 'show', partCount: 2 }))).toEqual([]);
  });
});
