import { makeItem } from '../testing/memory-catalog.js';
import { compare } from './compare.js';

describe('compare', () => {
  const source = [
    makeItem('p1', 'Inception (2010)', 2010),
    makeItem('p2', 'Heat', 1995),
    makeItem('p3', 'Alien', 1979),
  ];

  it('returns source items without a counterpart, in source order', () => {
    const target = [makeItem('j1', 'Inception', 2010), makeItem('j2', 'Alien', 1986)];
    expect(compare(source, target, 85).map((i) => i.id)).toEqual(['p2', 'p3']);
  });

  it('returns everything when the target is empty', () => {
    expect(compare(source, [], 85)).toEqual(source);
  });

  it('returns nothing for an empty source', () => {
    expect(compare([], source, 85)).toEqual([]);
  });

  it('honours the threshold', () => {
    const target = [makeItem('j1', 'The Matrix')];
    const query = [makeItem('p1', 'Matrix')];
    expect(compare(query, target, 70)).toEqual([]);
    expect(compare(query, target, 80)).toEqual(query);
  });

  it('requires normalised equality in exact mode', () => {
    const target = [makeItem('j1', 'Alien')];
    const query = [makeItem('p1', 'Aliens'), makeItem('p2', 'ALIEN')];
    expect(compare(query, target, 85).map((i) => i.id)).toEqual([]);
    expect(compare(query, target, 85, { exact: true }).map((i) => i.id)).toEqual(['p1']);
  });

  it('finds nothing missing when a catalog is compared with itself', () => {
    for (const threshold of [0, 50, 85, 100]) {
      expect(compare(source, source, threshold)).toEqual([]);
    }
  });

  it('reports every unequal title in exact mode at threshold 0', () => {
    const query = [makeItem('p1', 'Aliens'), makeItem('p2', 'Heat')];
    expect(compare(query, [makeItem('j1', 'Alien')], 0, { exact: true }).map((i) => i.id)).toEqual(['p1', 'p2']);
  });

  it('matches a punctuation-only title with itself', () => {
    const items = [makeItem('p1', '?!'), makeItem('p2', 'Heat')];
    expect(compare(items, items, 85)).toEqual([]);
  });

  it('reports a same-titled item from another year as missing', () => {
    const original = makeItem('p1', 'The Thing', 1982);
    expect(compare([original], [makeItem('j1', 'The Thing', 2011)], 90)).toEqual([original]);
  });
});
