import type { CandidateItem } from '../catalog/catalog.types';
import {
  buildSeenIndexFromRatings,
  filterUnseen,
  SeenIndex,
} from './seen-index';

function item(partial: Partial<CandidateItem> & { title: string }): CandidateItem {
  return {
    kind: 'movie',
    tmdbId: 1,
    imdbId: null,
    year: null,
    popularity: null,
    voteAverage: null,
    voteCount: null,
    originalLanguage: null,
    ...partial,
  };
}

describe('SeenIndex', () => {
  it('matches titles with a one-year tolerance', () => {
    const idx = new SeenIndex();
    idx.addTitle('movie', 'The Matrix', 1999);

    expect(idx.hasTitle('movie', 'Matrix', 1999)).toBe(true);
    expect(idx.hasTitle('movie', 'the matrix', 2000)).toBe(true);
    expect(idx.hasTitle('movie', 'The Matrix', 1998)).toBe(true);
    expect(idx.hasTitle('movie', 'The Matrix', 2003)).toBe(false);
    expect(idx.hasTitle('movie', 'The Matrix', null)).toBe(false);
    expect(idx.hasTitle('tv', 'The Matrix', 1999)).toBe(false);
  });

  it('matches any year when the rating had none', () => {
    const idx = new SeenIndex();
    idx.addTitle('tv', 'Dark', null);
    expect(idx.hasTitle('tv', 'Dark', 2017)).toBe(true);
    expect(idx.hasTitle('tv', 'Dark', null)).toBe(true);
  });

  it('builds from a ratings export', () => {
    const idx = buildSeenIndexFromRatings([
      { Const: 'tt0111161', Title: 'The Shawshank Redemption', Year: '1994', 'Title Type': 'Movie' },
      { URL: 'https://www.imdb.com/title/tt0944947/', Title: 'Game of Thrones', Year: '2011', 'Title Type': 'TV Series' },
      { Title: 'Some Short', Year: 'n/a', 'Title Type': 'Short' },
      { Notes: 'nothing useful' },
    ]);

    expect(idx.idCount).toBe(2);
    expect(idx.titleKeyCount).toBe(3);
    expect(idx.size).toBe(5);
    expect(idx.hasId('tt0944947')).toBe(true);
    expect(idx.hasTitle('tv', 'Game of Thrones', 2011)).toBe(true);
    expect(idx.hasTitle('movie', 'Some Short', 2020)).toBe(true);
  });

  it('filters seen items by id or tolerant title', () => {
    const idx = buildSeenIndexFromRatings([
      { Const: 'tt0133093', Title: 'The Matrix', Year: '1999', 'Title Type': 'movie' },
      { Title: 'Amélie', Year: '2001', 'Title Type': 'movie' },
    ]);
    const items = [
      item({ tmdbId: 603, title: 'Matrix Reloaded', imdbId: 'tt0133093' }),
      item({ tmdbId: 194, title: 'Amelie', year: 2002 }),
      item({ tmdbId: 27205, title: 'Inception', year: 2010 }),
    ];

    expect(filterUnseen(items, idx).map((i) => i.tmdbId)).toEqual([27205]);
  });
});
