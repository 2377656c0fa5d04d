import {
  decodeHtmlEntities,
  normalizeTitleForMatching,
  titleKey,
} from './title-normalize';

describe('title-normalize', () => {
  it('decodes numeric and named entities', () => {
    expect(decodeHtmlEntities('WALL&#183;E')).toBe('WALL·E');
    expect(decodeHtmlEntities('WALL&#xB7;E')).toBe('WALL·E');
    expect(decodeHtmlEntities('Tom &amp; Jerry')).toBe('Tom & Jerry');
    expect(decodeHtmlEntities('Schindler&rsquo;s List')).toBe('Schindler\u2019s List');
    expect(decodeHtmlEntities('&bogus;')).toBe('&bogus;');
    expect(decodeHtmlEntities('&#xD800; &#0;')).toBe('&#xD800; &#0;');
  });

  it('normalizes whitespace and punctuation variants for display', () => {
    expect(normalizeTitleForMatching('  Schindler’s  List ')).toBe("Schindler's List");
    expect(normalizeTitleForMatching('Spider–Man')).toBe('Spider-Man');
    expect(normalizeTitleForMatching('Caf\u00e9\u200b &amp;\u00a0Bar ')).toBe('Caf\u00e9 & Bar');
    expect(normalizeTitleForMatching('')).toBe('');
  });

  it('builds lossy lookup keys', () => {
    expect(titleKey('The Lord of the Rings: The Two Towers')).toBe(
      'lord of the rings the two towers',
    );
    expect(titleKey('Amélie')).toBe('amelie');
    expect(titleKey("Schindler's List")).toBe('schindlers list');
    expect(titleKey('Fast & Furious')).toBe('fast and furious');
    expect(titleKey('A Quiet Place')).toBe('quiet place');
    expect(titleKey('The')).toBe('the');
    expect(titleKey('   ')).toBe('');
  });

  it('maps spelling variants to the same key', () => {
    expect(titleKey('Spider-Man: No Way Home')).toBe(titleKey('Spider Man No Way Home'));
    expect(titleKey('WALL&#183;E')).toBe('wall e');
  });
});
