// Named entities that turn up in TMDB titles and IMDb pages.
const NAMED_ENTITIES: Partial<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
  middot: '\u00b7',
  lsquo: '\u2018',
  rsquo: '\u2019',
  ndash: '\u2013',
  mdash: '\u2014',
  hellip: '\u2026',
};

const ENTITY_RE = /&(?:#x([0-9a-f]{1,6})|#(\d{1,7})|([a-z][a-z0-9]{1,9}));/gi;

function scalarToString(cp: number): string | null {
  if (cp <= 0 || cp > 0x10ffff) return null;
  if (cp >= 0xd800 && cp <= 0xdfff) return null;
  return String.fromCodePoint(cp);
}

/**
 * Numeric (`&#183;`, `&#xB7;`) and a short list of named entities. Anything
 * unrecognised is left as written.
 */
export function decodeHtmlEntities(input: string): string {
  if (!input) return '';
  return input.replace(
    ENTITY_RE,
    (entity: string, hex?: string, dec?: string, name?: string) => {
      if (hex !== undefined) return scalarToString(Number.parseInt(hex, 16)) ?? entity;
      if (dec !== undefined) return scalarToString(Number.parseInt(dec, 10)) ?? entity;
      return NAMED_ENTITIES[(name ?? '').toLowerCase()] ?? entity;
    },
  );
}

const INVISIBLE_MARKS_RE = /[\u200b-\u200f\u202a-\u202e]/g;

const PUNCTUATION_FOLDS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[\u2018\u2019\u02bc]/g, "'"],
  [/[\u201c\u201d]/g, '"'],
  [/[\u2013\u2014]/g, '-'],
];

/**
 * Display form of a TMDB or ratings-export title: entities decoded, NFKC,
 * zero-width and bidi marks dropped, curly quotes and dashes folded to ASCII,
 * whitespace collapsed.
 */
export function normalizeTitleForMatching(raw: string): string {
  let s = decodeHtmlEntities(raw ?? '')
    .normalize('NFKC')
    .replace(INVISIBLE_MARKS_RE, '');
  for (const [re, ascii] of PUNCTUATION_FOLDS) s = s.replace(re, ascii);
  return s.replace(/\s+/g, ' ').trim();
}

const LEADING_ARTICLES = ['the ', 'a ', 'an '];

/**
 * Lossy key used for seen-title lookups: accents folded, lower-cased,
 * punctuation collapsed to spaces, `&` spelled out, leading article dropped.
 * "The Lord of the Rings: The Two Towers" -> "lord of the rings the two towers"
 */
export function titleKey(raw: string): string {
  let s = normalizeTitleForMatching(raw);
  if (!s) return '';

  s = s
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/'/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  for (const article of LEADING_ARTICLES) {
    if (s.startsWith(article) && s.length > article.length) {
      s = s.slice(article.length);
      break;
    }
  }
  return s;
}
