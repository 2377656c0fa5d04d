// `tt` plus 7 or 8 digits, as IMDb issues them.
const IMDB_ID = 'tt\\d{7,8}';

const IMDB_ID_IN_TEXT = new RegExp(`(${IMDB_ID})(?!\\d)`, 'i');
const IMDB_ID_EXACT = new RegExp(`^${IMDB_ID}$`, 'i');
const TITLE_LINK = new RegExp(`/title/(${IMDB_ID})/`, 'g');

/** First IMDb id inside a cell or URL, lower-cased. */
export function extractImdbId(text: string | null | undefined): string | null {
  const m = IMDB_ID_IN_TEXT.exec(text ?? '');
  return m ? m[1].toLowerCase() : null;
}

/** Accepts only a bare id (`tt0111161`); anything else is `null`. */
export function parseImdbId(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const s = value.trim();
  return IMDB_ID_EXACT.test(s) ? s.toLowerCase() : null;
}

/** Ids of every `/title/tt…/` link in a page. */
export function extractTitleLinkIds(html: string): Set<string> {
  const out = new Set<string>();
  for (const m of html.matchAll(TITLE_LINK)) out.add(m[1].toLowerCase());
  return out;
}
