import type { CandidateItem, MediaKind } from '../catalog/catalog.types';
import { extractImdbId } from '../lib/imdb-id';
import { titleKey } from '../lib/title-normalize';
import type { CsvRow } from './ratings-csv';

/**
 * Titles the user has already rated:
 * - exact IMDb ids (`tt…`)
 * - tolerant `kind:titleKey:year` keys (`*` when the year is unknown);
 *   lookups also accept year ±1, since release years drift between sources.
 */
export class SeenIndex {
  private readonly ids = new Set<string>();
  private readonly keys = new Set<string>();

  get size(): number {
    return this.ids.size + this.keys.size;
  }

  get idCount(): number {
    return this.ids.size;
  }

  get titleKeyCount(): number {
    return this.keys.size;
  }

  addId(imdbId: string | null | undefined): boolean {
    const id = extractImdbId(imdbId);
    if (!id || this.ids.has(id)) return false;
    this.ids.add(id);
    return true;
  }

  addTitle(kind: MediaKind, title: string, year: number | null): void {
    const key = titleKey(title);
    if (!key) return;
    this.keys.add(`${kind}:${key}:${year ?? '*'}`);
  }

  hasId(imdbId: string | null | undefined): boolean {
    const id = extractImdbId(imdbId);
    return id !== null && this.ids.has(id);
  }

  hasTitle(kind: MediaKind, title: string, year: number | null): boolean {
    const key = titleKey(title);
    if (!key) return false;
    const prefix = `${kind}:${key}:`;
    if (this.keys.has(`${prefix}*`)) return true;
    if (year === null) return false;
    return [year, year - 1, year + 1].some((y) => this.keys.has(`${prefix}${y}`));
  }

  has(item: Pick<CandidateItem, 'kind' | 'imdbId' | 'title' | 'year'>): boolean {
    if (item.imdbId && this.hasId(item.imdbId)) return true;
    return this.hasTitle(item.kind, item.title, item.year);
  }

  merge(other: SeenIndex): void {
    for (const id of other.ids) this.ids.add(id);
    for (const key of other.keys) this.keys.add(key);
  }
}

function pickCell(row: CsvRow, names: readonly string[]): string {
  for (const name of names) {
    const v = row[name];
    if (v && v.trim()) return v.trim();
  }
  return '';
}

function kindFromTitleType(raw: string): MediaKind | null {
  const t = raw.trim().toLowerCase().replace(/\s+/g, '');
  if (['movie', 'feature', 'video', 'tvmovie', 'short', 'tvspecial'].includes(t)) {
    return 'movie';
  }
  if (['tvseries', 'tvminiseries', 'tvepisode', 'episode', 'tv', 'series'].includes(t)) {
    return 'tv';
  }
  return null;
}

const ID_COLUMNS = ['Const', 'const', 'tconst', 'IMDb Title ID', 'imdb_id', 'id'];
const TITLE_COLUMNS = ['Title', 'title', 'originalTitle', 'Original Title'];
const YEAR_COLUMNS = ['Year', 'year', 'startYear', 'Release Year'];
const TYPE_COLUMNS = ['Title Type', 'Title type', 'titleType', 'Type'];

/** Adds every usable row of an IMDb-style ratings export; returns rows that contributed. */
export function addRatingsRows(index: SeenIndex, rows: readonly CsvRow[]): number {
  let used = 0;
  for (const row of rows) {
    let contributed = false;

    // Prefer the id column, else sniff any cell (URL columns) for tt…
    let imdbId = extractImdbId(pickCell(row, ID_COLUMNS));
    if (!imdbId) {
      for (const cell of Object.values(row)) {
        imdbId = extractImdbId(cell);
        if (imdbId) break;
      }
    }
    if (imdbId) {
      index.addId(imdbId);
      contributed = true;
    }

    const title = pickCell(row, TITLE_COLUMNS);
    if (title) {
      const yearRaw = pickCell(row, YEAR_COLUMNS);
      const year = /^\d{4}$/.test(yearRaw) ? Number.parseInt(yearRaw, 10) : null;
      const kind = kindFromTitleType(pickCell(row, TYPE_COLUMNS)) ?? 'movie';
      index.addTitle(kind, title, year);
      contributed = true;
    }

    if (contributed) used += 1;
  }
  return used;
}

export function filterUnseen<T extends Pick<CandidateItem, 'kind' | 'imdbId' | 'title' | 'year'>>(
  items: readonly T[],
  index: SeenIndex,
): T[] {
  return items.filter((item) => !index.has(item));
}

export function buildSeenIndexFromRatings(rows: readonly CsvRow[]): SeenIndex {
  const index = new SeenIndex();
  addRatingsRows(index, rows);
  return index;
}
