import type { DocumentItem } from '../types';

/**
 * Case-insensitive substring search over item content.
 *
 * Matches the source content only, never override text. The result is
 * cached until either the item sequence (by identity) or the query changes.
 */
export class SearchMatcher {
  private lastItems: readonly DocumentItem[] | null = null;
  private lastQuery = '';
  private lastResult: ReadonlySet<string> = new Set();

  match(items: readonly DocumentItem[], query: string): ReadonlySet<string> {
    if (items === this.lastItems && query === this.lastQuery) {
      return this.lastResult;
    }

    this.lastItems = items;
    this.lastQuery = query;
    this.lastResult = matchItems(items, query);
    return this.lastResult;
  }

  /**
   * Drop the cached result.
   */
  reset(): void {
    this.lastItems = null;
    this.lastQuery = '';
    this.lastResult = new Set();
  }
}

/**
 * Ids of items whose content contains the query, ignoring case.
 * The empty query matches nothing.
 */
export function matchItems(items: readonly DocumentItem[], query: string): Set<string> {
  const result = new Set<string>();
  if (query.length === 0) {
    return result;
  }

  const needle = query.toLowerCase();
  for (const item of items) {
    if (item.content.toLowerCase().includes(needle)) {
      result.add(item.id);
    }
  }
  return result;
}
