import type { SearchResult } from '../research/types';

/*
 * A web search backend. Implementations return at most `maxResults` items
 * and drop entries without a URL.
 */
export interface SearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<SearchResult[]>;
}
