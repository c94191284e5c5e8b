import type { SearchProvider } from './search-provider';
import type { SearchResult } from '../research/types';
import { fetchWithTimeout } from '../fetch/http';
import { GOOGLE_CSE_RESPONSE_SCHEMA } from '../schemas/search-schemas';
import { SearchProviderError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export interface GoogleSearchConfig {
  apiKey: string;
  cx: string;
  timeoutMs: number;
}

const GOOGLE_CSE_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';
// Custom Search caps `num` at 10
const GOOGLE_CSE_MAX_NUM = 10;

export class GoogleSearchProvider implements SearchProvider {
  readonly name = 'google';
  private log: Logger;

  constructor(private readonly config: GoogleSearchConfig) {
    this.log = createChildLogger('search:google');
  }

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const params = new URLSearchParams({
      key: this.config.apiKey,
      cx: this.config.cx,
      q: query,
      num: String(Math.min(maxResults, GOOGLE_CSE_MAX_NUM)),
    });

    const body = await fetchWithTimeout(
      `${GOOGLE_CSE_ENDPOINT}?${params.toString()}`,
      { headers: { Accept: 'application/json' } },
      this.config.timeoutMs,
      async (response): Promise<unknown> => {
        if (!response.ok) {
          throw new SearchProviderError(`Google search failed: ${response.status}`, this.name, response.status);
        }
        return response.json();
      }
    );

    const parsed = GOOGLE_CSE_RESPONSE_SCHEMA.safeParse(body);
    if (!parsed.success) {
      throw new SearchProviderError(`Unexpected Google search response: ${parsed.error.message}`, this.name);
    }

    const results: SearchResult[] = [];
    for (const item of parsed.data.items) {
      if (!item.link) continue;
      results.push({ url: item.link, title: item.title ?? item.link, snippet: item.snippet ?? '' });
    }
    this.log.debug({ query, count: results.length }, 'Google results');
    return results.slice(0, maxResults);
  }
}
