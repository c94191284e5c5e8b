import Perplexity from '@perplexity-ai/perplexity_ai';
import type { SearchProvider } from './search-provider';
import type { SearchResult } from '../research/types';
import { PERPLEXITY_RESPONSE_SCHEMA } from '../schemas/perplexity-responses';
import { SearchProviderError, handleUnknownError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export interface PerplexitySearchConfig {
  apiKey: string;
  timeoutMs: number;
  maxTokensPerPage?: number;
}

export class PerplexitySearchProvider implements SearchProvider {
  readonly name = 'perplexity';
  private client: Perplexity;
  private maxTokensPerPage: number;
  private log: Logger;

  constructor(config: PerplexitySearchConfig) {
    // The selector falls through to the next backend instead of retrying
    this.client = new Perplexity({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
    this.maxTokensPerPage = config.maxTokensPerPage ?? 1024;
    this.log = createChildLogger('search:perplexity');
  }

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    if (!query.trim()) throw new SearchProviderError('Search query cannot be empty.', this.name);

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.search.create({
        query,
        max_results: maxResults,
        max_tokens_per_page: this.maxTokensPerPage,
      });
    } catch (e: unknown) {
      if (e instanceof Perplexity.APIError) {
        throw new SearchProviderError(`Perplexity search failed: ${e.status ?? 'unknown'}`, this.name, e.status);
      }
      const err = handleUnknownError(e, 'Perplexity search');
      throw new SearchProviderError(`Perplexity API call failed: ${err.message}`, this.name);
    }

    /*
     * Validate response with schema at boundary.
     * Schema provides defaults for missing fields.
     */
    const parsed = PERPLEXITY_RESPONSE_SCHEMA.safeParse(rawResponse);
    if (!parsed.success) {
      throw new SearchProviderError(`Unexpected Perplexity response: ${parsed.error.message}`, this.name);
    }

    const results = parsed.data.results
      .filter((r) => r.url !== '')
      .slice(0, maxResults)
      .map((r) => ({ url: r.url, title: r.title, snippet: r.snippet }));
    this.log.debug({ query, count: results.length }, 'Perplexity results');
    return results;
  }
}
