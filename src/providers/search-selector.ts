import type { SearchProvider } from './search-provider';
import { DuckDuckGoSearchProvider } from './duckduckgo-search';
import { GoogleSearchProvider } from './google-search';
import { PerplexitySearchProvider } from './perplexity-search';
import type { SearchResult } from '../research/types';
import type { SearchConfig, SearchMode } from '../schemas/config-schemas';
import type { SharedEnvConfig } from '../schemas/env-schemas';
import type { BackoffPolicy, Sleeper } from '../retry/backoff';
import { ConfigError, handleUnknownError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

/*
 * Search seam used by the orchestrator.
 */
export interface SearchClient {
  search(query: string, maxResults: number): Promise<SearchResult[]>;
}

/**
 * Tries each backend in order and returns the first non-empty result set.
 * A failing backend counts as empty. Never throws.
 */
export class SearchSelector implements SearchClient {
  private log: Logger;

  constructor(
    readonly mode: SearchMode,
    private readonly strategies: readonly SearchProvider[]
  ) {
    if (strategies.length === 0) {
      throw new ConfigError(`No search providers available for mode '${mode}'`);
    }
    this.log = createChildLogger('search:selector');
  }

  get providerNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    for (const strategy of this.strategies) {
      let results: SearchResult[];
      try {
        results = await strategy.search(query, maxResults);
      } catch (e: unknown) {
        const err = handleUnknownError(e, `Search via ${strategy.name}`);
        this.log.warn({ provider: strategy.name, query, err }, 'Search provider failed');
        continue;
      }
      if (results.length > 0) {
        this.log.info({ provider: strategy.name, query, count: results.length }, 'Search results');
        return results;
      }
      this.log.debug({ provider: strategy.name, query }, 'Search provider returned no results');
    }
    this.log.warn({ query }, 'No search results from any provider');
    return [];
  }
}

export interface SearchSelectorOptions {
  policy?: BackoffPolicy;
  sleep?: Sleeper;
}

export function createSearchSelector(
  config: SearchConfig,
  env: Partial<SharedEnvConfig>,
  options: SearchSelectorOptions = {}
): SearchSelector {
  const timeoutMs = config.timeoutSeconds * 1000;

  const duckduckgo = (): SearchProvider =>
    new DuckDuckGoSearchProvider({
      userAgent: config.userAgent,
      timeoutMs,
      ...(options.policy && { policy: options.policy }),
      ...(options.sleep && { sleep: options.sleep }),
    });
  const google = (): SearchProvider | undefined =>
    env.GOOGLE_CSE_API_KEY && env.GOOGLE_CSE_ID
      ? new GoogleSearchProvider({ apiKey: env.GOOGLE_CSE_API_KEY, cx: env.GOOGLE_CSE_ID, timeoutMs })
      : undefined;
  const perplexity = (): SearchProvider | undefined =>
    env.PERPLEXITY_API_KEY ? new PerplexitySearchProvider({ apiKey: env.PERPLEXITY_API_KEY, timeoutMs }) : undefined;

  switch (config.provider) {
    case 'duckduckgo':
      return new SearchSelector(config.provider, [duckduckgo()]);
    case 'google': {
      const provider = google();
      if (!provider) {
        throw new ConfigError('Google search requires GOOGLE_CSE_API_KEY and GOOGLE_CSE_ID');
      }
      return new SearchSelector(config.provider, [provider]);
    }
    case 'perplexity': {
      const provider = perplexity();
      if (!provider) {
        throw new ConfigError('Perplexity search requires PERPLEXITY_API_KEY');
      }
      return new SearchSelector(config.provider, [provider]);
    }
    case 'auto': {
      const strategies: SearchProvider[] = [duckduckgo()];
      const g = google();
      if (g) strategies.push(g);
      const p = perplexity();
      if (p) strategies.push(p);
      return new SearchSelector(config.provider, strategies);
    }
  }
}
