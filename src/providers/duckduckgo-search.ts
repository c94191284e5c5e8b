import * as cheerio from 'cheerio';
import type { SearchProvider } from './search-provider';
import type { SearchResult } from '../research/types';
import { fetchWithTimeout } from '../fetch/http';
import { BackoffPolicy, retryWithBackoff, type Sleeper } from '../retry/backoff';
import { SearchProviderError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export interface DuckDuckGoSearchConfig {
  userAgent: string;
  timeoutMs: number;
  policy?: BackoffPolicy;
  sleep?: Sleeper;
}

const DUCKDUCKGO_HTML_ENDPOINT = 'https://html.duckduckgo.com/html/';

/**
 * Resolves a result link from the HTML endpoint to the target page.
 * DuckDuckGo wraps targets as `//duckduckgo.com/l/?uddg=<encoded url>`;
 * other DuckDuckGo-internal links resolve to null.
 */
export function resolveResultUrl(href: string): string | null {
  let absolute = href;
  if (href.startsWith('//')) {
    absolute = `https:${href}`;
  } else if (href.startsWith('/')) {
    absolute = `https://duckduckgo.com${href}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(absolute);
  } catch {
    return null;
  }

  if (parsed.hostname === 'duckduckgo.com' || parsed.hostname.endsWith('.duckduckgo.com')) {
    const target = parsed.searchParams.get('uddg');
    return target && /^https?:\/\//.test(target) ? target : null;
  }
  return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.toString() : null;
}

export function parseDuckDuckGoResults(html: string, maxResults: number): SearchResult[] {
  const $ = cheerio.load(html);
  const results: SearchResult[] = [];

  $('.result').each((_, element) => {
    if (results.length >= maxResults) return false;
    const result = $(element);
    if (result.hasClass('result--ad')) return;

    const link = result.find('a.result__a').first();
    const href = link.attr('href');
    if (!href) return;
    const url = resolveResultUrl(href);
    if (!url) return;

    results.push({
      url,
      title: link.text().trim() || url,
      snippet: result.find('.result__snippet').first().text().trim(),
    });
  });

  return results;
}

export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = 'duckduckgo';
  private userAgent: string;
  private timeoutMs: number;
  private policy: BackoffPolicy;
  private sleep: Sleeper | undefined;
  private log: Logger;

  constructor(config: DuckDuckGoSearchConfig) {
    this.userAgent = config.userAgent;
    this.timeoutMs = config.timeoutMs;
    this.policy = config.policy ?? new BackoffPolicy();
    this.sleep = config.sleep;
    this.log = createChildLogger('search:duckduckgo');
  }

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const html = await retryWithBackoff(() => this.fetchPage(query), {
      policy: this.policy,
      shouldRetry: () => true,
      ...(this.sleep && { sleep: this.sleep }),
      onRetry: ({ attempt, delayMs, error }) => {
        this.log.warn({ query, attempt: attempt + 1, delayMs, err: error }, 'DuckDuckGo search failed, retrying');
      },
    });

    const results = parseDuckDuckGoResults(html, maxResults);
    this.log.debug({ query, count: results.length }, 'DuckDuckGo results');
    return results;
  }

  private async fetchPage(query: string): Promise<string> {
    const params = new URLSearchParams({ q: query });
    return fetchWithTimeout(
      `${DUCKDUCKGO_HTML_ENDPOINT}?${params.toString()}`,
      { headers: { 'User-Agent': this.userAgent, Accept: 'text/html' } },
      this.timeoutMs,
      async (response) => {
        if (!response.ok) {
          throw new SearchProviderError(`DuckDuckGo search failed: ${response.status}`, this.name, response.status);
        }
        return response.text();
      }
    );
  }
}
