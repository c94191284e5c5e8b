import type { Response } from 'node-fetch';
import { fetchWithTimeout, isAbortError, readTextCapped } from './http';
import { extractReadableText } from './html-extractor';
import { BackoffPolicy, retryWithBackoff, type Sleeper } from '../retry/backoff';
import { handleUnknownError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

/*
 * Page-fetch seam used by the orchestrator. Resolves to null for any page
 * that cannot be turned into text.
 */
export interface PageFetcher {
  fetch(url: string): Promise<string | null>;
}

export interface ContentFetcherConfig {
  userAgent: string;
  timeoutMs: number;
  retryAttempts: number;
  maxContentWords: number;
  baseDelayMs?: number;
  // Bytes of body read before the rest is dropped
  maxBytes?: number;
  sleep?: Sleeper;
}

const DEFAULT_MAX_BYTES = 2_000_000;

// Thrown inside the attempt loop for failures worth another attempt
class TransientFetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransientFetchError';
  }
}

export function truncateWords(text: string, maxWords: number): { text: string; words: number; truncated: boolean } {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  if (words.length <= maxWords) {
    return { text: words.join(' '), words: words.length, truncated: false };
  }
  return { text: words.slice(0, maxWords).join(' '), words: maxWords, truncated: true };
}

function isHtml(contentType: string): boolean {
  return contentType === '' || contentType.includes('text/html') || contentType.includes('application/xhtml');
}

export class ContentFetcher implements PageFetcher {
  private config: ContentFetcherConfig;
  private policy: BackoffPolicy;
  private log: Logger;

  constructor(config: ContentFetcherConfig) {
    this.config = config;
    this.policy = new BackoffPolicy({
      maxAttempts: config.retryAttempts,
      baseDelayMs: config.baseDelayMs ?? 1000,
      multiplier: 2,
    });
    this.log = createChildLogger('fetch');
  }

  async fetch(url: string): Promise<string | null> {
    this.log.info({ url }, 'Fetching content');
    let body: string | null;
    try {
      body = await retryWithBackoff((attempt) => this.attempt(url, attempt), {
        policy: this.policy,
        shouldRetry: (e) => e instanceof TransientFetchError,
        ...(this.config.sleep && { sleep: this.config.sleep }),
        onRetry: ({ attempt, delayMs }) => {
          this.log.info({ url, nextAttempt: attempt + 2, of: this.policy.maxAttempts, delayMs }, 'Retrying fetch');
        },
      });
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Fetching ${url}`);
      this.log.warn({ url, err }, 'All fetch attempts failed');
      return null;
    }
    if (body === null) return null;

    if (!body) {
      this.log.warn({ url }, 'No content extracted');
      return null;
    }

    const { text, words, truncated } = truncateWords(body, this.config.maxContentWords);
    if (truncated) {
      this.log.info({ url, maxWords: this.config.maxContentWords }, 'Truncated content');
    }
    this.log.info({ url, words, chars: text.length }, 'Fetched content');
    return text;
  }

  /*
   * One GET, body included. Resolves to extracted text, or null when the page
   * is not worth retrying; throws TransientFetchError for 5xx and timeouts.
   */
  private async attempt(url: string, attempt: number): Promise<string | null> {
    try {
      return await fetchWithTimeout(
        url,
        { headers: { 'User-Agent': this.config.userAgent }, redirect: 'follow' },
        this.config.timeoutMs,
        (response) => this.readPage(url, response)
      );
    } catch (e: unknown) {
      if (e instanceof TransientFetchError) throw e;
      if (isAbortError(e)) {
        this.log.warn({ url, attempt: attempt + 1 }, 'Timeout fetching page');
        throw new TransientFetchError(`Timeout fetching ${url}`);
      }
      const err = handleUnknownError(e, `Request to ${url}`);
      this.log.warn({ url, err }, 'Request error');
      return null;
    }
  }

  private async readPage(url: string, response: Response): Promise<string | null> {
    const status = response.status;
    if (status >= 500) {
      this.log.warn({ url, status }, 'Server error');
      throw new TransientFetchError(`Server error (${status}) for ${url}`);
    }
    if (status === 404) {
      this.log.warn({ url }, 'Page not found (404)');
      return null;
    }
    if (status === 403) {
      this.log.warn({ url }, 'Access denied (403), likely paywall');
      return null;
    }
    if (!response.ok) {
      this.log.warn({ url, status }, 'HTTP error');
      return null;
    }

    const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
    const plain = contentType.includes('text/plain');
    if (!plain && !isHtml(contentType)) {
      this.log.warn({ url, contentType }, 'Unsupported content type');
      return null;
    }

    const maxBytes = this.config.maxBytes ?? DEFAULT_MAX_BYTES;
    const { text, truncated } = await readTextCapped(response, maxBytes);
    if (truncated) {
      this.log.info({ url, maxBytes }, 'Body cut at byte limit');
    }
    return plain ? text.trim() : extractReadableText(text);
  }
}
