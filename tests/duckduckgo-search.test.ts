import { describe, it, expect, vi, beforeEach } from 'vitest';
import { readFileSync } from 'fs';
import fetch, { Response } from 'node-fetch';
import {
  DuckDuckGoSearchProvider,
  parseDuckDuckGoResults,
  resolveResultUrl,
} from '../src/providers/duckduckgo-search';
import { BackoffPolicy } from '../src/retry/backoff';
import { SearchProviderError } from '../src/errors/index';
import { recordingSleep } from './utils';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const HTML = readFileSync(new URL('./fixtures/duckduckgo-results.html', import.meta.url), 'utf-8');
const FETCH = vi.mocked(fetch);

describe('resolveResultUrl', () => {
  it('unwraps uddg redirect links', () => {
    expect(resolveResultUrl('//duckduckgo.com/l/?uddg=https%3A%2F%2Fa.example%2Fpage&rut=x')).toBe(
      'https://a.example/page'
    );
  });

  it('keeps direct links', () => {
    expect(resolveResultUrl('https://b.example/x?y=1')).toBe('https://b.example/x?y=1');
  });

  it('drops internal and non-web links', () => {
    expect(resolveResultUrl('/settings')).toBeNull();
    expect(resolveResultUrl('https://duckduckgo.com/y.js?ad=1')).toBeNull();
    expect(resolveResultUrl('mailto:someone@example.com')).toBeNull();
  });
});

describe('parseDuckDuckGoResults', () => {
  it('extracts organic results in page order', () => {
    expect(parseDuckDuckGoResults(HTML, 10)).toEqual([
      {
        url: 'https://energy.example/heat-pumps?ref=1',
        title: 'How Heat Pumps Work',
        snippet: 'Heat pumps move heat rather than generate it.',
      },
      {
        url: 'https://direct.example/cold-climate',
        title: 'Cold Climate Performance',
        snippet: 'Modern units work below freezing.',
      },
      {
        url: 'https://third.example/defrost',
        title: 'Defrost Cycles Explained',
        snippet: 'Why outdoor coils ice up.',
      },
    ]);
  });

  it('stops at maxResults', () => {
    expect(parseDuckDuckGoResults(HTML, 2).map((r) => r.url)).toEqual([
      'https://energy.example/heat-pumps?ref=1',
      'https://direct.example/cold-climate',
    ]);
  });
});

describe('DuckDuckGoSearchProvider', () => {
  beforeEach(() => {
    FETCH.mockReset();
  });

  it('queries the HTML endpoint with the configured user agent', async () => {
    FETCH.mockResolvedValue(new Response(HTML, { status: 200, headers: { 'content-type': 'text/html' } }));
    const provider = new DuckDuckGoSearchProvider({ userAgent: 'test-agent/1.0', timeoutMs: 1000 });

    const results = await provider.search('heat pumps', 5);

    expect(results).toHaveLength(3);
    const [url, init] = FETCH.mock.calls[0] ?? [];
    expect(url).toBe('https://html.duckduckgo.com/html/?q=heat+pumps');
    expect(init?.headers).toEqual({ 'User-Agent': 'test-agent/1.0', Accept: 'text/html' });
  });

  it('retries failed requests with backoff', async () => {
    const { sleep, delays } = recordingSleep();
    FETCH.mockResolvedValueOnce(new Response('busy', { status: 503 })).mockResolvedValueOnce(
      new Response(HTML, { status: 200 })
    );
    const provider = new DuckDuckGoSearchProvider({ userAgent: 'ua', timeoutMs: 1000, sleep });

    const results = await provider.search('heat pumps', 1);

    expect(results.map((r) => r.title)).toEqual(['How Heat Pumps Work']);
    expect(delays).toEqual([1000]);
  });

  it('throws after the last attempt fails', async () => {
    const { sleep, delays } = recordingSleep();
    FETCH.mockImplementation(() => Promise.resolve(new Response('nope', { status: 500 })));
    const provider = new DuckDuckGoSearchProvider({
      userAgent: 'ua',
      timeoutMs: 1000,
      sleep,
      policy: new BackoffPolicy({ maxAttempts: 3 }),
    });

    await expect(provider.search('anything', 5)).rejects.toBeInstanceOf(SearchProviderError);
    expect(FETCH).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });
});
