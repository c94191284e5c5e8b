import { describe, it, expect, vi } from 'vitest';
import { ModelClient } from '../src/providers/model-client';
import type { LLMProvider, LLMResult } from '../src/providers/llm-provider';
import { BackoffPolicy } from '../src/retry/backoff';
import { ModelProviderError, RateLimitError } from '../src/errors/index';
import { UsageTracker } from '../src/types/token-usage';
import { recordingSleep } from './utils';

function providerWith(complete: (prompt: string) => Promise<LLMResult<string>>): LLMProvider {
  return { name: 'fake', complete: vi.fn(complete) };
}

describe('ModelClient', () => {
  it('returns the provider text and records usage', async () => {
    const usage = new UsageTracker();
    const provider = providerWith(() =>
      Promise.resolve({ data: '["a"]', usage: { inputTokens: 12, outputTokens: 3 } })
    );
    const client = new ModelClient(provider, { usage });

    await expect(client.call('prompt')).resolves.toBe('["a"]');
    expect(usage.stats()).toEqual({ totalInputTokens: 12, totalOutputTokens: 3, calls: 1 });
  });

  it('retries rate limits with 1s then 2s backoff', async () => {
    const { sleep, delays } = recordingSleep();
    const complete = vi
      .fn<(prompt: string) => Promise<LLMResult<string>>>()
      .mockRejectedValueOnce(new RateLimitError('slow down', 'fake'))
      .mockRejectedValueOnce(new RateLimitError('slow down', 'fake'))
      .mockResolvedValueOnce({ data: 'ok' });
    const client = new ModelClient({ name: 'fake', complete }, { sleep });

    await expect(client.call('p')).resolves.toBe('ok');
    expect(complete).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('rethrows the rate limit after the attempt budget', async () => {
    const { sleep, delays } = recordingSleep();
    const complete = vi
      .fn<(prompt: string) => Promise<LLMResult<string>>>()
      .mockRejectedValue(new RateLimitError('slow down', 'fake'));
    const client = new ModelClient({ name: 'fake', complete }, { sleep, policy: new BackoffPolicy({ maxAttempts: 3 }) });

    await expect(client.call('p')).rejects.toBeInstanceOf(RateLimitError);
    expect(complete).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('does not retry other provider errors', async () => {
    const { sleep, delays } = recordingSleep();
    const complete = vi
      .fn<(prompt: string) => Promise<LLMResult<string>>>()
      .mockRejectedValue(new ModelProviderError('bad request', 'fake', 400));
    const client = new ModelClient({ name: 'fake', complete }, { sleep });

    await expect(client.call('p')).rejects.toBeInstanceOf(ModelProviderError);
    expect(complete).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('exposes the provider name', () => {
    expect(new ModelClient(providerWith(() => Promise.resolve({ data: 'x' }))).providerName).toBe('fake');
  });
});
