import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OpenAIProvider, OpenAIDefaultConfig } from '../src/providers/openai-provider';
import { APIResponseError, ModelProviderError, RateLimitError } from '../src/errors/index';

// Hoist error classes to avoid TDZ issues
const MOCKS = vi.hoisted(() => {
  class APIError extends Error {
    status: number | undefined;
    constructor(message: string, status?: number) {
      super(message);
      this.name = 'APIError';
      this.status = status;
    }
  }
  class AuthenticationError extends APIError {
    constructor(message = 'Unauthorized') {
      super(message, 401);
      this.name = 'AuthenticationError';
    }
  }
  class RateLimitError extends APIError {
    constructor(message = 'Rate Limited') {
      super(message, 429);
      this.name = 'RateLimitError';
    }
  }
  return { create: vi.fn(), APIError, AuthenticationError, RateLimitError };
});

// Mock OpenAI SDK - must come before importing SUT
vi.mock('openai', () => {
  const OpenAI = Object.assign(
    vi.fn(function () {
      return { chat: { completions: { create: MOCKS.create } } };
    }),
    {
      APIError: MOCKS.APIError,
      AuthenticationError: MOCKS.AuthenticationError,
      RateLimitError: MOCKS.RateLimitError,
    }
  );
  return { default: OpenAI };
});

function completionWith(content: string | null) {
  return {
    id: 'chatcmpl-1',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 40, completion_tokens: 8, total_tokens: 48 },
  };
}

describe('OpenAIProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends the prompt as a user message with defaults', async () => {
    MOCKS.create.mockResolvedValue(completionWith('["a", "b", "c"]'));
    const provider = new OpenAIProvider({ apiKey: 'test-key' });

    await provider.complete('Split this');

    expect(MOCKS.create).toHaveBeenCalledWith({
      model: OpenAIDefaultConfig.model,
      max_tokens: OpenAIDefaultConfig.maxTokens,
      temperature: OpenAIDefaultConfig.temperature,
      messages: [{ role: 'user', content: 'Split this' }],
    });
  });

  it('returns trimmed content and usage', async () => {
    MOCKS.create.mockResolvedValue(completionWith('  {"facts": []}\n'));
    const provider = new OpenAIProvider({ apiKey: 'test-key', model: 'gpt-test' });

    await expect(provider.complete('p')).resolves.toEqual({
      data: '{"facts": []}',
      usage: { inputTokens: 40, outputTokens: 8 },
    });
  });

  it('maps rate limits before generic API errors', async () => {
    MOCKS.create.mockRejectedValue(new MOCKS.RateLimitError());
    const provider = new OpenAIProvider({ apiKey: 'test-key' });

    await expect(provider.complete('p')).rejects.toBeInstanceOf(RateLimitError);
  });

  it('maps API errors to ModelProviderError with the status', async () => {
    MOCKS.create.mockRejectedValue(new MOCKS.APIError('server exploded', 500));
    const provider = new OpenAIProvider({ apiKey: 'test-key' });

    const error = await provider.complete('p').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ModelProviderError);
    expect(error).toMatchObject({ provider: 'openai', status: 500 });
  });

  it('wraps unknown failures', async () => {
    MOCKS.create.mockRejectedValue(new Error('socket hang up'));
    const provider = new OpenAIProvider({ apiKey: 'test-key' });

    await expect(provider.complete('p')).rejects.toThrow('OpenAI API call failed: socket hang up');
  });

  it('rejects a response without choices', async () => {
    MOCKS.create.mockResolvedValue({ choices: [] });
    const provider = new OpenAIProvider({ apiKey: 'test-key' });

    await expect(provider.complete('p')).rejects.toBeInstanceOf(APIResponseError);
  });

  it('rejects null content', async () => {
    MOCKS.create.mockResolvedValue(completionWith(null));
    const provider = new OpenAIProvider({ apiKey: 'test-key' });

    await expect(provider.complete('p')).rejects.toThrow('Empty response from OpenAI API');
  });
});
