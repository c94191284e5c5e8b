import type { LLMProvider } from './llm-provider';
import { BackoffPolicy, retryWithBackoff, type Sleeper } from '../retry/backoff';
import { isRateLimitError } from '../errors/index';
import type { UsageTracker } from '../types/token-usage';
import { createChildLogger, type Logger } from '../logging/index';

/*
 * Text-completion seam used by the decomposer, extractor and synthesizer.
 */
export interface CompletionClient {
  call(prompt: string): Promise<string>;
}

export interface ModelClientOptions {
  policy?: BackoffPolicy;
  sleep?: Sleeper;
  usage?: UsageTracker;
}

/**
 * Wraps a provider with rate-limit retries. Only `RateLimitError` is retried;
 * every other failure propagates on the first attempt.
 */
export class ModelClient implements CompletionClient {
  private policy: BackoffPolicy;
  private sleep: Sleeper | undefined;
  private usage: UsageTracker | undefined;
  private log: Logger;

  constructor(private readonly provider: LLMProvider, options: ModelClientOptions = {}) {
    this.policy = options.policy ?? new BackoffPolicy();
    this.sleep = options.sleep;
    this.usage = options.usage;
    this.log = createChildLogger('llm');
  }

  get providerName(): string {
    return this.provider.name;
  }

  async call(prompt: string): Promise<string> {
    const result = await retryWithBackoff(() => this.provider.complete(prompt), {
      policy: this.policy,
      shouldRetry: isRateLimitError,
      ...(this.sleep && { sleep: this.sleep }),
      onRetry: ({ attempt, delayMs }) => {
        this.log.warn(
          { provider: this.provider.name, attempt: attempt + 1, delayMs },
          'Rate limited, backing off'
        );
      },
    });
    this.usage?.record(result.usage);
    return result.data;
  }
}
