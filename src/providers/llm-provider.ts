import type { TokenUsage } from '../types/token-usage';

export interface LLMResult<T> {
  data: T;
  usage?: TokenUsage;
}

/*
 * A single-turn text completion against an external model service.
 * Implementations surface rate limits as RateLimitError and other provider
 * failures as ModelProviderError; they never retry on their own.
 */
export interface LLMProvider {
  readonly name: string;
  complete(prompt: string): Promise<LLMResult<string>>;
}
