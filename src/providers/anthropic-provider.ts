import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { LLMProvider, LLMResult } from './llm-provider';
import { traceRequest, traceResponse, type ProviderOptions } from './provider-options';
import { ANTHROPIC_RESPONSE_SCHEMA, type AnthropicResponse, responseText } from '../schemas/anthropic-responses';
import {
  APIResponseError,
  ModelProviderError,
  RateLimitError,
  ValidationError,
  handleUnknownError,
} from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export interface AnthropicConfig extends ProviderOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export const AnthropicDefaultConfig = {
  model: 'claude-3-5-sonnet-20241022',
  maxTokens: 4000,
  temperature: 0.3,
};

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic;
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private options: ProviderOptions;
  private log: Logger;

  constructor(config: AnthropicConfig) {
    // Retries are owned by ModelClient
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
    this.model = config.model ?? AnthropicDefaultConfig.model;
    this.maxTokens = config.maxTokens ?? AnthropicDefaultConfig.maxTokens;
    this.temperature = config.temperature ?? AnthropicDefaultConfig.temperature;
    this.options = {
      ...(config.debug !== undefined && { debug: config.debug }),
      ...(config.showPrompt !== undefined && { showPrompt: config.showPrompt }),
    };
    this.log = createChildLogger('llm:anthropic');
  }

  /**
   * Validates Anthropic API response using schema validation
   */
  private validateResponse(response: unknown): AnthropicResponse {
    try {
      return ANTHROPIC_RESPONSE_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new APIResponseError(
          `Invalid Anthropic API response structure: ${e.message}`,
          response,
          e
        );
      }
      const err = handleUnknownError(e, 'Anthropic response validation');
      throw new ValidationError(`Anthropic response validation failed: ${err.message}`, e);
    }
  }

  async complete(prompt: string): Promise<LLMResult<string>> {
    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      messages: [{ role: 'user', content: prompt }],
    };

    traceRequest(
      this.log,
      this.options,
      { model: this.model, maxTokens: this.maxTokens, temperature: this.temperature },
      prompt
    );

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.messages.create(params);
    } catch (e: unknown) {
      // RateLimitError extends APIError, so it is checked first
      if (e instanceof Anthropic.RateLimitError) {
        throw new RateLimitError(`Anthropic rate limit exceeded: ${e.message}`, this.name);
      }
      if (e instanceof Anthropic.AuthenticationError) {
        throw new ModelProviderError(`Anthropic authentication failed: ${e.message}`, this.name, 401);
      }
      if (e instanceof Anthropic.APIError) {
        throw new ModelProviderError(
          `Anthropic API error (${e.status ?? 'unknown'}): ${e.message}`,
          this.name,
          e.status
        );
      }
      const err = handleUnknownError(e, 'Anthropic API call');
      throw new ModelProviderError(`Anthropic API call failed: ${err.message}`, this.name);
    }

    const response = this.validateResponse(rawResponse);
    traceResponse(this.log, this.options, {
      usage: response.usage,
      stopReason: response.stop_reason,
    });

    const text = responseText(response.content);
    if (!text.trim()) {
      throw new APIResponseError('Empty response from Anthropic API (no text content).', response);
    }

    return {
      data: text,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}
