import OpenAI from 'openai';
import { z } from 'zod';
import type { LLMProvider, LLMResult } from './llm-provider';
import { traceRequest, traceResponse, type ProviderOptions } from './provider-options';
import { OPENAI_RESPONSE_SCHEMA, type OpenAIResponse } from '../schemas/openai-responses';
import {
  APIResponseError,
  ModelProviderError,
  RateLimitError,
  ValidationError,
  handleUnknownError,
} from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export interface OpenAIConfig extends ProviderOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export const OpenAIDefaultConfig = {
  model: 'gpt-4o',
  maxTokens: 4000,
  temperature: 0.3,
};

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private options: ProviderOptions;
  private log: Logger;

  constructor(config: OpenAIConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
    this.model = config.model ?? OpenAIDefaultConfig.model;
    this.maxTokens = config.maxTokens ?? OpenAIDefaultConfig.maxTokens;
    this.temperature = config.temperature ?? OpenAIDefaultConfig.temperature;
    this.options = {
      ...(config.debug !== undefined && { debug: config.debug }),
      ...(config.showPrompt !== undefined && { showPrompt: config.showPrompt }),
    };
    this.log = createChildLogger('llm:openai');
  }

  /**
   * Validates OpenAI API response using schema validation
   */
  private validateResponse(response: unknown): OpenAIResponse {
    try {
      return OPENAI_RESPONSE_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new APIResponseError(
          `Invalid OpenAI API response structure: ${e.message}`,
          response,
          e
        );
      }
      const err = handleUnknownError(e, 'OpenAI response validation');
      throw new ValidationError(`OpenAI response validation failed: ${err.message}`, e);
    }
  }

  async complete(prompt: string): Promise<LLMResult<string>> {
    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
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
      rawResponse = await this.client.chat.completions.create(params);
    } catch (e: unknown) {
      // Handle specific OpenAI SDK errors - check more specific errors first
      if (e instanceof OpenAI.RateLimitError) {
        throw new RateLimitError(`OpenAI rate limit exceeded: ${e.message}`, this.name);
      }
      if (e instanceof OpenAI.AuthenticationError) {
        throw new ModelProviderError(`OpenAI authentication failed: ${e.message}`, this.name, 401);
      }
      if (e instanceof OpenAI.APIError) {
        throw new ModelProviderError(
          `OpenAI API error (${e.status ?? 'unknown'}): ${e.message}`,
          this.name,
          e.status
        );
      }
      const err = handleUnknownError(e, 'OpenAI API call');
      throw new ModelProviderError(`OpenAI API call failed: ${err.message}`, this.name);
    }

    const response = this.validateResponse(rawResponse);
    const firstChoice = response.choices[0];
    traceResponse(this.log, this.options, {
      usage: response.usage,
      finishReason: firstChoice?.finish_reason,
    });

    const text = firstChoice?.message.content?.trim();
    if (!text) {
      throw new APIResponseError('Empty response from OpenAI API (no content).', rawResponse);
    }

    return {
      data: text,
      ...(response.usage && {
        usage: {
          inputTokens: response.usage.prompt_tokens,
          outputTokens: response.usage.completion_tokens,
        },
      }),
    };
  }
}
