import type { LLMProvider } from './llm-provider';
import type { ProviderOptions } from './provider-options';
import { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
import { OpenAIProvider, type OpenAIConfig } from './openai-provider';
import { GeminiProvider, type GeminiConfig } from './gemini-provider';
import type { EnvConfig } from '../schemas/env-schemas';

export enum ProviderType {
  Anthropic = 'anthropic',
  OpenAI = 'openai',
  Gemini = 'gemini',
}

/**
 * Creates the appropriate LLM provider based on environment configuration
 * @param envConfig - Validated environment configuration
 * @param options - Debug and display options
 */
export function createProvider(envConfig: EnvConfig, options: ProviderOptions = {}): LLMProvider {
  const display: ProviderOptions = {
    ...(options.debug !== undefined && { debug: options.debug }),
    ...(options.showPrompt !== undefined && { showPrompt: options.showPrompt }),
  };

  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.Anthropic: {
      const anthropicConfig: AnthropicConfig = {
        apiKey: envConfig.ANTHROPIC_API_KEY,
        model: envConfig.ANTHROPIC_MODEL,
        maxTokens: envConfig.ANTHROPIC_MAX_TOKENS,
        ...(envConfig.ANTHROPIC_TEMPERATURE !== undefined && { temperature: envConfig.ANTHROPIC_TEMPERATURE }),
        ...display,
      };
      return new AnthropicProvider(anthropicConfig);
    }

    case ProviderType.OpenAI: {
      const openaiConfig: OpenAIConfig = {
        apiKey: envConfig.OPENAI_API_KEY,
        model: envConfig.OPENAI_MODEL,
        maxTokens: envConfig.OPENAI_MAX_TOKENS,
        ...(envConfig.OPENAI_TEMPERATURE !== undefined && { temperature: envConfig.OPENAI_TEMPERATURE }),
        ...display,
      };
      return new OpenAIProvider(openaiConfig);
    }

    case ProviderType.Gemini: {
      const geminiConfig: GeminiConfig = {
        apiKey: envConfig.GEMINI_API_KEY,
        model: envConfig.GEMINI_MODEL,
        ...(envConfig.GEMINI_TEMPERATURE !== undefined && { temperature: envConfig.GEMINI_TEMPERATURE }),
        ...display,
      };
      return new GeminiProvider(geminiConfig);
    }
  }
}
