import { z } from 'zod';
import { ProviderType } from '../providers/provider-factory';
import { GeminiDefaultConfig } from '../providers/gemini-provider';
import { OpenAIDefaultConfig } from '../providers/openai-provider';
import { AnthropicDefaultConfig } from '../providers/anthropic-provider';

// Search credentials and pricing shared by every provider branch
const SHARED_ENV_SCHEMA = z.object({
  GOOGLE_CSE_API_KEY: z.string().min(1).optional(),
  GOOGLE_CSE_ID: z.string().min(1).optional(),
  PERPLEXITY_API_KEY: z.string().min(1).optional(),
  INPUT_PRICE_PER_MILLION: z.coerce.number().nonnegative().optional(),
  OUTPUT_PRICE_PER_MILLION: z.coerce.number().nonnegative().optional(),
});

// Anthropic configuration schema
const ANTHROPIC_CONFIG_SCHEMA = z.object({
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().default(AnthropicDefaultConfig.model),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(AnthropicDefaultConfig.maxTokens),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

// OpenAI configuration schema
const OPENAI_CONFIG_SCHEMA = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().default(OpenAIDefaultConfig.model),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(OpenAIDefaultConfig.maxTokens),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
});

// Gemini configuration schema
const GEMINI_CONFIG_SCHEMA = z.object({
  GEMINI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.string().default(GeminiDefaultConfig.model),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

// Discriminated union based on provider type
export const ENV_SCHEMA = z.discriminatedUnion('LLM_PROVIDER', [
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Anthropic) }).merge(ANTHROPIC_CONFIG_SCHEMA).merge(SHARED_ENV_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.OpenAI) }).merge(OPENAI_CONFIG_SCHEMA).merge(SHARED_ENV_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Gemini) }).merge(GEMINI_CONFIG_SCHEMA).merge(SHARED_ENV_SCHEMA),
]);

// Anthropic is the default provider when LLM_PROVIDER is not set
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess(
  (data: unknown) => {
    if (typeof data === 'object' && data !== null && !('LLM_PROVIDER' in data)) {
      return { ...data, LLM_PROVIDER: ProviderType.Anthropic };
    }
    return data;
  },
  ENV_SCHEMA
);

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
export type AnthropicEnvConfig = z.infer<typeof ANTHROPIC_CONFIG_SCHEMA>;
export type OpenAIEnvConfig = z.infer<typeof OPENAI_CONFIG_SCHEMA>;
export type GeminiEnvConfig = z.infer<typeof GEMINI_CONFIG_SCHEMA>;
export type SharedEnvConfig = z.infer<typeof SHARED_ENV_SCHEMA>;
