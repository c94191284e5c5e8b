import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ProviderType } from '../providers/provider-factory';
import { ValidationError, handleUnknownError } from '../errors/index';

const PROVIDER_LABELS: Record<ProviderType, { label: string; prefix: string; key: string }> = {
  [ProviderType.Anthropic]: { label: 'Anthropic', prefix: 'ANTHROPIC_', key: 'ANTHROPIC_API_KEY' },
  [ProviderType.OpenAI]: { label: 'OpenAI', prefix: 'OPENAI_', key: 'OPENAI_API_KEY' },
  [ProviderType.Gemini]: { label: 'Gemini', prefix: 'GEMINI_', key: 'GEMINI_API_KEY' },
};

function isProviderType(value: unknown): value is ProviderType {
  return typeof value === 'string' && Object.values<string>(ProviderType).includes(value);
}

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      // Zod error - provide specific error messages for missing provider-specific variables
      const errorMessage = formatProviderValidationError(e, env);
      throw new ValidationError(`Invalid environment variables: ${errorMessage}`, e);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}

function formatProviderValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;
  const providerValue: unknown =
    typeof env === 'object' && env !== null && 'LLM_PROVIDER' in env ? env.LLM_PROVIDER : undefined;
  const providerType = isProviderType(providerValue) ? providerValue : ProviderType.Anthropic;

  // Check for discriminated union errors (invalid provider type)
  const discriminatorIssue = issues.find(
    (issue) =>
      issue.code === 'invalid_union_discriminator' ||
      (issue.path.length === 1 && issue.path[0] === 'LLM_PROVIDER')
  );
  if (discriminatorIssue) {
    const allowed = Object.values(ProviderType)
      .map((p) => `'${p}'`)
      .join(', ');
    return `LLM_PROVIDER must be one of ${allowed}. Received: ${String(providerValue ?? 'undefined')}`;
  }

  // Check for missing required fields of the selected provider
  const missingFields = issues
    .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map((issue) => issue.path.join('.'));
  const { label, prefix, key } = PROVIDER_LABELS[providerType];
  const providerFields = missingFields.filter((field) => field.startsWith(prefix));
  if (providerFields.length > 0) {
    return `Missing required ${label} environment variables: ${providerFields.join(', ')}. When using LLM_PROVIDER=${providerType}, ensure ${key} is set.`;
  }

  // Check for validation errors (e.g., number out of range)
  const fieldErrors = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  if (fieldErrors.length > 0) {
    return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
  }

  // Fallback to original error message
  return zodError.message;
}
