// Base error class for all factweave errors
export class FactweaveError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'FactweaveError';
  }
}

// Validation error for schema validation failures
export class ValidationError extends FactweaveError {
  constructor(message: string, public override readonly cause?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Provider response that does not match the expected structure
export class APIResponseError extends ValidationError {
  constructor(message: string, public readonly response: unknown, cause?: unknown) {
    super(`API Response Error: ${message}`, cause);
    this.name = 'APIResponseError';
  }
}

// Model output that could not be parsed against its schema
export class StructuredOutputError extends ValidationError {
  constructor(
    message: string,
    public readonly label: string,
    public readonly preview: string,
    cause?: unknown
  ) {
    super(`Structured output error (${label}): ${message}`, cause);
    this.name = 'StructuredOutputError';
  }
}

// Configuration error for config file, credential and provider setup issues
export class ConfigError extends FactweaveError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Rate-limit response from a language-model provider
export class RateLimitError extends FactweaveError {
  constructor(message: string, public readonly provider: string) {
    super(message, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

// Any other provider-side failure; never retried
export class ModelProviderError extends FactweaveError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number | undefined
  ) {
    super(message, 'MODEL_PROVIDER_ERROR');
    this.name = 'ModelProviderError';
  }
}

// Search backend failure; the selector falls through to the next backend
export class SearchProviderError extends FactweaveError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number | undefined
  ) {
    super(message, 'SEARCH_PROVIDER_ERROR');
    this.name = 'SearchProviderError';
  }
}

// Raised when a run gathered zero sources across all sub-queries
export class NoSourcesError extends FactweaveError {
  constructor(
    public readonly question: string,
    public readonly subQueries: readonly string[]
  ) {
    super(
      'No sources found or all content fetches failed. Check your internet connection or try a different question.',
      'NO_SOURCES'
    );
    this.name = 'NoSourcesError';
  }
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
