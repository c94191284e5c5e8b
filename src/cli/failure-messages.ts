import {
  ConfigError,
  ModelProviderError,
  NoSourcesError,
  RateLimitError,
  SearchProviderError,
  ValidationError,
  handleUnknownError,
} from '../errors/index';

/**
 * User-facing lines for an error that ended a CLI run, one kind per branch.
 */
export function describeFailure(e: unknown): string[] {
  if (e instanceof NoSourcesError) {
    return [
      `Error: ${e.message}`,
      `Searched ${e.subQueries.length} sub-quer${e.subQueries.length === 1 ? 'y' : 'ies'}; every search came back empty or every page failed to load.`,
    ];
  }
  if (e instanceof ConfigError) {
    return [`Configuration error: ${e.message}`, 'Check factweave.yaml and the search credentials in your environment.'];
  }
  if (e instanceof ValidationError) {
    return [`Error: ${e.message}`, 'Please set these in your .env file or environment.'];
  }
  if (e instanceof RateLimitError) {
    return [`Rate limited by ${e.provider}: ${e.message}`, 'Wait a moment and try again, or raise llm.maxAttempts.'];
  }
  if (e instanceof ModelProviderError) {
    const status = e.status !== undefined ? ` (status ${e.status})` : '';
    return [`Language model error from ${e.provider}${status}: ${e.message}`];
  }
  if (e instanceof SearchProviderError) {
    return [`Search error from ${e.provider}: ${e.message}`];
  }
  const err = handleUnknownError(e, 'Research run');
  return [`Unexpected error: ${err.message}`];
}
