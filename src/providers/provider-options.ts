import type { Logger } from '../logging/index';

export interface ProviderOptions {
  debug?: boolean;
  showPrompt?: boolean;
}

const PREVIEW_CHARS = 500;

/*
 * Request/response tracing shared by the model providers. Only active with
 * `debug`; the CLI lowers the log level to debug when --verbose is given.
 */
export function traceRequest(
  log: Logger,
  options: ProviderOptions,
  meta: Record<string, unknown>,
  prompt: string
): void {
  if (!options.debug) return;
  log.info(meta, 'Sending request');
  if (options.showPrompt) {
    log.info({ prompt }, 'Prompt (full)');
  } else {
    const preview = prompt.slice(0, PREVIEW_CHARS);
    log.info({ preview, truncated: prompt.length > PREVIEW_CHARS }, 'Prompt preview');
  }
}

export function traceResponse(log: Logger, options: ProviderOptions, meta: Record<string, unknown>): void {
  if (!options.debug) return;
  log.info(meta, 'LLM response meta');
}
