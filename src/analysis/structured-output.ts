import type { z } from 'zod';
import { StructuredOutputError } from '../errors/index';

export interface StructuredOutputOptions {
  open: string;
  close: string;
  label: string;
}

const PREVIEW_CHARS = 200;

type ParseAttempt<T> = { ok: true; value: T } | { ok: false; reason: string };

function tryParse<S extends z.ZodTypeAny>(text: string, schema: S): ParseAttempt<z.output<S>> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e: unknown) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    return { ok: false, reason: result.error.issues.map((i) => i.message).join('; ') };
  }
  return { ok: true, value: result.data };
}

/**
 * Parses model output as JSON validated by `schema`.
 *
 * The whole (trimmed) text is tried first. If that fails, the substring from
 * the first `open` to the last `close` delimiter is tried once, which covers
 * models that wrap JSON in prose or code fences.
 *
 * @throws StructuredOutputError when neither attempt yields a valid value
 */
export function parseStructuredOutput<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  options: StructuredOutputOptions
): z.output<S> {
  const trimmed = text.trim();
  const direct = tryParse(trimmed, schema);
  if (direct.ok) return direct.value;

  const preview = trimmed.slice(0, PREVIEW_CHARS);
  const start = trimmed.indexOf(options.open);
  const end = trimmed.lastIndexOf(options.close);
  if (start === -1 || end < start) {
    throw new StructuredOutputError(`no ${options.open}…${options.close} block found`, options.label, preview);
  }

  const recovered = tryParse(trimmed.slice(start, end + options.close.length), schema);
  if (recovered.ok) return recovered.value;
  throw new StructuredOutputError(recovered.reason, options.label, preview);
}
