import { z } from 'zod';
import { CLI_OPTIONS_SCHEMA, CHECK_OPTIONS_SCHEMA, type CliOptions, type CheckOptions } from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  try {
    return schema.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const details = e.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ValidationError(`Invalid ${what} options: ${details}`, e);
    }
    const err = handleUnknownError(e, `${what} option parsing`);
    throw new ValidationError(`${what} option parsing failed: ${err.message}`);
  }
}

export function parseCliOptions(raw: unknown): CliOptions {
  return parseWith(CLI_OPTIONS_SCHEMA, raw, 'research');
}

export function parseCheckOptions(raw: unknown): CheckOptions {
  return parseWith(CHECK_OPTIONS_SCHEMA, raw, 'check');
}
