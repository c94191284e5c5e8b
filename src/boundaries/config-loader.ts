import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { z } from 'zod';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';

const ENV_REFERENCE = /\$\{([^}]+)\}/g;

/**
 * Replaces `${NAME}` in every string of a parsed YAML tree. References to
 * unset variables are left as written.
 */
export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REFERENCE, (match: string, name: string) => env[name.trim()] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => substituteEnvVars(item, env));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]: [string, unknown]) => [key, substituteEnvVars(item, env)])
    );
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Parses and validates YAML configuration text.
 */
export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env, origin = 'configuration'): Config {
  let raw: unknown;
  try {
    raw = YAML.parse(text) ?? {};
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'YAML parsing');
    throw new ConfigError(`Failed to parse ${origin}: ${err.message}`);
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${origin} must be a YAML mapping`);
  }

  const result = CONFIG_SCHEMA.safeParse(substituteEnvVars(raw, env));
  if (!result.success) {
    throw new ValidationError(`Invalid configuration in ${origin}: ${formatIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * Load and validate configuration from factweave.yaml.
 *
 * Without `configPath` the default file in `cwd` is optional and every
 * setting falls back to its default. An explicit path must exist.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const filePath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILENAME);

  if (!existsSync(filePath)) {
    if (configPath !== undefined) {
      throw new ConfigError(`Missing configuration file at ${filePath}`);
    }
    return CONFIG_SCHEMA.parse({});
  }

  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading configuration');
    throw new ConfigError(`Failed to read configuration file ${filePath}: ${err.message}`);
  }
  return parseConfig(text, env, filePath);
}
