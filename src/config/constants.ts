/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = 'factweave.yaml';
export const ENV_FILES = ['.env', '.env.local'] as const;
