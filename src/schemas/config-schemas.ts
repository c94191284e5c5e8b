import { z } from 'zod';

export const SEARCH_MODES = ['auto', 'duckduckgo', 'google', 'perplexity'] as const;

const SEARCH_CONFIG_SCHEMA = z.object({
  provider: z.enum(SEARCH_MODES).default('auto'),
  maxResultsPerQuery: z.coerce.number().int().positive().max(20).default(5),
  timeoutSeconds: z.coerce.number().positive().default(10),
  userAgent: z.string().min(1).default('Mozilla/5.0 (compatible; factweave/1.0)'),
});

const FETCHING_CONFIG_SCHEMA = z.object({
  timeoutSeconds: z.coerce.number().positive().default(10),
  retryAttempts: z.coerce.number().int().positive().default(2),
  maxContentWords: z.coerce.number().int().positive().default(5000),
});

const AGENT_CONFIG_SCHEMA = z.object({
  minSubqueries: z.coerce.number().int().positive().default(3),
  maxSubqueries: z.coerce.number().int().positive().default(5),
  factsPerSource: z.coerce.number().int().positive().default(5),
  maxSourceChars: z.coerce.number().int().positive().default(10000),
});

const LLM_CONFIG_SCHEMA = z.object({
  maxAttempts: z.coerce.number().int().positive().default(3),
  baseDelayMs: z.coerce.number().nonnegative().default(1000),
  multiplier: z.coerce.number().min(1).default(2),
});

const OUTPUT_CONFIG_SCHEMA = z.object({
  reportDir: z.string().min(1).default('reports'),
  saveIntermediate: z.boolean().default(false),
});

const LOGGING_CONFIG_SCHEMA = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // null disables the log file
  file: z.string().min(1).nullable().default('logs/research.log'),
  console: z.boolean().default(false),
});

// Configuration file schema for factweave.yaml validation
export const CONFIG_SCHEMA = z
  .object({
    search: SEARCH_CONFIG_SCHEMA.default({}),
    fetching: FETCHING_CONFIG_SCHEMA.default({}),
    agent: AGENT_CONFIG_SCHEMA.default({}),
    llm: LLM_CONFIG_SCHEMA.default({}),
    output: OUTPUT_CONFIG_SCHEMA.default({}),
    logging: LOGGING_CONFIG_SCHEMA.default({}),
  })
  .refine((c) => c.agent.minSubqueries <= c.agent.maxSubqueries, {
    message: 'agent.minSubqueries must not exceed agent.maxSubqueries',
    path: ['agent', 'minSubqueries'],
  });

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
export type SearchMode = (typeof SEARCH_MODES)[number];
export type SearchConfig = Config['search'];
export type FetchingConfig = Config['fetching'];
export type AgentConfig = Config['agent'];
export type LlmRetryConfig = Config['llm'];
export type OutputConfig = Config['output'];
export type LoggingConfig = Config['logging'];
