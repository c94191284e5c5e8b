import { z } from 'zod';

export const OUTPUT_FORMATS = ['summary', 'markdown', 'json'] as const;

// CLI options schema for the research command
export const CLI_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  showPrompt: z.boolean().default(false),
  output: z.enum(OUTPUT_FORMATS).default('summary'),
  config: z.string().optional(),
  maxResults: z.coerce.number().int().positive().max(20).optional(),
  save: z.boolean().default(true),
});

// Check command options schema
export const CHECK_OPTIONS_SCHEMA = z.object({
  config: z.string().optional(),
});

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
export type CheckOptions = z.infer<typeof CHECK_OPTIONS_SCHEMA>;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
