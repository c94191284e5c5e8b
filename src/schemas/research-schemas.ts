import { z } from 'zod';

/*
 * Schemas for the JSON the model is asked to return at each stage.
 * Field-level leniency (defaults, unknown confidence) lives here; per-entry
 * filtering happens in the stage that consumes the result.
 */

export const SUB_QUERIES_SCHEMA = z.array(z.string().nullable());

// Entries stay unknown so one malformed fact does not reject the batch
export const FACTS_RESPONSE_SCHEMA = z.object({
  facts: z.array(z.unknown()),
});

export const RAW_FACT_SCHEMA = z.object({
  claim: z.string(),
  caveat: z.string().nullish(),
  confidence: z.unknown().optional(),
});

export const CONTRADICTION_SCHEMA = z.object({
  issue: z.string().default(''),
  sources: z.array(z.string()).default([]),
  explanation: z.string().default(''),
});

export const SYNTHESIS_RESPONSE_SCHEMA = z.object({
  agreements: z.array(z.string()).default([]),
  contradictions: z.array(CONTRADICTION_SCHEMA).default([]),
  gaps: z.array(z.string()).default([]),
  answer: z.string().refine((a) => a.trim().length > 0, { message: "Missing 'answer' field in synthesis" }),
});

export type FactsResponse = z.infer<typeof FACTS_RESPONSE_SCHEMA>;
export type RawFact = z.infer<typeof RAW_FACT_SCHEMA>;
export type SynthesisResponse = z.infer<typeof SYNTHESIS_RESPONSE_SCHEMA>;
