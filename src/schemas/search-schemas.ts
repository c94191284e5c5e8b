import { z } from 'zod';

// Google Custom Search JSON API response (only the fields we read)
export const GOOGLE_CSE_ITEM_SCHEMA = z.object({
  title: z.string().optional(),
  link: z.string().optional(),
  snippet: z.string().optional(),
});

export const GOOGLE_CSE_RESPONSE_SCHEMA = z.object({
  items: z.array(GOOGLE_CSE_ITEM_SCHEMA).default([]),
});

export type GoogleCseItem = z.infer<typeof GOOGLE_CSE_ITEM_SCHEMA>;
export type GoogleCseResponse = z.infer<typeof GOOGLE_CSE_RESPONSE_SCHEMA>;
