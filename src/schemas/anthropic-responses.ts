import { z } from 'zod';

// Only text blocks are read; other block kinds pass validation and are skipped
export const ANTHROPIC_CONTENT_BLOCK_SCHEMA = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const ANTHROPIC_USAGE_SCHEMA = z.object({
  input_tokens: z.number(),
  output_tokens: z.number(),
});

export const ANTHROPIC_RESPONSE_SCHEMA = z.object({
  content: z.array(ANTHROPIC_CONTENT_BLOCK_SCHEMA),
  stop_reason: z.string().nullable(),
  usage: ANTHROPIC_USAGE_SCHEMA,
});

export type AnthropicContentBlock = z.infer<typeof ANTHROPIC_CONTENT_BLOCK_SCHEMA>;
export type AnthropicResponse = z.infer<typeof ANTHROPIC_RESPONSE_SCHEMA>;

export function responseText(content: readonly AnthropicContentBlock[]): string {
  return content
    .map((block) => (block.type === 'text' && block.text !== undefined ? block.text : ''))
    .join('');
}
