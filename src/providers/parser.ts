// Messages API response parser
// Turns the wire payload into typed content blocks; downstream code never sees raw JSON

import { z } from 'zod';
import { createChildLogger } from '../logger.js';
import { AppError } from '../utils/errors.js';
import type { ContentBlock, MessageResponse, TextBlock, ToolUseBlock } from './types.js';

const log = createChildLogger('providers:parser');

const TextBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string().catch(''),
  name: z.string().catch(''),
  input: z.unknown(),
});

const ToolInputSchema = z.record(z.unknown());

const RawBlockSchema = z.object({ type: z.string() }).passthrough();

const MessageResponseSchema = z.object({
  id: z.string().default(''),
  model: z.string().default(''),
  stop_reason: z.string().nullish(),
  content: z.array(RawBlockSchema),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export function parseContentBlock(raw: z.infer<typeof RawBlockSchema>): ContentBlock {
  if (raw.type === 'text') {
    const text = TextBlockSchema.safeParse(raw);
    if (text.success) return text.data;
  }

  if (raw.type === 'tool_use') {
    const toolUse = ToolUseBlockSchema.safeParse(raw);
    if (toolUse.success) {
      const { id, name, input } = toolUse.data;
      const args = ToolInputSchema.safeParse(input ?? {});
      // Still a tool request; the dispatcher turns the gaps into "no tool name" / "no query"
      if (!name || !args.success) {
        log.warn({ id, name, inputType: Array.isArray(input) ? 'array' : typeof input }, 'Malformed tool_use block');
      }
      return { type: 'tool_use', id, name, input: args.success ? args.data : {} };
    }
  }

  return { type: 'unknown', rawType: raw.type };
}

export function parseMessageResponse(payload: unknown): MessageResponse {
  const parsed = MessageResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw AppError.malformedResponse(
      'Claude API returned an unexpected response shape',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const { id, model, stop_reason, content, usage } = parsed.data;

  return {
    id,
    model,
    stopReason: stop_reason ?? null,
    content: content.map(parseContentBlock),
    usage: {
      inputTokens: usage?.input_tokens ?? 0,
      outputTokens: usage?.output_tokens ?? 0,
    },
  };
}

export function isTextBlock(block: ContentBlock): block is TextBlock {
  return block.type === 'text';
}

export function isToolUseBlock(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}
