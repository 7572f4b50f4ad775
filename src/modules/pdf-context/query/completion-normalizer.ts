import { z } from 'zod';

import { ProviderError } from '../pdf-context.errors';
import type { FinishReason, QueryResult, TokenUsage } from '../pdf-context.types';

const contentSchema = z
  .union([
    z.string(),
    z.array(z.object({ type: z.string().optional(), text: z.string().optional() }).passthrough()),
    z.null()
  ])
  .optional()
  .catch(undefined);

const completionSchema = z
  .object({
    model: z.string().optional().catch(undefined),
    choices: z.array(
      z
        .object({
          message: z.object({ content: contentSchema }).passthrough().nullish().catch(undefined),
          finish_reason: z.string().nullish().catch(undefined)
        })
        .passthrough()
    ),
    usage: z.record(z.unknown()).nullish().catch(undefined)
  })
  .passthrough();

export function toFinishReason(value: string | null | undefined): FinishReason {
  if (value === 'stop' || value === 'length') {
    return value;
  }
  return 'other';
}

function answerText(content: z.infer<typeof contentSchema>): string {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content.map((part) => part.text ?? '').join('');
  }
  return '';
}

function toUsage(raw: Record<string, unknown> | null | undefined): TokenUsage {
  const counters: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      counters[key] = value;
    }
  }
  return Object.freeze({
    ...counters,
    prompt_tokens: counters.prompt_tokens ?? 0,
    completion_tokens: counters.completion_tokens ?? 0,
    total_tokens: counters.total_tokens ?? 0
  });
}

/**
 * Maps a chat-completions response body onto a QueryResult. Missing optional fields fall back
 * to defaults; a body without a first choice is a ProviderError.
 */
export function normalizeCompletion(raw: unknown, requestedModel: string): QueryResult {
  const parsed = completionSchema.safeParse(raw);
  const choice = parsed.success ? parsed.data.choices[0] : undefined;
  if (!parsed.success || !choice) {
    throw new ProviderError({
      type: 'malformed_response',
      message: 'Provider response has no completion choice',
      cause: parsed.success ? undefined : parsed.error
    });
  }

  const finishReason = toFinishReason(choice.finish_reason);

  return Object.freeze({
    answer: answerText(choice.message?.content),
    model: parsed.data.model || requestedModel,
    usage: toUsage(parsed.data.usage),
    finishReason,
    isTruncated: finishReason === 'length',
    rawResponse: raw
  });
}
