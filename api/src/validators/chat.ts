/**
 * API Validation Schemas
 *
 * Zod schemas for the chat, ask, vote and session endpoints. Wire names are
 * snake_case.
 */

import { z, type ZodError } from 'zod';
import { FEEDBACK_MAX_LENGTH } from '@/store/validation';

export const MAX_MESSAGE_LENGTH = 16_000;

const idSchema = z.string().min(1).max(64);

const clientMessageSchema = z.object({
  role: z.string().min(1).max(32),
  content: z.string().max(MAX_MESSAGE_LENGTH),
});

/**
 * POST /chat body
 *
 * Only the final message is used and it must be a non-blank user turn;
 * history is always read from the server.
 */
export const chatRequestSchema = z
  .object({
    messages: z.array(clientMessageSchema).min(1).max(200),
    session_id: idSchema.optional(),
    stream: z.boolean().optional().default(false),
  })
  .superRefine((body, ctx) => {
    const last = body.messages[body.messages.length - 1];
    if (!last || last.role !== 'user') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['messages', body.messages.length - 1, 'role'],
        message: 'The last message must have role "user"',
      });
      return;
    }
    if (last.content.trim().length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['messages', body.messages.length - 1, 'content'],
        message: 'The last message must not be empty',
      });
    }
  });

export type ChatRequestBody = z.infer<typeof chatRequestSchema>;

/**
 * POST /ask and POST /ask/stream body
 */
export const askRequestSchema = z.object({
  user_query: z
    .string()
    .max(MAX_MESSAGE_LENGTH)
    .refine((value) => value.trim().length > 0, 'user_query must not be empty'),
  count: z.number().int().min(0).optional(),
});

const voteFlagSchema = z.union([z.literal(0), z.literal(1)]);

/**
 * POST /vote body
 */
export const voteRequestSchema = z
  .object({
    message_id: idSchema,
    session_id: idSchema,
    upvote: voteFlagSchema,
    downvote: voteFlagSchema,
    feedback: z.string().max(FEEDBACK_MAX_LENGTH).nullish(),
  })
  .strict();

/**
 * Session id path parameter
 */
export const sessionParamSchema = z.object({
  session_id: idSchema,
});

const queryBool = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * GET /sessions query params
 */
export const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).optional(),
  offset: z.coerce.number().int().min(0).optional(),
  include_closed: queryBool.optional(),
});

/**
 * GET /sessions/:session_id/messages query params
 */
export const messagesQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

/**
 * zValidator hook: hand failures to the global error handler so every
 * validation error shares the envelope.
 */
export function rejectInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success && result.error) {
    throw result.error;
  }
}
