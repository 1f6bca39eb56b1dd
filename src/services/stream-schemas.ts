/**
 * Wire shapes of the streaming Messages API events this client interprets.
 *
 * Schemas only name the fields that are read. Unknown fields are ignored and
 * unknown discriminants never reach these schemas, so new upstream fields or
 * event types do not break decoding.
 */

import { z } from 'zod';

export const CODE_EXECUTION_TOOL_NAME = 'code_execution';

export const EventEnvelopeSchema = z.object({
  type: z.string(),
});

export const ContainerSchema = z.object({
  id: z.string(),
  expires_at: z.string(),
});

export const MessageStartSchema = z.object({
  type: z.literal('message_start'),
  message: z.object({
    container: ContainerSchema.nullish(),
  }),
});

export const ServerToolUseBlockSchema = z.object({
  type: z.literal('server_tool_use'),
  id: z.string().optional(),
  name: z.string(),
});

export const CodeExecutionToolResultBlockSchema = z.object({
  type: z.literal('code_execution_tool_result'),
  tool_use_id: z.string().optional(),
  content: z.unknown(),
});

export const ContentBlockStartSchema = z.object({
  type: z.literal('content_block_start'),
  index: z.number().optional(),
  // Kept whole: the block schemas above read its other fields.
  content_block: z.object({ type: z.string() }).passthrough(),
});

export const TextDeltaSchema = z.object({
  type: z.literal('text_delta'),
  text: z.string(),
});

export const InputJsonDeltaSchema = z.object({
  type: z.literal('input_json_delta'),
  partial_json: z.string(),
});

export const ContentBlockDeltaSchema = z.object({
  type: z.literal('content_block_delta'),
  index: z.number().optional(),
  delta: z.object({ type: z.string() }).passthrough(),
});

/**
 * Entry of a successful result's content list. Only entries carrying a file id
 * are files; anything else is skipped.
 */
export const FileOutputSchema = z.object({
  type: z.string().optional(),
  file_id: z.string(),
});

export const CodeExecutionSuccessSchema = z
  .object({
    type: z.literal('code_execution_result'),
    stdout: z.string().default(''),
    stderr: z.string().default(''),
    return_code: z.number().int().optional(),
    exit_code: z.number().int().optional(),
    content: z.array(z.unknown()).default([]),
  })
  .refine((result) => result.return_code !== undefined || result.exit_code !== undefined, {
    message: 'Result has no return code',
  });

export const CodeExecutionErrorSchema = z.object({
  type: z.literal('code_execution_tool_result_error'),
  error_code: z.string(),
});

export const CodeExecutionResultSchema = z.union([
  CodeExecutionSuccessSchema,
  CodeExecutionErrorSchema,
]);

export type CodeExecutionResult = z.infer<typeof CodeExecutionResultSchema>;
