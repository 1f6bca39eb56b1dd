import type { FileRef, ToolErrorEvent, ToolOutputEvent } from '../lib/stream-events.js';
import {
  CodeExecutionResultSchema,
  FileOutputSchema,
  type CodeExecutionResult,
} from './stream-schemas.js';

/**
 * Map a code execution result into the event the consumer sees.
 * Files start unresolved: their display name is their id.
 */
export function interpretToolResult(result: CodeExecutionResult): ToolOutputEvent | ToolErrorEvent {
  if (result.type === 'code_execution_tool_result_error') {
    return { type: 'tool_error', errorCode: result.error_code };
  }

  const files: FileRef[] = [];
  for (const entry of result.content) {
    const file = FileOutputSchema.safeParse(entry);
    if (file.success) {
      files.push({ id: file.data.file_id, displayName: file.data.file_id });
    }
  }

  return {
    type: 'tool_output',
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.return_code ?? result.exit_code ?? 0,
    files,
  };
}

/**
 * Validate the inline content of a code_execution_tool_result block and
 * interpret it. Returns null for content of neither known shape.
 */
export function parseToolResult(content: unknown): ToolOutputEvent | ToolErrorEvent | null {
  const parsed = CodeExecutionResultSchema.safeParse(content);
  if (!parsed.success) {
    return null;
  }
  return interpretToolResult(parsed.data);
}
