/**
 * Decodes Server-Sent Events frames from the streaming Messages API into
 * domain events.
 *
 * Event sequence for one assistant turn:
 *   message_start → (content_block_start → content_block_delta* → content_block_stop)*
 *   → message_delta → message_stop
 *
 * Text deltas become events immediately. Code-execution tool input arrives as
 * partial JSON fragments and becomes a single tool_input event when its block
 * stops. Tool results arrive whole, inline in a content_block_start.
 *
 * Frames that cannot be decoded are skipped; they never end the stream.
 */

import { createLogger, type Logger } from '../lib/logger.js';
import type { StreamEvent } from '../lib/stream-events.js';
import {
  CODE_EXECUTION_TOOL_NAME,
  CodeExecutionToolResultBlockSchema,
  ContentBlockDeltaSchema,
  ContentBlockStartSchema,
  EventEnvelopeSchema,
  InputJsonDeltaSchema,
  MessageStartSchema,
  ServerToolUseBlockSchema,
  TextDeltaSchema,
} from './stream-schemas.js';
import { ToolInputAccumulator } from './tool-input-accumulator.js';
import { parseToolResult } from './tool-result.js';

const DATA_PREFIX = 'data: ';

/**
 * Return the payload of the first `data: ` line in a frame, or null if there is none.
 */
export function extractDataPayload(frame: string): string | null {
  for (const rawLine of frame.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.startsWith(DATA_PREFIX)) {
      return line.slice(DATA_PREFIX.length);
    }
  }
  return null;
}

export class StreamDecoder {
  private toolInput = new ToolInputAccumulator();

  constructor(private readonly log: Logger = createLogger('stream-decoder')) {}

  /**
   * Decode one frame. Returns null for frames that carry no event for the consumer.
   */
  decode(frame: string): StreamEvent | null {
    const payload = extractDataPayload(frame);
    if (payload === null) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(payload);
    } catch {
      this.log.debug('Skipping unparseable frame', { data: payload.slice(0, 100) });
      return null;
    }

    return this.decodePayload(json);
  }

  private decodePayload(json: unknown): StreamEvent | null {
    const envelope = EventEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      return null;
    }

    switch (envelope.data.type) {
      case 'message_start':
        return this.handleMessageStart(json);
      case 'content_block_start':
        return this.handleBlockStart(json);
      case 'content_block_delta':
        return this.handleBlockDelta(json);
      case 'content_block_stop':
        return this.handleBlockStop();
      default:
        // message_delta, message_stop, ping and anything newer
        return null;
    }
  }

  /**
   * Whether a code-execution tool block is currently being collected.
   */
  get isToolInputOpen(): boolean {
    return this.toolInput.isOpen;
  }

  reset(): void {
    this.toolInput = new ToolInputAccumulator();
  }

  private handleMessageStart(json: unknown): StreamEvent | null {
    const event = MessageStartSchema.safeParse(json);
    if (!event.success) {
      return null;
    }
    const container = event.data.message.container;
    if (!container) {
      return null;
    }
    return { type: 'session_info', id: container.id, expiresAt: container.expires_at };
  }

  private handleBlockStart(json: unknown): StreamEvent | null {
    const event = ContentBlockStartSchema.safeParse(json);
    if (!event.success) {
      return null;
    }
    const block = event.data.content_block;

    if (block.type === 'server_tool_use') {
      const toolUse = ServerToolUseBlockSchema.safeParse(block);
      if (toolUse.success && toolUse.data.name === CODE_EXECUTION_TOOL_NAME) {
        if (this.toolInput.isOpen) {
          this.log.debug('Discarding unfinished tool input', { size: this.toolInput.size });
        }
        this.toolInput.begin();
      }
      return null;
    }

    if (block.type === 'code_execution_tool_result') {
      const result = CodeExecutionToolResultBlockSchema.safeParse(block);
      if (!result.success) {
        return null;
      }
      const interpreted = parseToolResult(result.data.content);
      if (!interpreted) {
        this.log.debug('Skipping unrecognized tool result', {
          toolUseId: result.data.tool_use_id,
        });
      }
      return interpreted;
    }

    return null;
  }

  private handleBlockDelta(json: unknown): StreamEvent | null {
    const event = ContentBlockDeltaSchema.safeParse(json);
    if (!event.success) {
      return null;
    }
    const delta = event.data.delta;

    if (delta.type === 'text_delta') {
      const text = TextDeltaSchema.safeParse(delta);
      return text.success ? { type: 'text', text: text.data.text } : null;
    }

    if (delta.type === 'input_json_delta') {
      const input = InputJsonDeltaSchema.safeParse(delta);
      if (input.success) {
        this.toolInput.append(input.data.partial_json);
      }
    }

    return null;
  }

  private handleBlockStop(): StreamEvent | null {
    const result = this.toolInput.finish();
    if (!result) {
      return null;
    }
    if (result.kind === 'invalid') {
      this.log.debug('Dropping unparseable tool input', {
        reason: result.reason,
        input: result.input.slice(0, 100),
      });
      return null;
    }
    if (result.kind === 'empty') {
      return null;
    }
    return { type: 'tool_input', code: result.code };
  }
}
