import type {
  FileNameUpdate,
  SessionInfoEvent,
  StreamEvent,
  StreamOutcome,
  ToolOutputEvent,
} from '../lib/stream-events.js';

/**
 * Consumer of a streaming session. Front ends implement one handler per event
 * variant instead of switching over events themselves.
 */
export interface EventSink {
  onText(text: string): void;
  onToolInput(code: string): void;
  onToolOutput(output: ToolOutputEvent): void;
  onToolError(errorCode: string): void;
  onSessionInfo(info: SessionInfoEvent): void;
  onConnectionStatus(status: string): void;
  /** A file's display name was resolved. May arrive after the stream ended. */
  onFileResolved(update: FileNameUpdate): void;
  onStreamEnd(outcome: StreamOutcome): void;
}

export function dispatchEvent(sink: EventSink, event: StreamEvent): void {
  switch (event.type) {
    case 'text':
      sink.onText(event.text);
      return;
    case 'tool_input':
      sink.onToolInput(event.code);
      return;
    case 'tool_output':
      sink.onToolOutput(event);
      return;
    case 'tool_error':
      sink.onToolError(event.errorCode);
      return;
    case 'session_info':
      sink.onSessionInfo(event);
      return;
    case 'connection_status':
      sink.onConnectionStatus(event.status);
      return;
    default: {
      const unhandled: never = event;
      throw new Error(`Unhandled stream event: ${JSON.stringify(unhandled)}`);
    }
  }
}
