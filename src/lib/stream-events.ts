/**
 * Domain events produced by a streaming Messages API session.
 *
 * The session task is the only producer; one consumer reads them in order from
 * the events channel. File display names are updated out of band through
 * FileNameUpdate values on a second channel.
 */

/**
 * A file created by code execution. displayName starts out equal to id and is
 * replaced once the file's metadata has been resolved.
 */
export interface FileRef {
  id: string;
  displayName: string;
}

export interface TextEvent {
  type: 'text';
  text: string;
}

/** Code extracted from a completed code-execution tool call. */
export interface ToolInputEvent {
  type: 'tool_input';
  code: string;
}

export interface ToolOutputEvent {
  type: 'tool_output';
  stdout: string;
  stderr: string;
  exitCode: number;
  files: FileRef[];
}

export interface ToolErrorEvent {
  type: 'tool_error';
  errorCode: string;
}

/** Identity and expiry of the container backing code execution. */
export interface SessionInfoEvent {
  type: 'session_info';
  id: string;
  expiresAt: string;
}

export interface ConnectionStatusEvent {
  type: 'connection_status';
  status: string;
}

export type StreamEvent =
  | TextEvent
  | ToolInputEvent
  | ToolOutputEvent
  | ToolErrorEvent
  | SessionInfoEvent
  | ConnectionStatusEvent;

/**
 * Resolved display name for a file, keyed by its id.
 */
export interface FileNameUpdate {
  fileId: string;
  displayName: string;
}

export type StreamState =
  | 'awaiting_connection'
  | 'connected'
  | 'streaming'
  | 'finished'
  | 'cancelled'
  | 'failed';

export type FailureCause = 'transport' | 'api' | 'consumer_gone';

export type StreamOutcome =
  | { state: 'finished' }
  | { state: 'cancelled' }
  | { state: 'failed'; cause: FailureCause; message?: string };

/**
 * A message in the request payload.
 */
export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}
