/**
 * In-memory conversation model for interactive front ends.
 *
 * State changes go through conversationReducer so a renderer can hold the
 * state immutably; Conversation wraps the reducer as an EventSink so a stream
 * consumer can drive it directly.
 */

import type {
  ChatMessage,
  FileNameUpdate,
  FileRef,
  SessionInfoEvent,
  StreamOutcome,
  ToolOutputEvent,
} from '../lib/stream-events.js';
import type { EventSink } from './event-sink.js';

export type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'code'; code: string }
  | { type: 'tool_output'; stdout: string; stderr: string; exitCode: number; files: FileRef[] }
  | { type: 'tool_error'; errorCode: string }
  | { type: 'api_error'; message: string };

export type ConversationRole = 'user' | 'assistant' | 'system';

export interface ConversationMessage {
  role: ConversationRole;
  content: ContentPart[];
}

export interface ConversationState {
  messages: ConversationMessage[];
  /** Parts of the assistant reply that is still streaming. */
  streaming: ContentPart[];
  isWaiting: boolean;
  container: { id: string; expiresAt: string } | null;
  connectionStatus: string | null;
  codeExecution: boolean;
}

export type ConversationAction =
  | { type: 'addUserMessage'; text: string }
  | { type: 'startStreaming' }
  | { type: 'appendText'; text: string }
  | { type: 'addCode'; code: string }
  | { type: 'addToolOutput'; output: ToolOutputEvent }
  | { type: 'addToolError'; errorCode: string }
  | { type: 'addApiError'; message: string }
  | { type: 'setContainer'; id: string; expiresAt: string }
  | { type: 'setConnectionStatus'; status: string | null }
  | { type: 'finishStreaming' }
  | { type: 'updateFileMetadata'; fileId: string; displayName: string }
  | { type: 'setCodeExecution'; enabled: boolean }
  | { type: 'clear' };

export const initialConversationState: ConversationState = {
  messages: [],
  streaming: [],
  isWaiting: false,
  container: null,
  connectionStatus: null,
  codeExecution: false,
};

function renameFiles(parts: ContentPart[], fileId: string, displayName: string): ContentPart[] {
  let changed = false;
  const next = parts.map((part) => {
    if (part.type !== 'tool_output' || !part.files.some((file) => file.id === fileId)) {
      return part;
    }
    changed = true;
    return {
      ...part,
      files: part.files.map((file) => (file.id === fileId ? { ...file, displayName } : file)),
    };
  });
  return changed ? next : parts;
}

export function conversationReducer(
  state: ConversationState,
  action: ConversationAction
): ConversationState {
  switch (action.type) {
    case 'addUserMessage':
      return {
        ...state,
        messages: [...state.messages, { role: 'user', content: [{ type: 'text', text: action.text }] }],
      };
    case 'startStreaming':
      return { ...state, streaming: [], isWaiting: true };
    case 'appendText': {
      // Consecutive deltas extend the same text part
      const last = state.streaming[state.streaming.length - 1];
      if (last && last.type === 'text') {
        return {
          ...state,
          streaming: [
            ...state.streaming.slice(0, -1),
            { type: 'text', text: last.text + action.text },
          ],
        };
      }
      return { ...state, streaming: [...state.streaming, { type: 'text', text: action.text }] };
    }
    case 'addCode':
      return { ...state, streaming: [...state.streaming, { type: 'code', code: action.code }] };
    case 'addToolOutput':
      return {
        ...state,
        streaming: [
          ...state.streaming,
          {
            type: 'tool_output',
            stdout: action.output.stdout,
            stderr: action.output.stderr,
            exitCode: action.output.exitCode,
            files: action.output.files.map((file) => ({ ...file })),
          },
        ],
      };
    case 'addToolError':
      return {
        ...state,
        streaming: [...state.streaming, { type: 'tool_error', errorCode: action.errorCode }],
      };
    case 'addApiError':
      return {
        ...state,
        messages: [
          ...state.messages,
          { role: 'system', content: [{ type: 'api_error', message: action.message }] },
        ],
      };
    case 'setContainer':
      return { ...state, container: { id: action.id, expiresAt: action.expiresAt } };
    case 'setConnectionStatus':
      return { ...state, connectionStatus: action.status };
    case 'finishStreaming':
      return {
        ...state,
        messages:
          state.streaming.length > 0
            ? [...state.messages, { role: 'assistant', content: state.streaming }]
            : state.messages,
        streaming: [],
        connectionStatus: null,
        isWaiting: false,
      };
    case 'updateFileMetadata':
      return {
        ...state,
        messages: state.messages.map((message) => {
          const content = renameFiles(message.content, action.fileId, action.displayName);
          return content === message.content ? message : { ...message, content };
        }),
        streaming: renameFiles(state.streaming, action.fileId, action.displayName),
      };
    case 'setCodeExecution':
      return { ...state, codeExecution: action.enabled };
    case 'clear':
      return {
        ...state,
        messages: [],
        streaming: [],
        container: null,
      };
  }
}

/**
 * Build the request history: text parts of user and assistant messages.
 * System entries and messages without text are left out.
 */
export function toRequestMessages(state: ConversationState): ChatMessage[] {
  const result: ChatMessage[] = [];
  for (const message of state.messages) {
    if (message.role === 'system') continue;
    const text = message.content
      .map((part) => (part.type === 'text' ? part.text : ''))
      .join('');
    if (text.length > 0) {
      result.push({ role: message.role, content: text });
    }
  }
  return result;
}

export class Conversation implements EventSink {
  private current: ConversationState;

  constructor(initial: Partial<ConversationState> = {}) {
    this.current = { ...initialConversationState, ...initial };
  }

  get state(): ConversationState {
    return this.current;
  }

  dispatch(action: ConversationAction): void {
    this.current = conversationReducer(this.current, action);
  }

  addUserMessage(text: string): void {
    this.dispatch({ type: 'addUserMessage', text });
  }

  startStreaming(): void {
    this.dispatch({ type: 'startStreaming' });
  }

  finishStreaming(): void {
    this.dispatch({ type: 'finishStreaming' });
  }

  addApiError(message: string): void {
    this.dispatch({ type: 'addApiError', message });
  }

  /** Rename a file everywhere it appears, in history and in the reply being streamed. */
  updateFileMetadata(fileId: string, displayName: string): void {
    this.dispatch({ type: 'updateFileMetadata', fileId, displayName });
  }

  clear(): void {
    this.dispatch({ type: 'clear' });
  }

  toRequestMessages(): ChatMessage[] {
    return toRequestMessages(this.current);
  }

  /**
   * Record a user prompt, open a new reply and return the history to send.
   */
  submit(text: string): ChatMessage[] {
    this.addUserMessage(text);
    this.startStreaming();
    return this.toRequestMessages();
  }

  onText(text: string): void {
    this.dispatch({ type: 'appendText', text });
  }

  onToolInput(code: string): void {
    this.dispatch({ type: 'addCode', code });
  }

  onToolOutput(output: ToolOutputEvent): void {
    this.dispatch({ type: 'addToolOutput', output });
  }

  onToolError(errorCode: string): void {
    this.dispatch({ type: 'addToolError', errorCode });
  }

  onSessionInfo(info: SessionInfoEvent): void {
    this.dispatch({ type: 'setContainer', id: info.id, expiresAt: info.expiresAt });
  }

  onConnectionStatus(status: string): void {
    this.dispatch({ type: 'setConnectionStatus', status });
  }

  onFileResolved(update: FileNameUpdate): void {
    this.updateFileMetadata(update.fileId, update.displayName);
  }

  // Failure text already arrived as a text event
  onStreamEnd(_outcome: StreamOutcome): void {
    this.finishStreaming();
  }
}
