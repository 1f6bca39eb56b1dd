/**
 * Streaming client for the Messages API.
 *
 * sendMessageStream() returns immediately with a receiver for domain events and
 * a cancellation token. The request, the response stream and all decoding run in
 * a separate session task:
 *
 *   awaiting_connection → connected → streaming → finished | cancelled | failed
 *
 * Failures before streaming starts (connection errors, non-success status) are
 * reported as one text event and end the session. Cancellation is checked only
 * between processing a chunk's frames and reading the next chunk.
 */

import type http from 'node:http';
import { CancellationToken, CANCELLED, raceCancellation } from '../lib/cancellation.js';
import {
  createChannel,
  DEFAULT_CHANNEL_CAPACITY,
  type ChannelReceiver,
  type ChannelSender,
} from '../lib/channel.js';
import { createLogger, getErrorMessage, toError, type LogSink, type Logger } from '../lib/logger.js';
import type {
  ChatMessage,
  StreamEvent,
  StreamOutcome,
  StreamState,
} from '../lib/stream-events.js';
import {
  createApiError,
  formatFailureText,
  TransportError,
  type ApiError,
} from './api-errors.js';
import { ANTHROPIC_VERSION, FILES_API_BETA } from './files-api.js';
import { httpRequest, isSuccessStatus, readText, type HttpTarget } from './http-transport.js';
import { SseFrameAssembler } from './sse-frame-assembler.js';
import { StreamDecoder } from './stream-decoder.js';
import { CODE_EXECUTION_TOOL_NAME } from './stream-schemas.js';

export const DEFAULT_MAX_TOKENS = 4096;
export const CODE_EXECUTION_BETA = 'code-execution-2025-05-22';
export const CODE_EXECUTION_TOOL = {
  type: 'code_execution_20250522',
  name: CODE_EXECUTION_TOOL_NAME,
} as const;

export const STATUS_CONNECTING = 'Connecting to Claude API...';
export const STATUS_SENDING = 'Sending request...';

export interface MessagesClientOptions extends HttpTarget {
  apiKey: string;
  model: string;
  maxTokens?: number;
  /** Default for requests that don't say otherwise. */
  codeExecution?: boolean;
  channelCapacity?: number;
  logSink?: LogSink;
}

export interface SendOptions {
  codeExecution?: boolean;
}

export interface MessagesRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  stream: true;
  tools?: Array<typeof CODE_EXECUTION_TOOL>;
}

/**
 * Read-only view of a running session.
 */
export interface SessionView {
  readonly done: Promise<StreamOutcome>;
  readonly state: StreamState;
  /** Set once the session has ended, before the events channel closes. */
  readonly outcome: StreamOutcome | null;
}

/**
 * What the caller holds for one in-flight stream.
 */
export interface StreamHandle {
  events: ChannelReceiver<StreamEvent>;
  cancellation: CancellationToken;
  session: SessionView;
}

/**
 * Anything that can start a streaming session.
 */
export interface StreamClient {
  sendMessageStream(messages: ChatMessage[], options?: SendOptions): StreamHandle;
}

interface SessionParams {
  target: HttpTarget;
  headers: Record<string, string>;
  request: MessagesRequest;
  events: ChannelSender<StreamEvent>;
  token: CancellationToken;
  logSink?: LogSink;
}

/**
 * One request/response cycle. Owns the frame buffer, the decoder (and its tool
 * input accumulator) and the cancellation observation; nothing else touches them.
 */
export class StreamSession implements SessionView {
  readonly done: Promise<StreamOutcome>;
  private currentState: StreamState = 'awaiting_connection';
  private finalOutcome: StreamOutcome | null = null;
  private streamEventsPublished = 0;
  private readonly decoder: StreamDecoder;
  private readonly log: Logger;

  private constructor(private readonly params: SessionParams) {
    this.log = createLogger('stream-session', params.logSink);
    this.decoder = new StreamDecoder(createLogger('stream-decoder', params.logSink));
    this.done = this.run();
  }

  static start(params: SessionParams): StreamSession {
    return new StreamSession(params);
  }

  get state(): StreamState {
    return this.currentState;
  }

  /**
   * Set once the session has ended, before the events channel closes.
   */
  get outcome(): StreamOutcome | null {
    return this.finalOutcome;
  }

  private async run(): Promise<StreamOutcome> {
    let outcome: StreamOutcome;
    try {
      outcome = await this.execute();
    } catch (err) {
      this.log.error('Stream session ended unexpectedly', toError(err));
      outcome = { state: 'failed', cause: 'transport', message: getErrorMessage(err) };
    }

    this.finalOutcome = outcome;
    this.currentState = outcome.state;
    this.params.events.close();
    this.log.info('Stream session ended', { ...outcome });
    return outcome;
  }

  private async execute(): Promise<StreamOutcome> {
    const { target, headers, request } = this.params;

    if (!(await this.publishStatus(STATUS_CONNECTING))) {
      return this.consumerGone();
    }

    this.log.debug('Prepared request', {
      model: request.model,
      messages: request.messages.length,
      codeExecution: request.tools !== undefined,
    });

    if (!(await this.publishStatus(STATUS_SENDING))) {
      return this.consumerGone();
    }

    let res: http.IncomingMessage;
    try {
      res = await httpRequest(target, {
        method: 'POST',
        path: '/v1/messages',
        headers,
        body: JSON.stringify(request),
      });
    } catch (err) {
      return this.fail('transport', new TransportError(err));
    }

    try {
      if (!isSuccessStatus(res)) {
        const body = await readText(res).catch((err: unknown) => {
          this.log.debug('Failed to read error response body', { error: getErrorMessage(err) });
          return 'Failed to read error response';
        });
        return this.fail('api', createApiError(res.statusCode ?? 0, body));
      }

      this.currentState = 'connected';
      this.log.info('Connected', { status: res.statusCode });
      return await this.consume(res);
    } finally {
      res.destroy();
    }
  }

  private async consume(res: http.IncomingMessage): Promise<StreamOutcome> {
    const assembler = new SseFrameAssembler();
    const chunks = res[Symbol.asyncIterator]();
    this.currentState = 'streaming';

    for (;;) {
      let next: IteratorResult<unknown> | typeof CANCELLED;
      try {
        next = await raceCancellation(chunks.next(), this.params.token);
      } catch (err) {
        // The response already started, so a broken body ends the stream quietly
        this.log.warn('Stream read failed', { error: getErrorMessage(err) });
        return { state: 'finished' };
      }

      if (next === CANCELLED) {
        this.log.info('Stream cancelled');
        return { state: 'cancelled' };
      }

      if (next.done) {
        const dropped = assembler.finish();
        if (dropped > 0) {
          this.log.debug('Discarding unterminated frame at end of stream', { chars: dropped });
        }
        return { state: 'finished' };
      }

      const chunk = next.value;
      if (!(chunk instanceof Uint8Array)) {
        continue;
      }

      for (const frame of assembler.feed(chunk)) {
        const event = this.decoder.decode(frame);
        if (!event) {
          continue;
        }
        if (!(await this.params.events.send(event))) {
          this.log.info('Consumer gone, stopping stream');
          return this.streamEventsPublished === 0 ? this.consumerGone() : { state: 'finished' };
        }
        this.streamEventsPublished++;
      }
    }
  }

  private publishStatus(status: string): Promise<boolean> {
    return this.params.events.send({ type: 'connection_status', status });
  }

  private async fail(
    cause: 'transport' | 'api',
    error: TransportError | ApiError
  ): Promise<StreamOutcome> {
    if (error instanceof TransportError) {
      this.log.error('Failed to send request', error);
    } else {
      this.log.warn('API error response', {
        status: error.status,
        kind: error.kind,
        body: error.body,
      });
    }
    await this.params.events.send({ type: 'text', text: formatFailureText(error) });
    return { state: 'failed', cause, message: error.message };
  }

  private consumerGone(): StreamOutcome {
    return { state: 'failed', cause: 'consumer_gone' };
  }
}

export class MessagesClient implements StreamClient {
  private readonly log: Logger;

  constructor(private readonly options: MessagesClientOptions) {
    this.log = createLogger('messages-client', options.logSink);
  }

  get codeExecutionEnabled(): boolean {
    return this.options.codeExecution ?? false;
  }

  buildRequest(messages: ChatMessage[], options: SendOptions = {}): MessagesRequest {
    const codeExecution = options.codeExecution ?? this.codeExecutionEnabled;
    return {
      model: this.options.model,
      messages,
      max_tokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
      stream: true,
      ...(codeExecution ? { tools: [CODE_EXECUTION_TOOL] } : {}),
    };
  }

  buildHeaders(options: SendOptions = {}): Record<string, string> {
    const codeExecution = options.codeExecution ?? this.codeExecutionEnabled;
    const headers: Record<string, string> = {
      'x-api-key': this.options.apiKey,
      'anthropic-version': ANTHROPIC_VERSION,
      'content-type': 'application/json',
    };
    if (codeExecution) {
      headers['anthropic-beta'] = `${CODE_EXECUTION_BETA},${FILES_API_BETA}`;
    }
    return headers;
  }

  sendMessageStream(messages: ChatMessage[], options: SendOptions = {}): StreamHandle {
    const { sender, receiver } = createChannel<StreamEvent>(
      this.options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY
    );
    const cancellation = new CancellationToken();

    this.log.debug('Starting stream', { messages: messages.length });

    const session = StreamSession.start({
      target: { baseUrl: this.options.baseUrl, socketPath: this.options.socketPath },
      headers: this.buildHeaders(options),
      request: this.buildRequest(messages, options),
      events: sender,
      token: cancellation,
      logSink: this.options.logSink,
    });

    return { events: receiver, cancellation, session };
  }
}
