/**
 * Drives one streaming session at a time into an EventSink.
 *
 * Interactive front ends call poll() from their render loop; scripts await
 * run(). Files reported by code execution are resolved in the background and
 * their names arrive at the sink through onFileResolved, possibly after the
 * stream itself has ended.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { createChannel, type ChannelReceiver } from '../lib/channel.js';
import { createLogger, type LogSink, type Logger } from '../lib/logger.js';
import type {
  ChatMessage,
  FileNameUpdate,
  StreamEvent,
  StreamOutcome,
} from '../lib/stream-events.js';
import { dispatchEvent, type EventSink } from './event-sink.js';
import { FileResolver, type FileResolution } from './file-resolver.js';
import type { FilesApi } from './files-api.js';
import type { SendOptions, StreamClient, StreamHandle } from './messages-client.js';

export const DEFAULT_OUTPUT_DIR = 'output';

const FILE_ID_PREFIX = 'file_';
const FILE_SETTLE_POLL_MS = 20;

export interface StreamConsumerOptions {
  client: StreamClient;
  files: FilesApi;
  sink: EventSink;
  outputDir?: string;
  /** Delay before retrying a failed metadata lookup. */
  retryDelayMs?: number;
  logSink?: LogSink;
}

export class StreamConsumer {
  private active: StreamHandle | null = null;
  private readonly names: ChannelReceiver<FileNameUpdate>;
  private readonly resolver: FileResolver;
  private readonly pending = new Set<Promise<void>>();
  private readonly resolutions: FileResolution[] = [];
  private readonly outputDir: string;
  private readonly log: Logger;

  constructor(private readonly options: StreamConsumerOptions) {
    this.log = createLogger('stream-consumer', options.logSink);
    this.outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;

    const { sender, receiver } = createChannel<FileNameUpdate>();
    this.names = receiver;
    this.resolver = new FileResolver(options.files, {
      names: sender,
      retryDelayMs: options.retryDelayMs,
      logSink: options.logSink,
    });
  }

  get isActive(): boolean {
    return this.active !== null;
  }

  /** Number of file downloads still in progress. */
  get pendingFiles(): number {
    return this.pending.size;
  }

  get resolvedFiles(): readonly FileResolution[] {
    return this.resolutions;
  }

  start(messages: ChatMessage[], options: SendOptions = {}): StreamHandle {
    if (this.active) {
      throw new Error('A stream is already in progress');
    }
    const handle = this.options.client.sendMessageStream(messages, options);
    this.active = handle;
    return handle;
  }

  /**
   * Forward whatever is ready without waiting. Returns true while a session is
   * still active.
   */
  poll(): boolean {
    this.drainNames();

    const handle = this.active;
    if (!handle) {
      return false;
    }

    for (;;) {
      const result = handle.events.tryRecv();
      if (result.kind === 'empty') {
        return true;
      }
      if (result.kind === 'closed') {
        this.end(handle, handle.session.outcome ?? unknownOutcome());
        return false;
      }
      this.handleEvent(result.value);
    }
  }

  /**
   * Consume a whole session, then wait for its files to be saved.
   */
  async run(messages: ChatMessage[], options: SendOptions = {}): Promise<StreamOutcome> {
    const handle = this.start(messages, options);

    for await (const event of handle.events) {
      this.handleEvent(event);
      this.drainNames();
    }

    const outcome = await handle.session.done;
    this.end(handle, outcome);
    await this.waitForFiles();
    return outcome;
  }

  /**
   * Ask the active session to stop. Returns false when nothing is running.
   */
  cancel(): boolean {
    if (!this.active) {
      return false;
    }
    this.log.info('Cancelling stream');
    this.active.cancellation.cancel();
    return true;
  }

  /**
   * Wait until every file task has finished and forward the remaining names.
   */
  async waitForFiles(): Promise<void> {
    while (this.pending.size > 0) {
      const settled = Promise.all([...this.pending]).then(() => true);
      // Resolvers block on a full names channel, so keep draining while waiting
      while (!(await Promise.race([settled, delay(FILE_SETTLE_POLL_MS, false)]))) {
        this.drainNames();
      }
    }
    this.drainNames();
  }

  private handleEvent(event: StreamEvent): void {
    dispatchEvent(this.options.sink, event);

    if (event.type !== 'tool_output') {
      return;
    }
    for (const file of event.files) {
      if (file.id.startsWith(FILE_ID_PREFIX)) {
        this.spawnResolver(file.id);
      } else {
        this.log.debug('Skipping file with unexpected id', { fileId: file.id });
      }
    }
  }

  private spawnResolver(fileId: string): void {
    this.log.debug('Resolving file', { fileId, outputDir: this.outputDir });
    const task: Promise<void> = this.resolver
      .resolve(fileId, this.outputDir)
      .then((resolution) => {
        this.resolutions.push(resolution);
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private drainNames(): void {
    for (;;) {
      const result = this.names.tryRecv();
      if (result.kind !== 'value') {
        return;
      }
      this.options.sink.onFileResolved(result.value);
    }
  }

  private end(handle: StreamHandle, outcome: StreamOutcome): void {
    if (this.active === handle) {
      this.active = null;
    }
    this.options.sink.onStreamEnd(outcome);
  }
}

function unknownOutcome(): StreamOutcome {
  return { state: 'failed', cause: 'transport', message: 'Stream ended without an outcome' };
}
