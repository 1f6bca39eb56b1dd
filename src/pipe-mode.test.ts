import { describe, it, expect } from 'vitest';
import { CancellationToken } from './lib/cancellation.js';
import { createChannel } from './lib/channel.js';
import { silentLogSink } from './lib/logger.js';
import type { ChatMessage, StreamEvent, StreamOutcome } from './lib/stream-events.js';
import { buildPrompt, exitCodeFor, parseCliArgs, runPipeMode } from './pipe-mode.js';
import type { FilesApi } from './services/files-api.js';
import type { SendOptions, StreamClient, StreamHandle } from './services/messages-client.js';
import type { TextWriter } from './services/pipe-sink.js';

class BufferWriter implements TextWriter {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

/**
 * Replies with fixed events, or waits for cancellation when given none.
 */
class FixedReplyClient implements StreamClient {
  requests: Array<{ messages: ChatMessage[]; options: SendOptions }> = [];

  constructor(
    private readonly reply: StreamEvent[],
    private readonly outcome: StreamOutcome = { state: 'finished' }
  ) {}

  sendMessageStream(messages: ChatMessage[], options: SendOptions = {}): StreamHandle {
    this.requests.push({ messages, options });
    const { sender, receiver } = createChannel<StreamEvent>();
    const cancellation = new CancellationToken();
    let outcome: StreamOutcome | null = null;
    const reply = this.reply;
    const final = this.outcome;

    const done = (async (): Promise<StreamOutcome> => {
      for (const event of reply) {
        await sender.send(event);
      }
      let result = final;
      if (reply.length === 0) {
        await cancellation.cancelled();
        result = { state: 'cancelled' };
      }
      outcome = result;
      sender.close();
      return result;
    })();

    return {
      events: receiver,
      cancellation,
      session: {
        done,
        get state() {
          return outcome?.state ?? 'streaming';
        },
        get outcome() {
          return outcome;
        },
      },
    };
  }
}

const noFiles: FilesApi = {
  getFileMetadata: () => Promise.reject(new Error('unexpected metadata lookup')),
  downloadFile: () => Promise.reject(new Error('unexpected download')),
};

describe('parseCliArgs', () => {
  it('should default every flag', () => {
    expect(parseCliArgs([])).toEqual({
      message: undefined,
      codeExecution: false,
      outputDir: undefined,
      help: false,
    });
  });

  it('should read short flags', () => {
    expect(parseCliArgs(['-m', 'Summarize:', '-x', '-o', 'files'])).toEqual({
      message: 'Summarize:',
      codeExecution: true,
      outputDir: 'files',
      help: false,
    });
  });

  it('should read long flags', () => {
    expect(parseCliArgs(['--message=Hi', '--code-execution', '--output-dir', 'out'])).toEqual({
      message: 'Hi',
      codeExecution: true,
      outputDir: 'out',
      help: false,
    });
  });

  it('should reject unknown options', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow();
  });

  it('should reject positional arguments', () => {
    expect(() => parseCliArgs(['hello'])).toThrow();
  });
});

describe('buildPrompt', () => {
  it('should put the message before the input', () => {
    expect(buildPrompt('data.csv contents', 'Summarize:')).toBe('Summarize: data.csv contents');
  });

  it('should use the input alone without a message', () => {
    expect(buildPrompt('just this')).toBe('just this');
    expect(buildPrompt('just this', '')).toBe('just this');
  });
});

describe('exitCodeFor', () => {
  it('should fail only failed sessions', () => {
    expect(exitCodeFor({ state: 'finished' })).toBe(0);
    expect(exitCodeFor({ state: 'cancelled' })).toBe(0);
    expect(exitCodeFor({ state: 'failed', cause: 'transport', message: 'down' })).toBe(1);
  });
});

describe('runPipeMode', () => {
  it('should stream the reply to stdout', async () => {
    const client = new FixedReplyClient([
      { type: 'connection_status', status: 'Sending request...' },
      { type: 'text', text: 'The answer' },
      { type: 'text', text: ' is 42.' },
    ]);
    const out = new BufferWriter();
    const err = new BufferWriter();

    const code = await runPipeMode({
      prompt: 'What is 6*7?',
      codeExecution: true,
      outputDir: 'unused',
      client,
      files: noFiles,
      out,
      err,
      logSink: silentLogSink,
    });

    expect(code).toBe(0);
    expect(out.text).toBe('The answer is 42.\n');
    expect(err.text).toBe('');
    expect(client.requests).toEqual([
      {
        messages: [{ role: 'user', content: 'What is 6*7?' }],
        options: { codeExecution: true },
      },
    ]);
  });

  it('should exit with 1 when the session fails', async () => {
    const client = new FixedReplyClient(
      [{ type: 'text', text: '\n\nError: Rate limit exceeded: busy\n' }],
      { state: 'failed', cause: 'api', message: 'Rate limit exceeded: busy' }
    );
    const out = new BufferWriter();

    const code = await runPipeMode({
      prompt: 'hi',
      codeExecution: false,
      outputDir: 'unused',
      client,
      files: noFiles,
      out,
      err: new BufferWriter(),
      logSink: silentLogSink,
    });

    expect(code).toBe(1);
    expect(out.text).toBe('\n\nError: Rate limit exceeded: busy\n\n');
  });

  it('should cancel the stream when the signal aborts', async () => {
    const interrupt = new AbortController();
    const out = new BufferWriter();

    const running = runPipeMode({
      prompt: 'hi',
      codeExecution: false,
      outputDir: 'unused',
      client: new FixedReplyClient([]),
      files: noFiles,
      out,
      err: new BufferWriter(),
      signal: interrupt.signal,
      logSink: silentLogSink,
    });
    interrupt.abort();

    expect(await running).toBe(0);
    expect(out.text).toBe('\n');
  });
});
