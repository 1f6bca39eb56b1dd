import { parseArgs } from 'node:util';
import { createLogger, type LogSink } from './lib/logger.js';
import type { StreamOutcome } from './lib/stream-events.js';
import type { FilesApi } from './services/files-api.js';
import type { StreamClient } from './services/messages-client.js';
import { PipeSink, type TextWriter } from './services/pipe-sink.js';
import { StreamConsumer } from './services/stream-consumer.js';

export const USAGE = `Usage: streamcell [options] < input

Reads a prompt from stdin, streams the reply to stdout.

Options:
  -m, --message <MESSAGE>   Text to put before the piped input
  -x, --code-execution      Let the model run code in a sandbox
  -o, --output-dir <DIR>    Where to save files created by code execution
  -h, --help                Show this help
`;

export interface CliArgs {
  message?: string;
  codeExecution: boolean;
  outputDir?: string;
  help: boolean;
}

/**
 * Parse command line flags. Throws on unknown options or stray arguments.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      message: { type: 'string', short: 'm' },
      'code-execution': { type: 'boolean', short: 'x', default: false },
      'output-dir': { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    message: values.message,
    codeExecution: values['code-execution'] ?? false,
    outputDir: values['output-dir'],
    help: values.help ?? false,
  };
}

export function buildPrompt(input: string, message?: string): string {
  return message ? `${message} ${input}` : input;
}

export interface PipeModeOptions {
  prompt: string;
  codeExecution: boolean;
  outputDir: string;
  client: StreamClient;
  files: FilesApi;
  out: TextWriter;
  err: TextWriter;
  /** Aborting cancels the stream; files already reported are still saved. */
  signal?: AbortSignal;
  logSink?: LogSink;
}

export function exitCodeFor(outcome: StreamOutcome): number {
  return outcome.state === 'failed' ? 1 : 0;
}

/**
 * Send one prompt and write the reply to the given streams.
 * Resolves with the process exit code.
 */
export async function runPipeMode(options: PipeModeOptions): Promise<number> {
  const log = createLogger('pipe-mode', options.logSink);
  const consumer = new StreamConsumer({
    client: options.client,
    files: options.files,
    sink: new PipeSink(options.out, options.err),
    outputDir: options.outputDir,
    logSink: options.logSink,
  });

  const onAbort = () => {
    log.info('Interrupted, cancelling stream');
    consumer.cancel();
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const outcome = await consumer.run([{ role: 'user', content: options.prompt }], {
      codeExecution: options.codeExecution,
    });
    log.info('Pipe mode finished', {
      state: outcome.state,
      files: consumer.resolvedFiles.length,
    });
    return exitCodeFor(outcome);
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }
}
