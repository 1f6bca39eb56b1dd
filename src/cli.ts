#!/usr/bin/env node
import { text } from 'node:stream/consumers';
import { getEnv } from './lib/env.js';
import { createFileLogSink, createLogger, getErrorMessage } from './lib/logger.js';
import { buildPrompt, parseCliArgs, runPipeMode, USAGE } from './pipe-mode.js';
import { FilesApiClient } from './services/files-api.js';
import { MessagesClient } from './services/messages-client.js';

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const env = getEnv();
  const logSink = createFileLogSink(env.STREAMCELL_LOG_FILE);
  const log = createLogger('cli', logSink);
  log.info('Started', {
    model: env.ANTHROPIC_MODEL,
    codeExecution: args.codeExecution,
  });

  if (!env.ANTHROPIC_API_KEY) {
    console.error('ANTHROPIC_API_KEY must be set in the environment');
    return 1;
  }

  const input = await text(process.stdin);

  const target = { baseUrl: env.ANTHROPIC_BASE_URL };
  const client = new MessagesClient({
    ...target,
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.ANTHROPIC_MODEL,
    maxTokens: env.STREAMCELL_MAX_TOKENS,
    codeExecution: args.codeExecution,
    logSink,
  });
  const files = new FilesApiClient({ ...target, apiKey: env.ANTHROPIC_API_KEY, logSink });

  const interrupt = new AbortController();
  process.once('SIGINT', () => interrupt.abort());

  const code = await runPipeMode({
    prompt: buildPrompt(input, args.message),
    codeExecution: args.codeExecution,
    outputDir: args.outputDir ?? env.STREAMCELL_OUTPUT_DIR,
    client,
    files,
    out: process.stdout,
    err: process.stderr,
    signal: interrupt.signal,
    logSink,
  });
  log.info('Terminated', { exitCode: code });
  return code;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Error: ${getErrorMessage(err)}`);
    process.exitCode = 1;
  }
);
