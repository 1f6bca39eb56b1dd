/**
 * Structured logging for the streaming client.
 *
 * Loggers are created per context and write through an explicit sink, so the
 * command line entry point can route everything to a file while stdout carries
 * the model's output. There is no process-wide logger state.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggedError {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  context: string;
  message: string;
  data?: Record<string, unknown>;
  error?: LoggedError;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>, error?: Error): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

function hasFields(data: Record<string, unknown> | undefined): data is Record<string, unknown> {
  return data !== undefined && Object.keys(data).length > 0;
}

/**
 * One line per entry; an attached error adds its name, message and stack
 * frames on indented lines below.
 */
export function formatLogEntry(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(5);
  const head = `[${entry.timestamp}] [${level}] [${entry.context}] ${entry.message}`;
  const lines = [hasFields(entry.data) ? `${head} ${JSON.stringify(entry.data)}` : head];

  if (entry.error) {
    lines.push(`  Error: ${entry.error.name}: ${entry.error.message}`);
    // The stack's first line is the message again
    const frames = entry.error.stack?.split('\n').slice(1) ?? [];
    lines.push(...frames.map((frame) => `  ${frame}`));
  }

  return lines.join('\n');
}

/**
 * Writes entries to the console, errors and warnings on stderr.
 */
export const consoleLogSink: LogSink = (entry) => {
  const line = formatLogEntry(entry);
  switch (entry.level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

export const silentLogSink: LogSink = () => {};

/**
 * Appends each entry as a line to a file. Write failures are reported once on
 * stderr and further entries are dropped.
 */
export function createFileLogSink(filePath: string): LogSink {
  let broken = false;
  return (entry) => {
    if (broken) return;
    try {
      appendFileSync(filePath, formatLogEntry(entry) + '\n', 'utf-8');
    } catch (err) {
      broken = true;
      console.error(`Could not write log file ${filePath}: ${getErrorMessage(err)}`);
    }
  };
}

/**
 * Logger tagged with a context such as a module name.
 */
export function createLogger(context: string, sink: LogSink = consoleLogSink): Logger {
  const emit = (
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void => {
    sink({
      timestamp: new Date().toISOString(),
      level,
      context,
      message,
      ...(hasFields(data) ? { data } : {}),
      ...(error ? { error: { name: error.name, message: error.message, stack: error.stack } } : {}),
    });
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data, error) => emit('warn', message, data, error),
    error: (message, error, data) => emit('error', message, data, error),
  };
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Wraps thrown non-Error values so they can be logged with a stack.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
