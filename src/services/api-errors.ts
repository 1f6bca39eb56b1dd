/**
 * Failures that end a streaming session before any stream data is read.
 *
 * Each is reported to the consumer once, as a single text event, and the
 * session ends in the failed state.
 */

import { getErrorMessage } from '../lib/logger.js';

export type ApiErrorKind =
  | 'authentication'
  | 'invalid_model'
  | 'invalid_request'
  | 'rate_limit'
  | 'server'
  | 'unknown';

/**
 * The request could not be sent or no response arrived (DNS, connect, reset, timeout).
 */
export class TransportError extends Error {
  constructor(cause: unknown) {
    super(`Failed to connect to Anthropic API: ${getErrorMessage(cause)}`, { cause });
    this.name = 'TransportError';
  }
}

/**
 * The API answered with a non-success status.
 */
export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly kind: ApiErrorKind,
    public readonly body: string
  ) {
    super(describeApiError(status, kind, body));
    this.name = 'ApiError';
  }
}

export function classifyApiError(status: number, body: string): ApiErrorKind {
  if (status === 401) return 'authentication';
  if (status === 400) return body.includes('model') ? 'invalid_model' : 'invalid_request';
  if (status === 429) return 'rate_limit';
  if (status >= 500 && status < 600) return 'server';
  return 'unknown';
}

function describeApiError(status: number, kind: ApiErrorKind, body: string): string {
  switch (kind) {
    case 'authentication':
      return `Invalid or missing API key: ${body}`;
    case 'invalid_model':
      return `Invalid model name: ${body}`;
    case 'invalid_request':
      return `Bad request: ${body}`;
    case 'rate_limit':
      return `Rate limit exceeded: ${body}`;
    case 'server':
      return `Anthropic server error: ${body}`;
    case 'unknown':
      return `API error (${status}): ${body}`;
  }
}

export function createApiError(status: number, body: string): ApiError {
  return new ApiError(status, classifyApiError(status, body), body);
}

/**
 * The text event that reports a terminal session failure.
 */
export function formatFailureText(error: TransportError | ApiError): string {
  return `\n\nError: ${error.message}\n`;
}
