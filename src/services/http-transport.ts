/**
 * Minimal HTTP plumbing shared by the Messages and Files API clients.
 *
 * Requests go over node:http or node:https depending on the base URL, or over a
 * Unix domain socket when one is configured (used for local proxies and tests).
 */

import http from 'node:http';
import https from 'node:https';

export interface HttpTarget {
  baseUrl: string;
  /** Send requests over this Unix socket instead of TCP. */
  socketPath?: string;
}

export interface HttpRequestOptions {
  method: string;
  path: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Make an HTTP request and resolve once response headers arrive.
 * The body is left unread for the caller to stream or collect.
 */
export function httpRequest(
  target: HttpTarget,
  options: HttpRequestOptions
): Promise<http.IncomingMessage> {
  const url = new URL(options.path, target.baseUrl);
  const useHttps = url.protocol === 'https:' && !target.socketPath;
  const path = `${url.pathname}${url.search}`;

  const requestOptions: https.RequestOptions = {
    method: options.method,
    headers: options.body
      ? { ...options.headers, 'content-length': Buffer.byteLength(options.body).toString() }
      : options.headers,
    path,
  };
  if (target.socketPath) {
    requestOptions.socketPath = target.socketPath;
  } else {
    requestOptions.hostname = url.hostname;
    requestOptions.port = url.port || undefined;
  }

  return new Promise((resolve, reject) => {
    const onResponse = (res: http.IncomingMessage) => {
      resolve(res);
    };
    const req = useHttps
      ? https.request(requestOptions, onResponse)
      : http.request(requestOptions, onResponse);

    req.on('error', reject);

    if (options.body) {
      req.write(options.body);
    }

    req.end();
  });
}

export function isSuccessStatus(res: http.IncomingMessage): boolean {
  const status = res.statusCode ?? 0;
  return status >= 200 && status < 300;
}

/**
 * Read the full response body as bytes.
 */
export function readBody(res: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    res.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    res.on('end', () => {
      resolve(Buffer.concat(chunks));
    });
    res.on('error', reject);
  });
}

/**
 * Read the full response body as UTF-8 text.
 */
export async function readText(res: http.IncomingMessage): Promise<string> {
  const body = await readBody(res);
  return body.toString('utf-8');
}

/**
 * Read the full response body and parse it as JSON.
 */
export async function readJson(res: http.IncomingMessage): Promise<unknown> {
  const text = await readText(res);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`Failed to parse JSON response: ${err}`);
  }
}
