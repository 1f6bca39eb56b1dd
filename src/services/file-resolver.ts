/**
 * Resolves files created by code execution: looks up their real name, reports
 * it to the consumer, and saves the content under the output directory.
 *
 * Failures stay local to the one file. A missing name falls back to
 * "{fileId}.bin" and a failed download leaves a placeholder file that explains
 * what went wrong; resolve() itself never rejects.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChannelSender } from '../lib/channel.js';
import { createLogger, getErrorMessage, toError, type LogSink, type Logger } from '../lib/logger.js';
import type { FileNameUpdate } from '../lib/stream-events.js';
import type { FilesApi } from './files-api.js';

export const METADATA_RETRY_DELAY_MS = 500;

const UNNAMED_FILE = 'unnamed_file';

export type FileResolutionOutcome =
  | { kind: 'saved'; path: string; bytes: number }
  | { kind: 'placeholder'; path: string; reason: string }
  | { kind: 'failed'; reason: string };

export interface FileResolution {
  fileId: string;
  resolvedName: string;
  outcome: FileResolutionOutcome;
}

export interface FileResolverOptions {
  /** Receives the resolved display name of every file. */
  names: ChannelSender<FileNameUpdate>;
  retryDelayMs?: number;
  logSink?: LogSink;
}

/**
 * Reduce a file name to a safe single path segment: only the last segment is
 * kept and every character outside [A-Za-z0-9._-] becomes an underscore.
 */
export function sanitizeFileName(name: string): string {
  const segments = name.split(/[\\/]/).filter((segment) => segment !== '' && segment !== '.');
  const last = segments.length > 0 ? segments[segments.length - 1] : '';
  if (last === '' || last === '..') {
    return UNNAMED_FILE;
  }
  return last.replace(/[^A-Za-z0-9._-]/gu, '_');
}

export function fallbackFileName(fileId: string): string {
  return `${fileId}.bin`;
}

export function placeholderContent(fileId: string, reason: string): string {
  return [
    "Failed to download file from Claude's code execution.",
    '',
    `File ID: ${fileId}`,
    `Error: ${reason}`,
    '',
    'This could be due to:',
    '- The file API not being available yet',
    '- The file having expired',
    '- Authentication or permission issues',
    '',
    'You can try using the Anthropic Files API directly with the file ID above.',
    '',
  ].join('\n');
}

export class FileResolver {
  private readonly log: Logger;
  private readonly retryDelayMs: number;

  constructor(
    private readonly files: FilesApi,
    private readonly options: FileResolverOptions
  ) {
    this.log = createLogger('file-resolver', options.logSink);
    this.retryDelayMs = options.retryDelayMs ?? METADATA_RETRY_DELAY_MS;
  }

  async resolve(fileId: string, outputDir: string): Promise<FileResolution> {
    const resolvedName = await this.resolveName(fileId);

    const delivered = await this.options.names.send({ fileId, displayName: resolvedName });
    if (!delivered) {
      this.log.debug('Name update not delivered, consumer is gone', { fileId });
    }

    const outcome = await this.save(fileId, resolvedName, outputDir);
    return { fileId, resolvedName, outcome };
  }

  private async resolveName(fileId: string): Promise<string> {
    try {
      const metadata = await this.files.getFileMetadata(fileId);
      return metadata.filename;
    } catch (err) {
      this.log.warn('Could not fetch file metadata, retrying', {
        fileId,
        error: getErrorMessage(err),
      });
    }

    // The file may not be ready right after the tool result arrives
    await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));

    try {
      const metadata = await this.files.getFileMetadata(fileId);
      return metadata.filename;
    } catch (err) {
      const fallback = fallbackFileName(fileId);
      this.log.warn('File metadata unavailable, using fallback name', {
        fileId,
        fallback,
        error: getErrorMessage(err),
      });
      return fallback;
    }
  }

  private async save(
    fileId: string,
    resolvedName: string,
    outputDir: string
  ): Promise<FileResolutionOutcome> {
    const path = join(outputDir, sanitizeFileName(resolvedName));

    try {
      await mkdir(outputDir, { recursive: true });

      let content: Buffer;
      try {
        content = await this.files.downloadFile(fileId);
      } catch (err) {
        const reason = getErrorMessage(err);
        await writeFile(path, placeholderContent(fileId, reason), 'utf-8');
        this.log.warn('Could not download file content, wrote placeholder', {
          fileId,
          path,
          error: reason,
        });
        return { kind: 'placeholder', path, reason };
      }

      await writeFile(path, content);
      this.log.info('Downloaded file', { fileId, path, bytes: content.length });
      return { kind: 'saved', path, bytes: content.length };
    } catch (err) {
      this.log.error('Failed to save file', toError(err), { fileId, path });
      return { kind: 'failed', reason: getErrorMessage(err) };
    }
  }
}
