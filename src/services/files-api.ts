/**
 * Client for the Files API, used to name and download files created by code
 * execution.
 */

import { z } from 'zod';
import { createLogger, type LogSink, type Logger } from '../lib/logger.js';
import {
  httpRequest,
  isSuccessStatus,
  readBody,
  readJson,
  readText,
  type HttpTarget,
} from './http-transport.js';

export const ANTHROPIC_VERSION = '2023-06-01';
export const FILES_API_BETA = 'files-api-2025-04-14';

export const FileMetadataSchema = z.object({
  id: z.string(),
  filename: z.string(),
  size_bytes: z.number(),
  mime_type: z.string(),
  created_at: z.string().optional(),
  downloadable: z.boolean().optional(),
});

export type FileMetadata = z.infer<typeof FileMetadataSchema>;

export const ListFilesResponseSchema = z.object({
  data: z.array(FileMetadataSchema),
  has_more: z.boolean().optional(),
  next_page: z.string().nullish(),
});

export type ListFilesResponse = z.infer<typeof ListFilesResponseSchema>;

/**
 * Operations the file resolver needs. Implemented over HTTP by FilesApiClient.
 */
export interface FilesApi {
  getFileMetadata(fileId: string): Promise<FileMetadata>;
  downloadFile(fileId: string): Promise<Buffer>;
}

export class FilesApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly path: string,
    public readonly body: string
  ) {
    super(`Files API error: ${status} for ${path}: ${body}`);
    this.name = 'FilesApiError';
  }
}

export interface FilesApiClientOptions extends HttpTarget {
  apiKey: string;
  logSink?: LogSink;
}

export class FilesApiClient implements FilesApi {
  private readonly log: Logger;

  constructor(private readonly options: FilesApiClientOptions) {
    this.log = createLogger('files-api', options.logSink);
  }

  async getFileMetadata(fileId: string): Promise<FileMetadata> {
    this.log.debug('Fetching file metadata', { fileId });
    const json = await this.getJson(`/v1/files/${encodeURIComponent(fileId)}`);
    const parsed = FileMetadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Failed to parse file metadata: ${parsed.error.message}`);
    }
    this.log.debug('File metadata', {
      fileId,
      filename: parsed.data.filename,
      mimeType: parsed.data.mime_type,
      sizeBytes: parsed.data.size_bytes,
    });
    return parsed.data;
  }

  async downloadFile(fileId: string): Promise<Buffer> {
    this.log.debug('Downloading file', { fileId });
    const res = await this.get(`/v1/files/${encodeURIComponent(fileId)}/content`);
    const content = await readBody(res);
    this.log.debug('Downloaded file', { fileId, bytes: content.length });
    return content;
  }

  async listFiles(): Promise<ListFilesResponse> {
    const json = await this.getJson('/v1/files');
    const parsed = ListFilesResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Failed to parse file list: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async getJson(path: string): Promise<unknown> {
    const res = await this.get(path);
    return readJson(res);
  }

  private async get(path: string) {
    const res = await httpRequest(this.options, {
      method: 'GET',
      path,
      headers: {
        'x-api-key': this.options.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
        'anthropic-beta': FILES_API_BETA,
      },
    });

    if (!isSuccessStatus(res)) {
      const body = await readText(res).catch(() => 'Failed to read error response');
      this.log.debug('Files API error response', { path, status: res.statusCode, body });
      throw new FilesApiError(res.statusCode ?? 0, path, body);
    }

    return res;
  }
}
