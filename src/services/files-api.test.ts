import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type http from 'node:http';
import { silentLogSink } from '../lib/logger.js';
import { createMockServer, type MockServer } from '../test/mock-server.js';
import { FilesApiClient, FilesApiError } from './files-api.js';

const metadata = {
  id: 'file_abc',
  type: 'file',
  filename: 'plot.png',
  size_bytes: 4,
  mime_type: 'image/png',
  created_at: '2025-06-01T00:00:00Z',
  downloadable: true,
};

describe('FilesApiClient', () => {
  let mockServer: MockServer;
  let client: FilesApiClient;

  beforeEach(async () => {
    mockServer = createMockServer();
    const socketPath = await mockServer.start();
    client = new FilesApiClient({
      baseUrl: 'http://localhost',
      socketPath,
      apiKey: 'test-api-key',
      logSink: silentLogSink,
    });
  });

  afterEach(async () => {
    await mockServer.close();
  });

  describe('getFileMetadata', () => {
    it('should fetch and validate metadata', async () => {
      let headers: http.IncomingHttpHeaders = {};
      mockServer.setHandler((req, res) => {
        expect(req.method).toBe('GET');
        expect(req.url).toBe('/v1/files/file_abc');
        headers = req.headers;
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(metadata));
      });

      const result = await client.getFileMetadata('file_abc');

      expect(result).toEqual({
        id: 'file_abc',
        filename: 'plot.png',
        size_bytes: 4,
        mime_type: 'image/png',
        created_at: '2025-06-01T00:00:00Z',
        downloadable: true,
      });
      expect(headers['x-api-key']).toBe('test-api-key');
      expect(headers['anthropic-version']).toBe('2023-06-01');
      expect(headers['anthropic-beta']).toBe('files-api-2025-04-14');
    });

    it('should encode the file id in the path', async () => {
      let url: string | undefined;
      mockServer.setHandler((req, res) => {
        url = req.url;
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(metadata));
      });

      await client.getFileMetadata('file/../x y');

      expect(url).toBe('/v1/files/file%2F..%2Fx%20y');
    });

    it('should throw FilesApiError on a non-success status', async () => {
      mockServer.setHandler((_req, res) => {
        res.writeHead(404, { 'Content-Type': 'application/json' });
        res.end('{"error":"not found"}');
      });

      const error = await client.getFileMetadata('file_missing').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(FilesApiError);
      if (error instanceof FilesApiError) {
        expect(error.status).toBe(404);
        expect(error.path).toBe('/v1/files/file_missing');
        expect(error.message).toBe(
          'Files API error: 404 for /v1/files/file_missing: {"error":"not found"}'
        );
      }
    });

    it('should reject metadata of the wrong shape', async () => {
      mockServer.setHandler((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ id: 'file_abc' }));
      });

      await expect(client.getFileMetadata('file_abc')).rejects.toThrow(
        'Failed to parse file metadata'
      );
    });

    it('should reject a body that is not JSON', async () => {
      mockServer.setHandler((_req, res) => {
        res.writeHead(200, { 'Content-Type': 'text/plain' });
        res.end('not json');
      });

      await expect(client.getFileMetadata('file_abc')).rejects.toThrow(
        'Failed to parse JSON response'
      );
    });
  });

  describe('downloadFile', () => {
    it('should return the raw bytes', async () => {
      mockServer.setHandler((req, res) => {
        expect(req.url).toBe('/v1/files/file_abc/content');
        res.writeHead(200, { 'Content-Type': 'application/octet-stream' });
        res.end(Buffer.from([0x89, 0x50, 0x4e, 0x47]));
      });

      const content = await client.downloadFile('file_abc');

      expect([...content]).toEqual([0x89, 0x50, 0x4e, 0x47]);
    });

    it('should throw on a server error', async () => {
      mockServer.setHandler((_req, res) => {
        res.writeHead(500);
        res.end('boom');
      });

      await expect(client.downloadFile('file_abc')).rejects.toThrow(
        'Files API error: 500 for /v1/files/file_abc/content: boom'
      );
    });
  });

  describe('listFiles', () => {
    it('should list files', async () => {
      mockServer.setHandler((req, res) => {
        expect(req.url).toBe('/v1/files');
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ data: [metadata], has_more: false }));
      });

      const list = await client.listFiles();

      expect(list.data.map((file) => file.filename)).toEqual(['plot.png']);
      expect(list.has_more).toBe(false);
    });
  });
});
