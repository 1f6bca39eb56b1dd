import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createChannel, type ChannelReceiver } from '../lib/channel.js';
import { silentLogSink } from '../lib/logger.js';
import type { FileNameUpdate } from '../lib/stream-events.js';
import {
  fallbackFileName,
  FileResolver,
  placeholderContent,
  sanitizeFileName,
} from './file-resolver.js';
import type { FileMetadata, FilesApi } from './files-api.js';

function metadataFor(fileId: string, filename: string): FileMetadata {
  return { id: fileId, filename, size_bytes: 4, mime_type: 'text/plain' };
}

function drain(receiver: ChannelReceiver<FileNameUpdate>): FileNameUpdate[] {
  const updates: FileNameUpdate[] = [];
  for (;;) {
    const result = receiver.tryRecv();
    if (result.kind !== 'value') return updates;
    updates.push(result.value);
  }
}

describe('sanitizeFileName', () => {
  it.each([
    ['report.csv', 'report.csv'],
    ['my report (1).txt', 'my_report__1_.txt'],
    ['../../etc/passwd', 'passwd'],
    ['C:\\temp\\notes.md', 'notes.md'],
    ['out/', 'out'],
    ['résumé.pdf', 'r_sum_.pdf'],
    ['🙂.txt', '_.txt'],
    ['.hidden', '.hidden'],
    ['..', 'unnamed_file'],
    ['.', 'unnamed_file'],
    ['', 'unnamed_file'],
    ['a/..', 'unnamed_file'],
  ])('should turn %j into %j', (input, expected) => {
    expect(sanitizeFileName(input)).toBe(expected);
  });
});

describe('placeholderContent', () => {
  it('should name the file and the reason', () => {
    const content = placeholderContent('file_1', 'timed out');

    expect(content.split('\n').slice(0, 4)).toEqual([
      "Failed to download file from Claude's code execution.",
      '',
      'File ID: file_1',
      'Error: timed out',
    ]);
    expect(content.endsWith('with the file ID above.\n')).toBe(true);
  });
});

describe('FileResolver', () => {
  let outputDir: string;
  let names: ChannelReceiver<FileNameUpdate>;
  let files: {
    getFileMetadata: Mock<FilesApi['getFileMetadata']>;
    downloadFile: Mock<FilesApi['downloadFile']>;
  };
  let resolver: FileResolver;

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(os.tmpdir(), 'streamcell-files-'));
    const channel = createChannel<FileNameUpdate>();
    names = channel.receiver;
    files = {
      getFileMetadata: vi.fn<FilesApi['getFileMetadata']>(),
      downloadFile: vi.fn<FilesApi['downloadFile']>(),
    };
    resolver = new FileResolver(files, {
      names: channel.sender,
      retryDelayMs: 0,
      logSink: silentLogSink,
    });
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('should save the file under its real name', async () => {
    files.getFileMetadata.mockResolvedValue(metadataFor('file_1', 'data.csv'));
    files.downloadFile.mockResolvedValue(Buffer.from('a,b\n'));

    const resolution = await resolver.resolve('file_1', outputDir);
    const target = path.join(outputDir, 'data.csv');

    expect(resolution).toEqual({
      fileId: 'file_1',
      resolvedName: 'data.csv',
      outcome: { kind: 'saved', path: target, bytes: 4 },
    });
    expect(await readFile(target, 'utf-8')).toBe('a,b\n');
    expect(drain(names)).toEqual([{ fileId: 'file_1', displayName: 'data.csv' }]);
    expect(files.getFileMetadata).toHaveBeenCalledTimes(1);
  });

  it('should retry the metadata lookup once', async () => {
    files.getFileMetadata
      .mockRejectedValueOnce(new Error('not ready'))
      .mockResolvedValueOnce(metadataFor('file_2', 'chart.png'));
    files.downloadFile.mockResolvedValue(Buffer.from([1, 2, 3]));

    const resolution = await resolver.resolve('file_2', outputDir);

    expect(resolution.resolvedName).toBe('chart.png');
    expect(files.getFileMetadata).toHaveBeenCalledTimes(2);
    expect(drain(names)).toEqual([{ fileId: 'file_2', displayName: 'chart.png' }]);
  });

  it('should fall back to the id and write a placeholder when everything fails', async () => {
    files.getFileMetadata.mockRejectedValue(new Error('metadata unavailable'));
    files.downloadFile.mockRejectedValue(new Error('network down'));

    const resolution = await resolver.resolve('file_3', outputDir);
    const target = path.join(outputDir, 'file_3.bin');

    expect(resolution).toEqual({
      fileId: 'file_3',
      resolvedName: 'file_3.bin',
      outcome: { kind: 'placeholder', path: target, reason: 'network down' },
    });
    expect(files.getFileMetadata).toHaveBeenCalledTimes(2);
    expect(files.downloadFile).toHaveBeenCalledWith('file_3');
    expect(await readFile(target, 'utf-8')).toBe(placeholderContent('file_3', 'network down'));
    expect(drain(names)).toEqual([{ fileId: 'file_3', displayName: 'file_3.bin' }]);
  });

  it('should keep a traversing name inside the output directory', async () => {
    files.getFileMetadata.mockResolvedValue(metadataFor('file_4', '../../escape.sh'));
    files.downloadFile.mockResolvedValue(Buffer.from('echo hi\n'));

    const resolution = await resolver.resolve('file_4', outputDir);

    expect(resolution.resolvedName).toBe('../../escape.sh');
    expect(resolution.outcome).toEqual({
      kind: 'saved',
      path: path.join(outputDir, 'escape.sh'),
      bytes: 8,
    });
  });

  it('should create a missing output directory', async () => {
    files.getFileMetadata.mockResolvedValue(metadataFor('file_5', 'out.txt'));
    files.downloadFile.mockResolvedValue(Buffer.from('ok'));
    const nested = path.join(outputDir, 'a', 'b');

    await resolver.resolve('file_5', nested);

    expect(await readFile(path.join(nested, 'out.txt'), 'utf-8')).toBe('ok');
  });

  it('should report a disk failure without rejecting', async () => {
    files.getFileMetadata.mockResolvedValue(metadataFor('file_6', 'x.txt'));
    files.downloadFile.mockResolvedValue(Buffer.from('x'));
    const blocker = path.join(outputDir, 'not-a-dir');
    await writeFile(blocker, 'file in the way');

    const resolution = await resolver.resolve('file_6', path.join(blocker, 'sub'));

    expect(resolution.outcome.kind).toBe('failed');
  });

  it('should still save the file when nobody listens for names', async () => {
    names.close();
    files.getFileMetadata.mockResolvedValue(metadataFor('file_7', 'late.txt'));
    files.downloadFile.mockResolvedValue(Buffer.from('late'));

    const resolution = await resolver.resolve('file_7', outputDir);

    expect(resolution.outcome).toEqual({
      kind: 'saved',
      path: path.join(outputDir, 'late.txt'),
      bytes: 4,
    });
  });

  it('should use the fallback name format', () => {
    expect(fallbackFileName('file_abc')).toBe('file_abc.bin');
  });
});
