/**
 * Chunked upload tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Deta } from '../../client/index.js';
import { HttpError, PayloadError, TransportError } from '../../errors/index.js';
import { LogLevel, MetricNames, createInMemoryObservability } from '../../observability/index.js';
import type { HttpRequest } from '../../transport/index.js';
import {
  MockTransport,
  createTestConfig,
  errorResponse,
  failedResponse,
  jsonResponse,
  relativeUrl,
} from '../../testing/index.js';
import type { MockHandler } from '../../testing/index.js';
import { MAX_CHUNK_SIZE } from '../../types/index.js';
import type { Drive } from '../index.js';
import { splitIntoChunks } from '../index.js';

const ROOT = 'https://drive.deta.sh/v1/testproj/photos';
const UPLOAD_ID = 'up-1';

interface FakeDriveOptions {
  failParts?: number[];
  disconnectParts?: number[];
  failInitiate?: boolean;
  failCommit?: boolean;
}

/**
 * Answers the upload endpoints of one drive, failing on request.
 */
function fakeDrive(options: FakeDriveOptions = {}): MockHandler {
  return (request: HttpRequest) => {
    const url = new URL(request.url);
    const path = url.pathname.slice('/v1/testproj/photos'.length);
    const name = url.searchParams.get('name') ?? '';
    const info = { name, project_id: 'testproj', drive_name: 'photos' };

    if (request.method === 'POST' && path === '/files') {
      return jsonResponse(info, 201);
    }
    if (request.method === 'POST' && path === '/uploads') {
      return options.failInitiate
        ? errorResponse(500, ['initiate failed'])
        : jsonResponse({ ...info, upload_id: UPLOAD_ID }, 202);
    }
    if (request.method === 'POST' && path === `/uploads/${UPLOAD_ID}/parts`) {
      const part = Number(url.searchParams.get('part'));
      if (options.disconnectParts?.includes(part)) {
        return failedResponse(new TransportError('connection reset'));
      }
      return options.failParts?.includes(part)
        ? errorResponse(500, [`part ${part} failed`])
        : jsonResponse({ ...info, part }, 200);
    }
    if (request.method === 'PATCH' && path === `/uploads/${UPLOAD_ID}`) {
      return options.failCommit
        ? errorResponse(400, ['missing parts'])
        : jsonResponse({ ...info, upload_id: UPLOAD_ID }, 200);
    }
    if (request.method === 'DELETE' && path === `/uploads/${UPLOAD_ID}`) {
      return jsonResponse({ ...info, upload_id: UPLOAD_ID, status: 'aborted' }, 200);
    }
    return errorResponse(404, ['no route']);
  };
}

function bytes(length: number): Uint8Array {
  return new Uint8Array(length).map((_, i) => i % 256);
}

describe('splitIntoChunks', () => {
  it('should split into chunks of the given size with a shorter tail', () => {
    expect(splitIntoChunks(bytes(25), 10).map((chunk) => chunk.length)).toEqual([10, 10, 5]);
    expect(splitIntoChunks(bytes(20), 10).map((chunk) => chunk.length)).toEqual([10, 10]);
    expect(splitIntoChunks(new Uint8Array(0), 10)).toEqual([]);
  });

  it('should reject a non-positive size', () => {
    expect(() => splitIntoChunks(bytes(1), 0)).toThrow(PayloadError);
  });
});

describe('ChunkUploader', () => {
  let transport: MockTransport;
  let observability: ReturnType<typeof createInMemoryObservability>;
  let drive: Drive;

  beforeEach(() => {
    transport = new MockTransport();
    observability = createInMemoryObservability();
    drive = new Deta(createTestConfig(), { transport, observability }).drive('photos');
  });

  function calls(): string[] {
    return transport
      .getRequests()
      .map((request) => `${request.method} ${relativeUrl(request, ROOT)}`);
  }

  function countMethod(method: string): number {
    return transport.getRequests().filter((request) => request.method === method).length;
  }

  it('should send content of exactly the chunk size in one request', async () => {
    transport.setHandler(fakeDrive());
    const content = new Uint8Array(MAX_CHUNK_SIZE);

    const result = await drive.put('big.bin', content);

    expect(result).toEqual({ status: 'completed', name: 'big.bin', size: MAX_CHUNK_SIZE, parts: 1 });
    expect(calls()).toEqual(['POST /files?name=big.bin']);
    expect(transport.getRequests()[0]?.body).toBe(content);
    expect(transport.getRequests()[0]?.headers['Content-Type']).toBe('application/octet-stream');
  });

  it('should split content one byte over the chunk size into two parts', async () => {
    transport.setHandler(fakeDrive());
    const content = new Uint8Array(MAX_CHUNK_SIZE + 1);

    const result = await drive.put('big.bin', content);

    expect(calls()).toEqual([
      'POST /uploads?name=big.bin',
      `POST /uploads/${UPLOAD_ID}/parts?name=big.bin&part=1`,
      `POST /uploads/${UPLOAD_ID}/parts?name=big.bin&part=2`,
      `PATCH /uploads/${UPLOAD_ID}?name=big.bin`,
    ]);
    const partSizes = transport
      .getRequests()
      .slice(1, 3)
      .map((request) => (request.body instanceof Uint8Array ? request.body.length : -1));
    expect(partSizes).toEqual([MAX_CHUNK_SIZE, 1]);
    expect(countMethod('PATCH') + countMethod('DELETE')).toBe(1);
    expect(result).toEqual({
      status: 'completed',
      name: 'big.bin',
      size: MAX_CHUNK_SIZE + 1,
      parts: 2,
      uploadId: UPLOAD_ID,
    });
  });

  it('should abort when a middle part fails, after trying every part', async () => {
    transport.setHandler(fakeDrive({ failParts: [2] }));

    const result = await drive.put('photo.jpg', bytes(25), { chunkSize: 10 });

    expect(calls()).toEqual([
      'POST /uploads?name=photo.jpg',
      `POST /uploads/${UPLOAD_ID}/parts?name=photo.jpg&part=1`,
      `POST /uploads/${UPLOAD_ID}/parts?name=photo.jpg&part=2`,
      `POST /uploads/${UPLOAD_ID}/parts?name=photo.jpg&part=3`,
      `DELETE /uploads/${UPLOAD_ID}?name=photo.jpg`,
    ]);
    expect(countMethod('PATCH')).toBe(0);
    expect(result.status).toBe('aborted');
    if (result.status === 'aborted') {
      expect(result.uploadId).toBe(UPLOAD_ID);
      expect(result.uploadedParts).toEqual([1, 3]);
      expect(result.failedParts).toEqual([2]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.error).toBeInstanceOf(HttpError);
      expect(result.errors[0]?.error.message).toBe('HTTP error: 500 part 2 failed');
    }
    expect(observability.metrics.getCounter(MetricNames.UPLOADS_ABORTED)).toBe(1);
    expect(observability.metrics.getCounter(MetricNames.UPLOAD_PARTS)).toBe(2);
  });

  it('should keep uploading after a connection failure and abort once', async () => {
    transport.setHandler(fakeDrive({ disconnectParts: [1] }));

    const result = await drive.put('clip.mp4', bytes(25), { chunkSize: 10 });

    expect(calls()).toEqual([
      'POST /uploads?name=clip.mp4',
      `POST /uploads/${UPLOAD_ID}/parts?name=clip.mp4&part=1`,
      `POST /uploads/${UPLOAD_ID}/parts?name=clip.mp4&part=2`,
      `POST /uploads/${UPLOAD_ID}/parts?name=clip.mp4&part=3`,
      `DELETE /uploads/${UPLOAD_ID}?name=clip.mp4`,
    ]);
    expect(countMethod('DELETE')).toBe(1);
    expect(countMethod('PATCH')).toBe(0);
    expect(result.status).toBe('aborted');
    if (result.status === 'aborted') {
      expect(result.uploadedParts).toEqual([2, 3]);
      expect(result.failedParts).toEqual([1]);
      expect(result.errors[0]?.error).toBeInstanceOf(TransportError);
      expect(result.errors[0]?.error.message).toBe('Transport error: connection reset');
    }
  });

  it('should encode the name once, identically in every URL', async () => {
    transport.setHandler(fakeDrive({ failParts: [3] }));
    const encoded = 'name=my%20dir%2F%C3%A4%20file.bin';

    await drive.put('my dir/ä file.bin', bytes(25), { chunkSize: 10 });

    const urls = transport.getRequests().map((request) => request.url);
    expect(urls).toHaveLength(5);
    for (const url of urls) {
      expect(new URL(url).search.startsWith(`?${encoded}`)).toBe(true);
    }
  });

  it('should not continue when the session cannot be started', async () => {
    transport.setHandler(fakeDrive({ failInitiate: true }));

    await expect(drive.put('a.bin', bytes(25), { chunkSize: 10 })).rejects.toThrow(
      'HTTP error: 500 initiate failed'
    );
    expect(calls()).toEqual(['POST /uploads?name=a.bin']);
  });

  it('should propagate a failed commit', async () => {
    transport.setHandler(fakeDrive({ failCommit: true }));

    await expect(drive.put('a.bin', bytes(25), { chunkSize: 10 })).rejects.toThrow(
      'missing parts'
    );
    expect(countMethod('PATCH')).toBe(1);
    expect(countMethod('DELETE')).toBe(0);
  });

  it('should upload parts concurrently and still decide once', async () => {
    transport.setHandler(fakeDrive());

    const result = await drive.put('a.bin', bytes(50), { chunkSize: 10, concurrency: 3 });

    const parts = transport
      .getRequests()
      .filter((request) => request.url.includes('/parts?'))
      .map((request) => new URL(request.url).searchParams.get('part'));
    expect([...parts].sort()).toEqual(['1', '2', '3', '4', '5']);
    expect(countMethod('PATCH')).toBe(1);
    expect(calls()[calls().length - 1]).toBe(`PATCH /uploads/${UPLOAD_ID}?name=a.bin`);
    expect(result.status).toBe('completed');
  });

  it('should report progress after each part', async () => {
    transport.setHandler(fakeDrive());
    const onProgress = vi.fn();

    await drive.put('a.bin', bytes(25), { chunkSize: 10, onProgress });

    expect(onProgress.mock.calls).toEqual([
      [10, 25],
      [20, 25],
      [25, 25],
    ]);
  });

  it('should commit when the progress callback throws', async () => {
    transport.setHandler(fakeDrive());
    const onProgress = vi.fn((uploaded: number) => {
      if (uploaded === 20) {
        throw new Error('progress bar closed');
      }
    });

    const result = await drive.put('a.bin', bytes(25), { chunkSize: 10, onProgress });

    expect(result).toEqual({
      status: 'completed',
      name: 'a.bin',
      size: 25,
      parts: 3,
      uploadId: UPLOAD_ID,
    });
    expect(calls()).toEqual([
      'POST /uploads?name=a.bin',
      `POST /uploads/${UPLOAD_ID}/parts?name=a.bin&part=1`,
      `POST /uploads/${UPLOAD_ID}/parts?name=a.bin&part=2`,
      `POST /uploads/${UPLOAD_ID}/parts?name=a.bin&part=3`,
      `PATCH /uploads/${UPLOAD_ID}?name=a.bin`,
    ]);
    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(observability.logger.getEntries(LogLevel.WARN)).toEqual([
      {
        level: LogLevel.WARN,
        message: 'Progress callback failed',
        context: { uploaded: 20, total: 25, error: 'progress bar closed' },
      },
    ]);
  });

  it('should store strings as UTF-8', async () => {
    transport.setHandler(fakeDrive());

    const result = await drive.put('hello.txt', 'héllo');

    expect(result).toEqual({ status: 'completed', name: 'hello.txt', size: 6, parts: 1 });
    expect(transport.getRequests()[0]?.body).toEqual(new TextEncoder().encode('héllo'));
  });

  it.each([
    [{ chunkSize: 0 }],
    [{ chunkSize: MAX_CHUNK_SIZE + 1 }],
    [{ chunkSize: 1.5 }],
    [{ concurrency: 0 }],
  ])('should reject invalid options %o without sending', async (options) => {
    await expect(drive.put('a.bin', bytes(5), options)).rejects.toBeInstanceOf(PayloadError);
    expect(transport.getRequests()).toHaveLength(0);
  });

  it('should reject an empty name without sending', async () => {
    await expect(drive.put('', bytes(5))).rejects.toBeInstanceOf(PayloadError);
    expect(transport.getRequests()).toHaveLength(0);
  });
});
