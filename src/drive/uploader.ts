/**
 * Chunked uploads to a drive.
 *
 * Content up to the chunk size goes up in one request. Anything larger runs
 * through an upload session: initiate, upload every part, then commit if
 * every part succeeded or abort otherwise. Exactly one of commit and abort
 * is sent, so no session is left open on the server.
 */

import { PayloadError } from '../errors/index.js';
import type { DetaHttpClient } from '../http/index.js';
import type { Observability } from '../observability/index.js';
import { MetricNames } from '../observability/index.js';
import { FileInfoSchema, MAX_CHUNK_SIZE, UploadSessionResponseSchema } from '../types/index.js';

/**
 * Options for {@link ChunkUploader.upload}.
 */
export interface UploadOptions {
  /**
   * Largest part in bytes, 1 to 10 MiB. Content of at most this size is sent
   * in a single request. Default: 10 MiB
   */
  chunkSize?: number;

  /**
   * Number of parts uploaded at the same time. Default: 1
   */
  concurrency?: number;

  /**
   * Called after each part that was stored. A throwing callback is logged
   * and does not change the outcome of the upload.
   * @param uploaded - Bytes stored so far
   * @param total - Total bytes to store
   */
  onProgress?: (uploaded: number, total: number) => void;
}

/**
 * A part that could not be uploaded.
 */
export interface PartFailure {
  /** 1-based part number */
  part: number;
  error: Error;
}

export interface UploadCompleted {
  status: 'completed';
  name: string;
  size: number;
  /** Number of requests the content was split into */
  parts: number;
  /** Set when the content went through an upload session */
  uploadId?: string;
}

export interface UploadAborted {
  status: 'aborted';
  name: string;
  uploadId: string;
  /** Parts the server stored before the session was discarded, ascending */
  uploadedParts: number[];
  /** 1-based part numbers, ascending */
  failedParts: number[];
  errors: PartFailure[];
}

export type UploadResult = UploadCompleted | UploadAborted;

/**
 * Server-side state of one chunked upload, owned by a single upload call.
 */
interface UploadSession {
  uploadId: string;
  name: string;
  partsUploaded: number[];
  failures: PartFailure[];
  uploadedBytes: number;
}

/**
 * Splits content into consecutive chunks of at most `chunkSize` bytes.
 */
export function splitIntoChunks(content: Uint8Array, chunkSize: number): Uint8Array[] {
  if (chunkSize <= 0) {
    throw new PayloadError('chunk size must be positive');
  }

  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < content.length; offset += chunkSize) {
    chunks.push(content.subarray(offset, Math.min(offset + chunkSize, content.length)));
  }
  return chunks;
}

const textEncoder = new TextEncoder();

export class ChunkUploader {
  constructor(
    private readonly http: DetaHttpClient,
    private readonly observability: Observability
  ) {}

  /**
   * Stores content under `saveAs`.
   *
   * An aborted upload is reported in the result; only failures of the
   * initiate, commit or abort requests, or of a single-request upload, are
   * thrown.
   *
   * @param saveAs - Target file name; percent-encoded once for every URL
   * @param content - Bytes, or a string stored as UTF-8
   * @throws {PayloadError} If the name or options are invalid
   */
  async upload(
    saveAs: string,
    content: Uint8Array | string,
    options: UploadOptions = {}
  ): Promise<UploadResult> {
    const chunkSize = options.chunkSize ?? MAX_CHUNK_SIZE;
    const concurrency = options.concurrency ?? 1;
    validateUpload(saveAs, chunkSize, concurrency);

    const bytes = typeof content === 'string' ? textEncoder.encode(content) : content;

    if (bytes.length <= chunkSize) {
      return this.uploadSingle(saveAs, bytes, options);
    }
    return this.uploadChunked(saveAs, bytes, chunkSize, concurrency, options);
  }

  private async uploadSingle(
    saveAs: string,
    bytes: Uint8Array,
    options: UploadOptions
  ): Promise<UploadCompleted> {
    const info = await this.http.requestJson(
      { method: 'POST', path: '/files', query: { name: saveAs }, bytes },
      FileInfoSchema
    );

    this.observability.metrics.increment(MetricNames.UPLOAD_BYTES, bytes.length);
    this.reportProgress(options, bytes.length, bytes.length);

    return { status: 'completed', name: info.name, size: bytes.length, parts: 1 };
  }

  private async uploadChunked(
    saveAs: string,
    bytes: Uint8Array,
    chunkSize: number,
    concurrency: number,
    options: UploadOptions
  ): Promise<UploadResult> {
    const { logger, metrics } = this.observability;
    const chunks = splitIntoChunks(bytes, chunkSize);

    // Initiate failures propagate; no session exists yet.
    const initiated = await this.http.requestJson(
      { method: 'POST', path: '/uploads', query: { name: saveAs } },
      UploadSessionResponseSchema
    );

    const session: UploadSession = {
      uploadId: initiated.upload_id,
      name: initiated.name,
      partsUploaded: [],
      failures: [],
      uploadedBytes: 0,
    };
    logger.info('Upload session started', {
      name: saveAs,
      uploadId: session.uploadId,
      parts: chunks.length,
      size: bytes.length,
    });

    let nextIndex = 0;
    const worker = async (): Promise<void> => {
      while (nextIndex < chunks.length) {
        const index = nextIndex++;
        await this.uploadPart(session, saveAs, index + 1, chunks[index], bytes.length, options);
      }
    };
    await Promise.all(
      Array.from({ length: Math.min(concurrency, chunks.length) }, () => worker())
    );

    session.partsUploaded.sort((a, b) => a - b);
    session.failures.sort((a, b) => a.part - b.part);

    const sessionPath = `/uploads/${encodeURIComponent(session.uploadId)}`;

    if (session.failures.length === 0) {
      const info = await this.http.requestJson(
        { method: 'PATCH', path: sessionPath, query: { name: saveAs } },
        FileInfoSchema
      );
      metrics.increment(MetricNames.UPLOADS_COMPLETED);
      logger.info('Upload committed', { name: saveAs, uploadId: session.uploadId });
      return {
        status: 'completed',
        name: info.name,
        size: bytes.length,
        parts: chunks.length,
        uploadId: session.uploadId,
      };
    }

    await this.http.requestBytes({ method: 'DELETE', path: sessionPath, query: { name: saveAs } });
    metrics.increment(MetricNames.UPLOADS_ABORTED);
    logger.warn('Upload aborted', {
      name: saveAs,
      uploadId: session.uploadId,
      failedParts: session.failures.map((failure) => failure.part),
    });
    return {
      status: 'aborted',
      name: session.name,
      uploadId: session.uploadId,
      uploadedParts: session.partsUploaded,
      failedParts: session.failures.map((failure) => failure.part),
      errors: session.failures,
    };
  }

  /**
   * Uploads one part, recording the outcome on the session. Only the part
   * request decides success. Never throws.
   */
  private async uploadPart(
    session: UploadSession,
    saveAs: string,
    part: number,
    chunk: Uint8Array,
    total: number,
    options: UploadOptions
  ): Promise<void> {
    try {
      await this.http.requestBytes({
        method: 'POST',
        path: `/uploads/${encodeURIComponent(session.uploadId)}/parts`,
        query: { name: saveAs, part },
        bytes: chunk,
      });
    } catch (error) {
      this.observability.logger.warn('Upload part failed', {
        uploadId: session.uploadId,
        part,
        error: error instanceof Error ? error.message : String(error),
      });
      session.failures.push({
        part,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      return;
    }

    session.partsUploaded.push(part);
    session.uploadedBytes += chunk.length;
    this.observability.metrics.increment(MetricNames.UPLOAD_PARTS);
    this.observability.metrics.increment(MetricNames.UPLOAD_BYTES, chunk.length);
    this.reportProgress(options, session.uploadedBytes, total);
  }

  private reportProgress(options: UploadOptions, uploaded: number, total: number): void {
    try {
      options.onProgress?.(uploaded, total);
    } catch (error) {
      this.observability.logger.warn('Progress callback failed', {
        uploaded,
        total,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function validateUpload(saveAs: string, chunkSize: number, concurrency: number): void {
  if (saveAs.length === 0) {
    throw new PayloadError('file name must be a non-empty string');
  }
  if (!Number.isInteger(chunkSize) || chunkSize < 1 || chunkSize > MAX_CHUNK_SIZE) {
    throw new PayloadError(`chunkSize must be an integer between 1 and ${MAX_CHUNK_SIZE}`, {
      chunkSize,
    });
  }
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new PayloadError('concurrency must be a positive integer', { concurrency });
  }
}
