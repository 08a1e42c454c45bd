/**
 * Drive service: the blob store.
 */

import { PayloadError } from '../errors/index.js';
import type { DetaHttpClient } from '../http/index.js';
import type { Observability } from '../observability/index.js';
import type { DeleteFilesResponse, ListFilesResponse } from '../types/index.js';
import {
  DEFAULT_PAGE_LIMIT,
  DeleteFilesResponseSchema,
  ListFilesResponseSchema,
} from '../types/index.js';
import type { UploadOptions, UploadResult } from './uploader.js';
import { ChunkUploader } from './uploader.js';

/**
 * Options for {@link Drive.list}.
 */
export interface ListOptions {
  /** Only names starting with this prefix */
  prefix?: string;
  /** Page size. Default: 1000 */
  limit?: number;
  /** Cursor returned by the previous page */
  last?: string;
}

/**
 * Client for one drive.
 *
 * @example
 * ```typescript
 * const photos = deta.drive('photos');
 * await photos.put('2024/beach.jpg', bytes);
 * const { names } = await photos.list({ prefix: '2024/' });
 * ```
 */
export class Drive {
  private readonly uploader: ChunkUploader;

  constructor(
    readonly name: string,
    private readonly http: DetaHttpClient,
    observability: Observability
  ) {
    this.uploader = new ChunkUploader(http, observability);
  }

  /**
   * Lists one page of file names.
   */
  async list(options: ListOptions = {}): Promise<ListFilesResponse> {
    return this.http.requestJson(
      {
        method: 'GET',
        path: '/files',
        query: {
          limit: options.limit ?? DEFAULT_PAGE_LIMIT,
          prefix: options.prefix,
          last: options.last,
        },
      },
      ListFilesResponseSchema
    );
  }

  /**
   * Lists every file name, following the cursor across pages.
   */
  async listAll(options: Pick<ListOptions, 'prefix'> = {}): Promise<string[]> {
    const names: string[] = [];
    let last: string | undefined;
    do {
      const page = await this.list({ prefix: options.prefix, last });
      names.push(...page.names);
      last = page.paging?.last || undefined;
    } while (last !== undefined);
    return names;
  }

  /**
   * Downloads a file.
   *
   * @throws {NotFoundError} If the file does not exist
   */
  async get(name: string): Promise<Uint8Array> {
    validateName(name);
    return this.http.requestBytes({
      method: 'GET',
      path: '/files/download',
      query: { name },
    });
  }

  /**
   * Uploads a file, in chunks when it is larger than the chunk size.
   */
  async put(
    saveAs: string,
    content: Uint8Array | string,
    options?: UploadOptions
  ): Promise<UploadResult> {
    return this.uploader.upload(saveAs, content, options);
  }

  /**
   * Deletes files by name.
   *
   * @throws {PayloadError} If no names are given
   */
  async delete(names: string[]): Promise<DeleteFilesResponse> {
    if (names.length === 0) {
      throw new PayloadError('delete requires at least one file name');
    }
    names.forEach(validateName);
    return this.http.requestJson(
      { method: 'DELETE', path: '/files', json: { names } },
      DeleteFilesResponseSchema
    );
  }
}

function validateName(name: string): void {
  if (name.length === 0) {
    throw new PayloadError('file name must be a non-empty string');
  }
}
