/**
 * Drive (blob store)
 */

export { Drive } from './service.js';
export type { ListOptions } from './service.js';
export { ChunkUploader, splitIntoChunks } from './uploader.js';
export type {
  PartFailure,
  UploadAborted,
  UploadCompleted,
  UploadOptions,
  UploadResult,
} from './uploader.js';
