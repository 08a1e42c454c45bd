/**
 * Wire types shared by the Base, Query and Drive services.
 *
 * Response shapes are zod schemas; the inferred types sit next to them.
 */

import { z } from 'zod';

// ============================================================================
// JSON
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Limits
// ============================================================================

/**
 * Maximum number of records accepted by a single bulk put.
 */
export const MAX_PUT_RECORDS = 25;

/**
 * Default and maximum page size of a query or file listing.
 */
export const DEFAULT_PAGE_LIMIT = 1000;

/**
 * Largest chunk sent in one request; anything bigger goes through a chunked upload.
 */
export const MAX_CHUNK_SIZE = 10 * 1024 * 1024;

// ============================================================================
// Base
// ============================================================================

/**
 * A stored item. Always carries its key.
 */
export interface Item extends JsonObject {
  key: string;
}

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const ItemSchema: z.ZodType<Item> = z.record(JsonValueSchema).and(
  z.object({ key: z.string() })
);

export const PagingSchema = z.object({
  size: z.number().int().nonnegative(),
  last: z.string().optional(),
});

/**
 * Paging block of a query or list response. An absent or empty `last` means
 * there are no more pages.
 */
export type Paging = z.infer<typeof PagingSchema>;

export const QueryResponseSchema = z.object({
  paging: PagingSchema,
  items: z.array(ItemSchema),
});

export type QueryResponse = z.infer<typeof QueryResponseSchema>;

export const PutResponseSchema = z.object({
  processed: z.object({ items: z.array(ItemSchema) }).optional(),
  failed: z.object({ items: z.array(ItemSchema) }).optional(),
});

/**
 * Result of a bulk put.
 */
export interface PutResponse {
  processed: { items: Item[] };
  failed: { items: Item[] };
}

export const DeleteItemResponseSchema = z.object({ key: z.string() });

export type DeleteItemResponse = z.infer<typeof DeleteItemResponseSchema>;

export const UpdateResponseSchema = z.object({
  key: z.string(),
  set: z.record(JsonValueSchema).optional(),
  delete: z.array(z.string()).optional(),
});

export type UpdateResponse = z.infer<typeof UpdateResponseSchema>;

// ============================================================================
// Drive
// ============================================================================

export const ListFilesResponseSchema = z.object({
  paging: PagingSchema.optional(),
  names: z.array(z.string()),
});

export type ListFilesResponse = z.infer<typeof ListFilesResponseSchema>;

export const DeleteFilesResponseSchema = z.object({
  deleted: z.array(z.string()).default([]),
  failed: z.record(z.string()).optional(),
});

export type DeleteFilesResponse = z.infer<typeof DeleteFilesResponseSchema>;

export const FileInfoSchema = z.object({
  name: z.string(),
  project_id: z.string().optional(),
  drive_name: z.string().optional(),
});

/**
 * Confirmation returned for a stored file.
 */
export type FileInfo = z.infer<typeof FileInfoSchema>;

export const UploadSessionResponseSchema = z.object({
  upload_id: z.string().min(1),
  name: z.string(),
  project_id: z.string().optional(),
  drive_name: z.string().optional(),
});

export type UploadSessionResponse = z.infer<typeof UploadSessionResponseSchema>;
