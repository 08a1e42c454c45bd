/**
 * Base service: the document store.
 */

import { PayloadError } from '../errors/index.js';
import type { DetaHttpClient } from '../http/index.js';
import type { Observability } from '../observability/index.js';
import { MetricNames } from '../observability/index.js';
import { Query } from '../query/index.js';
import type { QueryExecutor, QueryPayload } from '../query/index.js';
import type {
  DeleteItemResponse,
  Item,
  PutResponse,
  QueryResponse,
  UpdateResponse,
} from '../types/index.js';
import {
  DeleteItemResponseSchema,
  ItemSchema,
  MAX_PUT_RECORDS,
  PutResponseSchema,
  QueryResponseSchema,
  UpdateResponseSchema,
} from '../types/index.js';
import type { BaseRecord } from './record.js';
import { serializeRecord, validateKey } from './record.js';
import type { UpdateExecutor } from './updater.js';
import { Updater } from './updater.js';

/**
 * Client for one base.
 *
 * @example
 * ```typescript
 * const users = deta.base('users');
 * await users.put([{ key: 'user-1', value: { name: 'Jane', age: 31 } }]);
 * const user = await users.get('user-1');
 * ```
 */
export class Base implements QueryExecutor, UpdateExecutor {
  constructor(
    readonly name: string,
    private readonly http: DetaHttpClient,
    private readonly observability: Observability,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Fetches one item.
   *
   * @throws {NotFoundError} If no item has the key
   */
  async get(key: string): Promise<Item> {
    validateKey(key);
    return this.http.requestJson({ method: 'GET', path: itemPath(key) }, ItemSchema);
  }

  /**
   * Stores up to 25 records, overwriting existing keys.
   *
   * @throws {PayloadError} If the list is empty or longer than 25; checked before sending
   */
  async put(records: BaseRecord[]): Promise<PutResponse> {
    if (records.length === 0) {
      throw new PayloadError('put requires at least one record');
    }
    if (records.length > MAX_PUT_RECORDS) {
      throw new PayloadError(
        `put accepts at most ${MAX_PUT_RECORDS} records, got ${records.length}`,
        { count: records.length, max: MAX_PUT_RECORDS }
      );
    }

    const now = this.clock();
    const items = records.map((record) => serializeRecord(record, now));

    const response = await this.http.requestJson(
      { method: 'PUT', path: '/items', json: { items } },
      PutResponseSchema
    );

    const result: PutResponse = {
      processed: { items: response.processed?.items ?? [] },
      failed: { items: response.failed?.items ?? [] },
    };

    this.observability.metrics.increment(
      MetricNames.RECORDS_WRITTEN,
      result.processed.items.length,
      { base: this.name }
    );
    if (result.failed.items.length > 0) {
      this.observability.logger.warn('Some records were not stored', {
        base: this.name,
        failed: result.failed.items.length,
      });
    }

    return result;
  }

  /**
   * Stores any number of records, 25 per request, one request at a time.
   */
  async putMany(records: BaseRecord[]): Promise<PutResponse> {
    if (records.length === 0) {
      throw new PayloadError('putMany requires at least one record');
    }

    const result: PutResponse = { processed: { items: [] }, failed: { items: [] } };
    for (let offset = 0; offset < records.length; offset += MAX_PUT_RECORDS) {
      const batch = await this.put(records.slice(offset, offset + MAX_PUT_RECORDS));
      result.processed.items.push(...batch.processed.items);
      result.failed.items.push(...batch.failed.items);
    }
    return result;
  }

  /**
   * Stores a record only if its key is not taken.
   *
   * @throws {ConflictError} If an item with the key exists
   */
  async insert(record: BaseRecord): Promise<Item> {
    const item = serializeRecord(record, this.clock());
    const created = await this.http.requestJson(
      { method: 'POST', path: '/items', json: { item } },
      ItemSchema
    );
    this.observability.metrics.increment(MetricNames.RECORDS_WRITTEN, 1, { base: this.name });
    return created;
  }

  /**
   * Deletes one item. Deleting a missing key succeeds.
   */
  async delete(key: string): Promise<DeleteItemResponse> {
    validateKey(key);
    return this.http.requestJson(
      { method: 'DELETE', path: itemPath(key) },
      DeleteItemResponseSchema
    );
  }

  /**
   * Applies the updater's operations to the item with the given key.
   *
   * @throws {PayloadError} If the updater has no operations
   * @throws {NotFoundError} If no item has the key
   */
  async update(key: string, updater: Updater): Promise<UpdateResponse> {
    validateKey(key);
    if (updater.isEmpty()) {
      throw new PayloadError('update requires at least one operation');
    }
    return this.http.requestJson(
      { method: 'PATCH', path: itemPath(key), json: updater.toJSON() },
      UpdateResponseSchema
    );
  }

  /**
   * Creates an updater whose commit() updates the item with the given key.
   */
  updater(key: string): Updater {
    validateKey(key);
    return new Updater({ key, executor: this });
  }

  /**
   * Creates a query bound to this base.
   */
  query(): Query {
    return new Query(this, this.observability);
  }

  async executeQuery(payload: QueryPayload): Promise<QueryResponse> {
    return this.http.requestJson(
      { method: 'POST', path: '/query', json: payload },
      QueryResponseSchema
    );
  }
}

function itemPath(key: string): string {
  return `/items/${encodeURIComponent(key)}`;
}
