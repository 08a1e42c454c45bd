/**
 * Query builder and pagination walker.
 *
 * A query is an OR of groups, each group an AND of filters. Filters are
 * added to the current group; {@link Query.union} folds other queries in
 * as further OR branches. On the wire the current group always comes last,
 * even when it is empty.
 */

import { PayloadError } from '../errors/index.js';
import type { Observability } from '../observability/index.js';
import { MetricNames, createNoopObservability } from '../observability/index.js';
import type { Item, JsonValue, QueryResponse } from '../types/index.js';
import { DEFAULT_PAGE_LIMIT } from '../types/index.js';
import type {
  QueryExecutor,
  QueryGroup,
  QueryPayload,
  WalkOptions,
  WalkResult,
} from './types.js';
import { Comparator, filterKey } from './types.js';

/**
 * Fluent query builder.
 *
 * Setters mutate the builder and return it. Requests are always issued on a
 * clone, so a builder can keep being modified while a walk is running.
 *
 * @example
 * ```typescript
 * const adults = base.query()
 *   .greaterThanOrEqual('age', 18)
 *   .prefix('name', 'J');
 *
 * const admins = base.query().equals('role', 'admin');
 *
 * const { items } = await adults.union(admins).walk();
 * ```
 */
export class Query {
  private groups: QueryGroup[] = [];
  private current: Map<string, JsonValue> = new Map();
  private pageLimit?: number;
  private cursor?: string;
  private descending = false;

  constructor(
    private readonly executor?: QueryExecutor,
    private readonly observability: Observability = createNoopObservability()
  ) {}

  // ==========================================================================
  // Filters
  // ==========================================================================

  /**
   * Sets a filter in the current group, replacing any earlier value for the
   * same field and comparator.
   */
  set(comparator: Comparator, field: string, value: JsonValue): this {
    this.current.set(filterKey(field, comparator), value);
    return this;
  }

  equals(field: string, value: JsonValue): this {
    return this.set(Comparator.EQUALS, field, value);
  }

  notEquals(field: string, value: JsonValue): this {
    return this.set(Comparator.NOT_EQUALS, field, value);
  }

  greaterThan(field: string, value: JsonValue): this {
    return this.set(Comparator.GREATER_THAN, field, value);
  }

  greaterThanOrEqual(field: string, value: JsonValue): this {
    return this.set(Comparator.GREATER_THAN_OR_EQUAL, field, value);
  }

  lessThan(field: string, value: JsonValue): this {
    return this.set(Comparator.LESS_THAN, field, value);
  }

  lessThanOrEqual(field: string, value: JsonValue): this {
    return this.set(Comparator.LESS_THAN_OR_EQUAL, field, value);
  }

  /**
   * Inclusive range.
   */
  range(field: string, start: JsonValue, end: JsonValue): this {
    return this.set(Comparator.RANGE, field, [start, end]);
  }

  contains(field: string, value: JsonValue): this {
    return this.set(Comparator.CONTAINS, field, value);
  }

  notContains(field: string, value: JsonValue): this {
    return this.set(Comparator.NOT_CONTAINS, field, value);
  }

  prefix(field: string, value: string): this {
    return this.set(Comparator.PREFIX, field, value);
  }

  // ==========================================================================
  // Groups
  // ==========================================================================

  /**
   * Adds the other query's unioned groups, then its current group, as OR
   * branches. This query's current group is left as it is.
   */
  union(other: Query): this {
    for (const group of other.serializeGroups()) {
      this.groups.push(group);
    }
    return this;
  }

  /**
   * Adds a hand-built group as an OR branch.
   */
  append(group: QueryGroup): this {
    this.groups.push(structuredClone(group));
    return this;
  }

  // ==========================================================================
  // Paging
  // ==========================================================================

  /**
   * Page size. Leave unset to walk every page with {@link walk}.
   */
  limit(limit: number): this {
    this.pageLimit = limit;
    return this;
  }

  /**
   * Cursor to start from.
   */
  last(cursor: string): this {
    this.cursor = cursor;
    return this;
  }

  /**
   * Sorts descending when `true`.
   */
  sort(descending: boolean): this {
    this.descending = descending;
    return this;
  }

  clone(): Query {
    const copy = new Query(this.executor, this.observability);
    copy.groups = this.groups.map((group) => structuredClone(group));
    copy.current = new Map(
      Array.from(this.current, ([key, value]) => [key, structuredClone(value)])
    );
    copy.pageLimit = this.pageLimit;
    copy.cursor = this.cursor;
    copy.descending = this.descending;
    return copy;
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  serialize(): QueryPayload {
    const payload: QueryPayload = {
      limit: this.pageLimit ?? DEFAULT_PAGE_LIMIT,
      query: this.serializeGroups(),
    };
    if (this.cursor !== undefined) {
      payload.last = this.cursor;
    }
    if (this.descending) {
      payload.sort = 'desc';
    }
    return payload;
  }

  toJSON(): QueryPayload {
    return this.serialize();
  }

  private serializeGroups(): QueryGroup[] {
    const groups = this.groups.map((group) => structuredClone(group));
    const current: QueryGroup = {};
    for (const [key, value] of this.current) {
      current[key] = structuredClone(value);
    }
    groups.push(current);
    return groups;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Fetches one page.
   *
   * @throws {PayloadError} If the query was not created from a base
   * @throws {SerializationError} If the response is not a query page
   */
  async run(): Promise<QueryResponse> {
    if (!this.executor) {
      throw new PayloadError('query is not bound to a base; create it with base.query()');
    }
    return this.executor.executeQuery(this.serialize());
  }

  /**
   * Yields each page in turn, starting from this query's cursor and
   * following `paging.last` until it is empty. Stop iterating to stop
   * fetching.
   */
  async *pages(): AsyncGenerator<QueryResponse, void, undefined> {
    let page = this.clone();
    for (;;) {
      const response = await page.run();
      yield response;
      const next = response.paging.last;
      if (!next) return;
      page = page.clone().last(next);
    }
  }

  /**
   * Fetches every page and concatenates the items in order.
   *
   * An error on the first page always propagates. An error on a later page
   * propagates too, unless `onPageError` is `'partial'`.
   *
   * @throws {PayloadError} If a limit was set; checked before any request
   */
  async walk(options: WalkOptions = {}): Promise<WalkResult> {
    if (this.pageLimit !== undefined) {
      throw new PayloadError('limit must be unset for full-walk mode', {
        limit: this.pageLimit,
      });
    }

    const { logger, metrics } = this.observability;
    const onPageError = options.onPageError ?? 'throw';
    const items: Item[] = [];
    let pages = 0;
    let cursor = this.cursor;

    for (;;) {
      const page = this.clone();
      if (cursor !== undefined) {
        page.last(cursor);
      }

      let response: QueryResponse;
      try {
        response = await page.run();
      } catch (error) {
        if (pages === 0 || onPageError === 'throw') {
          throw error;
        }
        logger.warn('Query walk stopped early', {
          pages,
          items: items.length,
          last: cursor,
          error: error instanceof Error ? error.message : String(error),
        });
        return {
          items,
          paging: { size: items.length, last: cursor },
          pages,
          complete: false,
          error: error instanceof Error ? error : new Error(String(error)),
        };
      }

      pages++;
      metrics.increment(MetricNames.QUERY_PAGES);
      logger.debug('Fetched query page', { page: pages, size: response.items.length });
      items.push(...response.items);

      const next = response.paging.last;
      if (!next) {
        return { items, paging: { size: items.length }, pages, complete: true };
      }
      cursor = next;
    }
  }
}
