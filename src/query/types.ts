/**
 * Query wire types.
 */

import type { Item, JsonValue, Paging, QueryResponse } from '../types/index.js';

/**
 * Filter comparators.
 */
export enum Comparator {
  EQUALS = 'equals',
  NOT_EQUALS = 'not_equals',
  GREATER_THAN = 'greater_than',
  GREATER_THAN_OR_EQUAL = 'greater_than_or_equal',
  LESS_THAN = 'less_than',
  LESS_THAN_OR_EQUAL = 'less_than_or_equal',
  RANGE = 'range',
  CONTAINS = 'contains',
  NOT_CONTAINS = 'not_contains',
  PREFIX = 'prefix',
}

/**
 * Operator suffix appended to the field name on the wire. Equality has none.
 */
export const COMPARATOR_OPERATORS: Readonly<Record<Comparator, string>> = {
  [Comparator.EQUALS]: '',
  [Comparator.NOT_EQUALS]: 'ne',
  [Comparator.GREATER_THAN]: 'gt',
  [Comparator.GREATER_THAN_OR_EQUAL]: 'gte',
  [Comparator.LESS_THAN]: 'lt',
  [Comparator.LESS_THAN_OR_EQUAL]: 'lte',
  [Comparator.RANGE]: 'range',
  [Comparator.CONTAINS]: 'contains',
  [Comparator.NOT_CONTAINS]: 'not_contains',
  [Comparator.PREFIX]: 'pfx',
};

/**
 * Wire key of a filter: the bare field for equality, `field?op` otherwise.
 */
export function filterKey(field: string, comparator: Comparator): string {
  const operator = COMPARATOR_OPERATORS[comparator];
  return operator === '' ? field : `${field}?${operator}`;
}

/**
 * One AND-conjunction of filters, keyed by {@link filterKey}.
 */
export type QueryGroup = Record<string, JsonValue>;

/**
 * Body of a POST /query request.
 */
export interface QueryPayload {
  limit: number;
  last?: string;
  sort?: 'desc';
  query: QueryGroup[];
}

/**
 * Runs a serialized query against a base.
 */
export interface QueryExecutor {
  executeQuery(payload: QueryPayload): Promise<QueryResponse>;
}

/**
 * What {@link Query.walk} does when a page after the first fails.
 *
 * - `throw`: the error propagates and the aggregated items are discarded
 * - `partial`: the walk stops and returns what it has, flagged incomplete
 */
export type PageErrorPolicy = 'throw' | 'partial';

export interface WalkOptions {
  /** Default: 'throw' */
  onPageError?: PageErrorPolicy;
}

/**
 * Aggregated result of a full walk.
 */
export interface WalkResult {
  items: Item[];
  /**
   * `size` is the number of aggregated items. `last` is unset when the walk
   * completed; after a partial walk it holds the cursor of the failed page.
   */
  paging: Paging;
  /** Number of pages fetched successfully */
  pages: number;
  complete: boolean;
  /** The error that ended a partial walk */
  error?: Error;
}
