/**
 * Query building and pagination
 */

export { Query } from './builder.js';
export { Comparator, COMPARATOR_OPERATORS, filterKey } from './types.js';
export type {
  QueryExecutor,
  QueryGroup,
  QueryPayload,
  PageErrorPolicy,
  WalkOptions,
  WalkResult,
} from './types.js';
