/**
 * Records written to a base.
 */

import { PayloadError } from '../errors/index.js';
import type { JsonObject } from '../types/index.js';

/**
 * Field holding the expiry time, in unix seconds.
 */
export const EXPIRES_FIELD = '__expires';

/**
 * A record to store. Without a key the server generates one.
 *
 * When both are given, `expiresIn` wins over `expiresAt`.
 */
export interface BaseRecord {
  key?: string;
  value: JsonObject;
  /** Seconds from now after which the record expires */
  expiresIn?: number;
  /** Point in time at which the record expires */
  expiresAt?: Date;
}

/**
 * @throws {PayloadError} If the key is not a non-empty string
 */
export function validateKey(key: string): void {
  if (typeof key !== 'string' || key.length === 0) {
    throw new PayloadError('key must be a non-empty string');
  }
}

/**
 * Flattens a record into the object stored by the server.
 *
 * @param now - Reference time for `expiresIn`
 */
export function serializeRecord(record: BaseRecord, now: Date = new Date()): JsonObject {
  const data: JsonObject = { ...record.value };

  if (record.key !== undefined) {
    validateKey(record.key);
    data.key = record.key;
  }

  if (record.expiresIn !== undefined) {
    data[EXPIRES_FIELD] = toUnixSeconds(now) + record.expiresIn;
  } else if (record.expiresAt !== undefined) {
    data[EXPIRES_FIELD] = toUnixSeconds(record.expiresAt);
  }

  return data;
}

function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
