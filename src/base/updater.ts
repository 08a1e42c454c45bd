/**
 * Partial updates of a stored item.
 */

import { PayloadError } from '../errors/index.js';
import type { JsonObject, JsonValue, UpdateResponse } from '../types/index.js';

/**
 * Body of a PATCH /items/{key} request. Empty operations are left out.
 */
export interface UpdatePayload {
  set?: JsonObject;
  increment?: Record<string, number>;
  append?: JsonObject;
  prepend?: JsonObject;
  delete?: string[];
}

/**
 * Applies an update to the item with the given key.
 */
export interface UpdateExecutor {
  update(key: string, updater: Updater): Promise<UpdateResponse>;
}

/**
 * Accumulates update operations for one item.
 *
 * Setting the same field twice within one operation keeps the last value.
 *
 * @example
 * ```typescript
 * await base.updater('user-1')
 *   .set('profile.name', 'Jane')
 *   .increment('visits', 1)
 *   .append('tags', ['admin'])
 *   .delete('legacyField')
 *   .commit();
 * ```
 */
export class Updater {
  private readonly sets = new Map<string, JsonValue>();
  private readonly increments = new Map<string, number>();
  private readonly appends = new Map<string, JsonValue>();
  private readonly prepends = new Map<string, JsonValue>();
  private readonly deletes = new Set<string>();

  constructor(private readonly binding?: { key: string; executor: UpdateExecutor }) {}

  set(field: string, value: JsonValue): this {
    this.sets.set(field, value);
    return this;
  }

  /**
   * Adds to a numeric field. Use a negative value to decrement.
   */
  increment(field: string, value: number): this {
    this.increments.set(field, value);
    return this;
  }

  append(field: string, value: JsonValue): this {
    this.appends.set(field, value);
    return this;
  }

  prepend(field: string, value: JsonValue): this {
    this.prepends.set(field, value);
    return this;
  }

  delete(field: string): this {
    this.deletes.add(field);
    return this;
  }

  /**
   * True when no operation has been added.
   */
  isEmpty(): boolean {
    return (
      this.sets.size === 0 &&
      this.increments.size === 0 &&
      this.appends.size === 0 &&
      this.prepends.size === 0 &&
      this.deletes.size === 0
    );
  }

  toJSON(): UpdatePayload {
    const payload: UpdatePayload = {};
    if (this.sets.size > 0) payload.set = Object.fromEntries(this.sets);
    if (this.increments.size > 0) payload.increment = Object.fromEntries(this.increments);
    if (this.appends.size > 0) payload.append = Object.fromEntries(this.appends);
    if (this.prepends.size > 0) payload.prepend = Object.fromEntries(this.prepends);
    if (this.deletes.size > 0) payload.delete = Array.from(this.deletes);
    return payload;
  }

  /**
   * Sends the update.
   *
   * @throws {PayloadError} If the updater was not created with base.updater(key)
   */
  async commit(): Promise<UpdateResponse> {
    if (!this.binding) {
      throw new PayloadError('updater is not bound to an item; create it with base.updater(key)');
    }
    return this.binding.executor.update(this.binding.key, this);
  }
}
