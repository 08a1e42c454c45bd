/**
 * Base (document store)
 */

export { Base } from './service.js';
export { EXPIRES_FIELD, serializeRecord, validateKey } from './record.js';
export type { BaseRecord } from './record.js';
export { Updater } from './updater.js';
export type { UpdateExecutor, UpdatePayload } from './updater.js';
