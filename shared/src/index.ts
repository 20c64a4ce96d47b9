/**
 * Shared bookstore exports
 *
 * Central export point for the catalog model, error taxonomy, wire protocol
 * and utilities used by both the store server and its clients
 */

// Catalog model
export * from './types/catalog';

// Errors
export * from './errors';

// Wire protocol
export * from './protocol/messages';
export { BookStoreCodec, getCodec, DEFAULT_PROTO_PATH } from './protocol/codec';
export type { CodecOptions } from './protocol/codec';

// Utilities
export { createLogger } from './utils/logger';
export type { Logger } from './utils/logger';
export {
  isInvalidIsbn,
  isInvalidRating,
  isInvalidCopies,
  isInvalidPrice,
  isInvalidCount,
  isEmpty,
} from './utils/validators';
