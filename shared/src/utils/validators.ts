/**
 * Shared validation predicates for catalog input
 */

import { MAX_RATING, MIN_RATING } from '../types/catalog';

export function isInvalidIsbn(isbn: number): boolean {
  return !Number.isSafeInteger(isbn) || isbn < 1;
}

export function isInvalidRating(rating: number): boolean {
  return !Number.isInteger(rating) || rating < MIN_RATING || rating > MAX_RATING;
}

/**
 * Copy counts (initial stock, purchases, restocks) must be whole and positive
 */
export function isInvalidCopies(copies: number): boolean {
  return !Number.isSafeInteger(copies) || copies < 1;
}

export function isInvalidPrice(price: number): boolean {
  return !Number.isFinite(price) || price <= 0;
}

/**
 * Result-size arguments (top-k, editor picks) may be zero
 */
export function isInvalidCount(count: number): boolean {
  return !Number.isInteger(count) || count < 0;
}

export function isEmpty(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0;
}
