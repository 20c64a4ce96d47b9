/**
 * Error taxonomy shared by server and client.
 *
 * Application errors (`BookStoreError` subclasses) are raised by the catalog and
 * travel over the wire as a tagged `WireError`. The client re-raises them as the
 * same class with `remote` set. Transport errors (`NetworkError`,
 * `ProtocolError`) never reach the server's catalog and never extend
 * `BookStoreError`, so callers can tell "rejected" from "never answered".
 */

export enum ErrorKind {
  InvalidISBN = 'InvalidISBN',
  DuplicateISBN = 'DuplicateISBN',
  InvalidRating = 'InvalidRating',
  InvalidQuantity = 'InvalidQuantity',
  InsufficientStock = 'InsufficientStock',
  NullOrEmptyInput = 'NullOrEmptyInput',
  InvalidBookField = 'InvalidBookField',
}

const ERROR_KINDS: ReadonlySet<string> = new Set<string>(Object.values(ErrorKind));

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.has(value);
}

export interface BookStoreErrorOptions {
  remote?: boolean;
  cause?: unknown;
}

export abstract class BookStoreError extends Error {
  abstract readonly kind: ErrorKind;
  /** True when the error was raised by the server and decoded by the client */
  readonly remote: boolean;

  constructor(message: string, options: BookStoreErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.remote = options.remote ?? false;
  }
}

export class InvalidIsbnError extends BookStoreError {
  readonly kind = ErrorKind.InvalidISBN;
}

export class DuplicateIsbnError extends BookStoreError {
  readonly kind = ErrorKind.DuplicateISBN;
}

export class InvalidRatingError extends BookStoreError {
  readonly kind = ErrorKind.InvalidRating;
}

export class InvalidQuantityError extends BookStoreError {
  readonly kind = ErrorKind.InvalidQuantity;
}

export class InsufficientStockError extends BookStoreError {
  readonly kind = ErrorKind.InsufficientStock;
}

export class NullOrEmptyInputError extends BookStoreError {
  readonly kind = ErrorKind.NullOrEmptyInput;
}

export class InvalidBookFieldError extends BookStoreError {
  readonly kind = ErrorKind.InvalidBookField;
}

type BookStoreErrorClass = new (message: string, options?: BookStoreErrorOptions) => BookStoreError;

const ERROR_CLASSES: Record<ErrorKind, BookStoreErrorClass> = {
  [ErrorKind.InvalidISBN]: InvalidIsbnError,
  [ErrorKind.DuplicateISBN]: DuplicateIsbnError,
  [ErrorKind.InvalidRating]: InvalidRatingError,
  [ErrorKind.InvalidQuantity]: InvalidQuantityError,
  [ErrorKind.InsufficientStock]: InsufficientStockError,
  [ErrorKind.NullOrEmptyInput]: NullOrEmptyInputError,
  [ErrorKind.InvalidBookField]: InvalidBookFieldError,
};

/** A server-side application error decoded on the client */
export function isRemoteApplicationError(error: unknown): error is BookStoreError {
  return error instanceof BookStoreError && error.remote;
}

// ==================== Transport ====================

/** Per-call lifecycle of an RPC exchange */
export type CallPhase = 'Idle' | 'Encoding' | 'InFlight' | 'Decoding' | 'Done';

export interface TransportErrorOptions {
  phase: CallPhase;
  cause?: unknown;
}

export abstract class TransportError extends Error {
  readonly phase: CallPhase;

  constructor(message: string, options: TransportErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.phase = options.phase;
  }
}

export type NetworkFailureReason = 'interrupted' | 'timeout' | 'exchange';

export class NetworkError extends TransportError {
  readonly reason: NetworkFailureReason;

  constructor(message: string, reason: NetworkFailureReason, options: TransportErrorOptions) {
    super(message, options);
    this.reason = reason;
  }
}

export interface ProtocolErrorOptions extends TransportErrorOptions {
  status?: number;
  bodyExcerpt?: string;
}

export class ProtocolError extends TransportError {
  /** HTTP status of the offending response, or the status the server answers with */
  readonly status?: number;
  readonly bodyExcerpt?: string;

  constructor(message: string, options: ProtocolErrorOptions) {
    super(message, options);
    this.status = options.status;
    this.bodyExcerpt = options.bodyExcerpt;
  }
}

// ==================== Wire mapping ====================

export interface WireError {
  kind: string;
  message: string;
  cause?: WireError | null;
}

/** Kind recorded for a cause that is not an application error */
const GENERIC_CAUSE_KIND = 'Error';

export function toWireError(error: BookStoreError): WireError {
  return {
    kind: error.kind,
    message: error.message,
    cause: causeToWire(error.cause),
  };
}

function causeToWire(cause: unknown): WireError | undefined {
  if (cause instanceof BookStoreError) {
    return toWireError(cause);
  }
  if (cause instanceof Error) {
    return { kind: GENERIC_CAUSE_KIND, message: cause.message, cause: causeToWire(cause.cause) };
  }
  return undefined;
}

/**
 * Rebuild the application error the server embedded in a response.
 * An unknown top-level kind means the two ends disagree on the contract.
 */
export function errorFromWire(wire: WireError): BookStoreError {
  if (!isErrorKind(wire.kind)) {
    throw new ProtocolError(`Server returned an error of unknown kind "${wire.kind}": ${wire.message}`, {
      phase: 'Decoding',
    });
  }
  const ErrorClass = ERROR_CLASSES[wire.kind];
  return new ErrorClass(wire.message, { remote: true, cause: causeFromWire(wire.cause) });
}

function causeFromWire(wire: WireError | null | undefined): Error | undefined {
  if (!wire) {
    return undefined;
  }
  if (isErrorKind(wire.kind)) {
    return errorFromWire(wire);
  }
  const cause = new Error(wire.message, wire.cause ? { cause: causeFromWire(wire.cause) } : undefined);
  cause.name = wire.kind;
  return cause;
}
