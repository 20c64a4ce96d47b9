import type { Book, BookSpec, EditorPickUpdate, StockBook } from '../types/catalog';
import type { WireError } from '../errors';

/** Revision of the wire contract; also the version segment of the proto package */
export const PROTOCOL_VERSION = 1;

export const PROTOBUF_CONTENT_TYPE = 'application/x-protobuf';
export const PROTOCOL_VERSION_HEADER = 'x-bookstore-protocol';

export enum MessageTag {
  ADDBOOKS = 'ADDBOOKS',
  ADDCOPIES = 'ADDCOPIES',
  LISTBOOKS = 'LISTBOOKS',
  UPDATEEDITORPICKS = 'UPDATEEDITORPICKS',
  BUYBOOKS = 'BUYBOOKS',
  EDITORPICKS = 'EDITORPICKS',
  GETBOOKS = 'GETBOOKS',
  GETSTOCKBOOKSBYISBN = 'GETSTOCKBOOKSBYISBN',
  REMOVEBOOKS = 'REMOVEBOOKS',
  REMOVEALLBOOKS = 'REMOVEALLBOOKS',
  RATEBOOKS = 'RATEBOOKS',
  TOPRATEDBOOKS = 'TOPRATEDBOOKS',
  GETBOOKSINDEMAND = 'GETBOOKSINDEMAND',
}

// ==================== Payloads ====================

export type RequestPayload =
  | { type: 'bookSpecs'; books: BookSpec[] }
  | { type: 'bookCopies'; copies: Map<number, number> }
  | { type: 'bookRatings'; ratings: Map<number, number> }
  | { type: 'isbns'; isbns: number[] }
  | { type: 'editorPicks'; picks: EditorPickUpdate[] }
  | { type: 'count'; value: number };

export type RequestPayloadType = RequestPayload['type'];

export type ResponsePayload =
  | { type: 'empty' }
  | { type: 'books'; books: Book[] }
  | { type: 'stockBooks'; books: StockBook[] }
  | { type: 'error'; error: WireError };

export type SuccessPayload = Exclude<ResponsePayload, { type: 'error' }>;
export type SuccessPayloadType = SuccessPayload['type'];

export function isRequestOf<K extends RequestPayloadType>(
  payload: RequestPayload,
  type: K
): payload is Extract<RequestPayload, { type: K }> {
  return payload.type === type;
}

// ==================== Wire type registry ====================

export interface WireMember {
  /** oneof member name as protobufjs exposes it */
  member: string;
  /** message type carried by the member */
  type: string;
}

/**
 * Every type a request may carry, in field-number order. Both ends must ship
 * the same list; the codec refuses to start if the schema disagrees.
 */
export const REQUEST_WIRE_TYPES: readonly WireMember[] = [
  { member: 'bookSpecs', type: 'BookSpecList' },
  { member: 'bookCopies', type: 'BookCopyMap' },
  { member: 'bookRatings', type: 'BookRatingMap' },
  { member: 'isbns', type: 'IsbnList' },
  { member: 'editorPicks', type: 'EditorPickList' },
  { member: 'count', type: 'Count' },
];

export const RESPONSE_WIRE_TYPES: readonly WireMember[] = [
  { member: 'empty', type: 'Empty' },
  { member: 'books', type: 'BookList' },
  { member: 'stockBooks', type: 'StockBookList' },
  { member: 'error', type: 'WireError' },
];

// ==================== Tag contracts ====================

export type HttpMethod = 'GET' | 'POST';

export interface TagContract {
  /** GET is reserved for argument-free queries, which carry no body */
  method: HttpMethod;
  /** Payload the request carries when not null; null for bodyless or empty requests */
  request: RequestPayloadType | null;
  response: SuccessPayloadType;
}

export const MESSAGE_CONTRACTS: Readonly<Record<MessageTag, TagContract>> = {
  [MessageTag.ADDBOOKS]: { method: 'POST', request: 'bookSpecs', response: 'empty' },
  [MessageTag.ADDCOPIES]: { method: 'POST', request: 'bookCopies', response: 'empty' },
  [MessageTag.LISTBOOKS]: { method: 'GET', request: null, response: 'stockBooks' },
  [MessageTag.UPDATEEDITORPICKS]: { method: 'POST', request: 'editorPicks', response: 'empty' },
  [MessageTag.BUYBOOKS]: { method: 'POST', request: 'bookCopies', response: 'empty' },
  [MessageTag.EDITORPICKS]: { method: 'POST', request: 'count', response: 'books' },
  [MessageTag.GETBOOKS]: { method: 'POST', request: 'isbns', response: 'books' },
  [MessageTag.GETSTOCKBOOKSBYISBN]: { method: 'POST', request: 'isbns', response: 'stockBooks' },
  [MessageTag.REMOVEBOOKS]: { method: 'POST', request: 'isbns', response: 'empty' },
  [MessageTag.REMOVEALLBOOKS]: { method: 'POST', request: null, response: 'empty' },
  [MessageTag.RATEBOOKS]: { method: 'POST', request: 'bookRatings', response: 'empty' },
  [MessageTag.TOPRATEDBOOKS]: { method: 'POST', request: 'count', response: 'books' },
  [MessageTag.GETBOOKSINDEMAND]: { method: 'GET', request: null, response: 'stockBooks' },
};

const TAGS_BY_SEGMENT: ReadonlyMap<string, MessageTag> = new Map(
  Object.values(MessageTag).map((tag): [string, MessageTag] => [tag.toLowerCase(), tag])
);

export function pathForTag(tag: MessageTag): string {
  return `/${tag.toLowerCase()}`;
}

/**
 * Resolve a route segment ("addbooks", "ADDBOOKS") to its tag, or null when
 * the segment names no operation.
 */
export function tagFromSegment(segment: string): MessageTag | null {
  return TAGS_BY_SEGMENT.get(segment.toLowerCase()) ?? null;
}
