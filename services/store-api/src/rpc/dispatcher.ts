import {
  BookStoreError,
  MESSAGE_CONTRACTS,
  MessageTag,
  NullOrEmptyInputError,
  ProtocolError,
  getCodec,
  isRequestOf,
  toWireError,
  type BookStoreCodec,
  type RequestPayload,
  type RequestPayloadType,
  type SuccessPayload,
} from '@bookstore/shared';
import type { CatalogStore } from '../catalog/CatalogStore';

type PayloadOf<K extends RequestPayloadType> = Extract<RequestPayload, { type: K }>;

const EMPTY: SuccessPayload = { type: 'empty' };

/**
 * Routes a decoded request to the catalog by tag and encodes the outcome.
 *
 * Application errors become an embedded error payload. Anything else
 * (including a protocol violation by the caller) is thrown to the HTTP layer.
 */
export class RpcDispatcher {
  constructor(
    private readonly store: CatalogStore,
    private readonly codec: BookStoreCodec = getCodec()
  ) {}

  dispatch(tag: MessageTag, body: Uint8Array | null): Uint8Array {
    const request = body === null ? null : this.decode(tag, body);

    const expected = MESSAGE_CONTRACTS[tag].request;
    if (request !== null && request.type !== expected) {
      throw new ProtocolError(`${tag} does not take a ${request.type} payload`, { phase: 'Decoding', status: 400 });
    }

    try {
      return this.codec.encodeResponse(this.handle(tag, request));
    } catch (error) {
      if (error instanceof BookStoreError) {
        return this.codec.encodeResponse({ type: 'error', error: toWireError(error) });
      }
      throw error;
    }
  }

  private decode(tag: MessageTag, body: Uint8Array): RequestPayload | null {
    try {
      return this.codec.decodeRequest(body);
    } catch (error) {
      if (error instanceof ProtocolError) {
        throw new ProtocolError(`Malformed ${tag} request: ${error.message}`, {
          phase: 'Decoding',
          status: 400,
          cause: error,
        });
      }
      throw error;
    }
  }

  private handle(tag: MessageTag, request: RequestPayload | null): SuccessPayload {
    switch (tag) {
      case MessageTag.ADDBOOKS:
        this.store.addBooks(argument(request, 'bookSpecs')?.books ?? null);
        return EMPTY;
      case MessageTag.ADDCOPIES:
        this.store.addCopies(argument(request, 'bookCopies')?.copies ?? null);
        return EMPTY;
      case MessageTag.LISTBOOKS:
        return { type: 'stockBooks', books: this.store.listBooks() };
      case MessageTag.UPDATEEDITORPICKS:
        this.store.updateEditorPicks(argument(request, 'editorPicks')?.picks ?? null);
        return EMPTY;
      case MessageTag.BUYBOOKS:
        this.store.buyBooks(argument(request, 'bookCopies')?.copies ?? null);
        return EMPTY;
      case MessageTag.EDITORPICKS:
        return { type: 'books', books: this.store.getEditorPicks(requireCount(tag, request)) };
      case MessageTag.GETBOOKS:
        return { type: 'books', books: this.store.getBooks(argument(request, 'isbns')?.isbns ?? null) };
      case MessageTag.GETSTOCKBOOKSBYISBN:
        return { type: 'stockBooks', books: this.store.getBooksByIsbn(argument(request, 'isbns')?.isbns ?? null) };
      case MessageTag.REMOVEBOOKS:
        this.store.removeBooks(argument(request, 'isbns')?.isbns ?? null);
        return EMPTY;
      case MessageTag.REMOVEALLBOOKS:
        this.store.removeAllBooks();
        return EMPTY;
      case MessageTag.RATEBOOKS:
        this.store.rateBooks(argument(request, 'bookRatings')?.ratings ?? null);
        return EMPTY;
      case MessageTag.TOPRATEDBOOKS:
        return { type: 'books', books: this.store.getTopRatedBooks(requireCount(tag, request)) };
      case MessageTag.GETBOOKSINDEMAND:
        return { type: 'stockBooks', books: this.store.getBooksInDemand() };
    }
  }
}

function argument<K extends RequestPayloadType>(request: RequestPayload | null, type: K): PayloadOf<K> | null {
  if (request === null) {
    return null;
  }
  const actual = request.type;
  if (!isRequestOf(request, type)) {
    throw new ProtocolError(`Expected a ${type} payload, got ${actual}`, { phase: 'Decoding', status: 400 });
  }
  return request;
}

function requireCount(tag: MessageTag, request: RequestPayload | null): number {
  const count = argument(request, 'count');
  if (count === null) {
    throw new NullOrEmptyInputError(`${tag} requires a count`);
  }
  return count.value;
}
