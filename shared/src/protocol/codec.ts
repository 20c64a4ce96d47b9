import path from 'path';
import * as protobuf from 'protobufjs';
import { ProtocolError } from '../errors';
import { toBook, toStockBook } from '../types/catalog';
import {
  PROTOCOL_VERSION,
  REQUEST_WIRE_TYPES,
  RESPONSE_WIRE_TYPES,
  type RequestPayload,
  type ResponsePayload,
  type WireMember,
} from './messages';
import { requestObjectSchema, responseObjectSchema, type RequestObject, type ResponseObject } from './schemas';

export const DEFAULT_PROTO_PATH = path.resolve(__dirname, '../../proto/bookstore.proto');

const CONVERSION: protobuf.IConversionOptions = {
  longs: Number,
  enums: String,
  defaults: true,
  arrays: true,
  objects: true,
  oneofs: true,
};

export interface CodecOptions {
  protoPath?: string;
  version?: number;
  requestWireTypes?: readonly WireMember[];
  responseWireTypes?: readonly WireMember[];
}

/**
 * Binary codec for request and response envelopes.
 *
 * Client and server each build one from the same schema file. Construction
 * checks the schema's envelope members against the wire type registry, so a
 * contract mismatch fails at startup instead of on the first decode.
 */
export class BookStoreCodec {
  readonly version: number;
  private readonly requestType: protobuf.Type;
  private readonly responseType: protobuf.Type;

  constructor(options: CodecOptions = {}) {
    this.version = options.version ?? PROTOCOL_VERSION;

    const root = protobuf.loadSync(options.protoPath ?? DEFAULT_PROTO_PATH);
    root.resolveAll();

    const namespace = `bookstore.v${this.version}`;
    this.requestType = lookupEnvelope(root, `${namespace}.Request`);
    this.responseType = lookupEnvelope(root, `${namespace}.Response`);

    assertWireTypes(this.requestType, options.requestWireTypes ?? REQUEST_WIRE_TYPES);
    assertWireTypes(this.responseType, options.responseWireTypes ?? RESPONSE_WIRE_TYPES);
  }

  /**
   * A null payload is encoded as an envelope with nothing set.
   */
  encodeRequest(payload: RequestPayload | null): Uint8Array {
    return encode(this.requestType, payload === null ? {} : requestToObject(payload));
  }

  decodeRequest(bytes: Uint8Array): RequestPayload | null {
    const object = decode(this.requestType, bytes);
    if (object.payload === undefined) {
      return null;
    }

    const parsed = requestObjectSchema.safeParse(object);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed Request envelope: ${parsed.error.message}`, { phase: 'Decoding' });
    }
    return requestFromObject(parsed.data);
  }

  encodeResponse(payload: ResponsePayload): Uint8Array {
    return encode(this.responseType, responseToObject(payload));
  }

  decodeResponse(bytes: Uint8Array): ResponsePayload {
    const object = decode(this.responseType, bytes);
    if (object.payload === undefined) {
      throw new ProtocolError('Response envelope carries no payload', { phase: 'Decoding' });
    }

    const parsed = responseObjectSchema.safeParse(object);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed Response envelope: ${parsed.error.message}`, { phase: 'Decoding' });
    }
    return responseFromObject(parsed.data);
  }
}

let sharedCodec: BookStoreCodec | null = null;

/** Process-wide codec built from the bundled schema */
export function getCodec(): BookStoreCodec {
  if (!sharedCodec) {
    sharedCodec = new BookStoreCodec();
  }
  return sharedCodec;
}

function lookupEnvelope(root: protobuf.Root, name: string): protobuf.Type {
  const found = root.lookup(name);
  if (!(found instanceof protobuf.Type)) {
    throw new ProtocolError(`Wire schema does not define message ${name}`, { phase: 'Idle' });
  }
  return found;
}

function assertWireTypes(envelope: protobuf.Type, expected: readonly WireMember[]): void {
  const oneof = envelope.oneofs?.payload;
  if (!oneof) {
    throw new ProtocolError(`${envelope.name} has no payload oneof`, { phase: 'Idle' });
  }

  const fields = [...oneof.fieldsArray].sort((a, b) => a.id - b.id);
  const actual = fields.map((field) => ({ member: field.name, type: field.type }));
  const matches =
    actual.length === expected.length &&
    actual.every(
      (entry, index) =>
        entry.member === expected[index].member && entry.type === expected[index].type && fields[index].id === index + 1
    );

  if (!matches) {
    throw new ProtocolError(
      `${envelope.name} payload types [${describeMembers(actual)}] do not match the wire registry [${describeMembers(expected)}]`,
      { phase: 'Idle' }
    );
  }
}

function describeMembers(members: readonly WireMember[]): string {
  return members.map((m) => `${m.member}:${m.type}`).join(', ');
}

function encode(type: protobuf.Type, object: Record<string, unknown>): Uint8Array {
  const problem = type.verify(object);
  if (problem) {
    throw new ProtocolError(`Cannot encode ${type.name}: ${problem}`, { phase: 'Encoding' });
  }
  return type.encode(type.fromObject(object)).finish();
}

function decode(type: protobuf.Type, bytes: Uint8Array): Record<string, unknown> {
  try {
    return type.toObject(type.decode(bytes), CONVERSION);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProtocolError(`Cannot decode ${type.name}: ${reason}`, { phase: 'Decoding', cause: error });
  }
}

// ==================== Object mapping ====================

function entriesOf(values: ReadonlyMap<number, number>): Array<{ isbn: number; value: number }> {
  return [...values].map(([isbn, value]) => ({ isbn, value }));
}

function requestToObject(payload: RequestPayload): Record<string, unknown> {
  switch (payload.type) {
    case 'bookSpecs':
      return {
        bookSpecs: {
          books: payload.books.map((spec) => ({
            isbn: spec.isbn,
            title: spec.title,
            author: spec.author,
            price: spec.price,
            numCopies: spec.numCopies,
            editorPick: spec.editorPick ?? false,
          })),
        },
      };
    case 'bookCopies':
      return { bookCopies: { entries: entriesOf(payload.copies) } };
    case 'bookRatings':
      return { bookRatings: { entries: entriesOf(payload.ratings) } };
    case 'isbns':
      return { isbns: { isbns: payload.isbns } };
    case 'editorPicks':
      return { editorPicks: { picks: payload.picks.map(({ isbn, editorPick }) => ({ isbn, editorPick })) } };
    case 'count':
      return { count: { value: payload.value } };
  }
}

function requestFromObject(object: RequestObject): RequestPayload {
  switch (object.payload) {
    case 'bookSpecs':
      return { type: 'bookSpecs', books: object.bookSpecs.books };
    case 'bookCopies':
      return { type: 'bookCopies', copies: new Map(object.bookCopies.entries.map((e): [number, number] => [e.isbn, e.value])) };
    case 'bookRatings':
      return { type: 'bookRatings', ratings: new Map(object.bookRatings.entries.map((e): [number, number] => [e.isbn, e.value])) };
    case 'isbns':
      return { type: 'isbns', isbns: object.isbns.isbns };
    case 'editorPicks':
      return { type: 'editorPicks', picks: object.editorPicks.picks };
    case 'count':
      return { type: 'count', value: object.count.value };
  }
}

function responseToObject(payload: ResponsePayload): Record<string, unknown> {
  switch (payload.type) {
    case 'empty':
      return { empty: {} };
    case 'books':
      return { books: { books: payload.books.map(toBook) } };
    case 'stockBooks':
      return { stockBooks: { books: payload.books.map(toStockBook) } };
    case 'error':
      return { error: payload.error };
  }
}

function responseFromObject(object: ResponseObject): ResponsePayload {
  switch (object.payload) {
    case 'empty':
      return { type: 'empty' };
    case 'books':
      return { type: 'books', books: object.books.books.map(toBook) };
    case 'stockBooks':
      return { type: 'stockBooks', books: object.stockBooks.books.map(toStockBook) };
    case 'error':
      return { type: 'error', error: object.error };
  }
}
