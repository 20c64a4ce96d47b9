import { z } from 'zod';
import type { WireError } from '../errors';

// Shapes of envelopes after protobufjs `toObject` with defaults on. The
// schema guarantees field presence and primitive types; range checks stay with
// the catalog so that bad values are reported as application errors.

// Request numbers may be NaN; the catalog rejects them like any other bad value.
const requestNumber = z.number().or(z.nan());

const bookSchema = z.object({
  isbn: z.number(),
  title: z.string(),
  author: z.string(),
  price: z.number(),
});

const stockBookSchema = bookSchema.extend({
  numCopies: z.number(),
  numSaleMisses: z.number(),
  totalRating: z.number(),
  numTimesRated: z.number(),
  editorPick: z.boolean(),
});

const bookSpecSchema = z.object({
  isbn: requestNumber,
  title: z.string(),
  author: z.string(),
  price: requestNumber,
  numCopies: requestNumber,
  editorPick: z.boolean(),
});

const isbnValueMapSchema = z.object({
  entries: z.array(z.object({ isbn: requestNumber, value: requestNumber })),
});

export const wireErrorSchema: z.ZodType<WireError> = z.lazy(() =>
  z.object({
    kind: z.string(),
    message: z.string(),
    cause: wireErrorSchema.nullish(),
  })
);

export const requestObjectSchema = z.discriminatedUnion('payload', [
  z.object({ payload: z.literal('bookSpecs'), bookSpecs: z.object({ books: z.array(bookSpecSchema) }) }),
  z.object({ payload: z.literal('bookCopies'), bookCopies: isbnValueMapSchema }),
  z.object({ payload: z.literal('bookRatings'), bookRatings: isbnValueMapSchema }),
  z.object({ payload: z.literal('isbns'), isbns: z.object({ isbns: z.array(requestNumber) }) }),
  z.object({
    payload: z.literal('editorPicks'),
    editorPicks: z.object({ picks: z.array(z.object({ isbn: requestNumber, editorPick: z.boolean() })) }),
  }),
  z.object({ payload: z.literal('count'), count: z.object({ value: requestNumber }) }),
]);

export const responseObjectSchema = z.discriminatedUnion('payload', [
  z.object({ payload: z.literal('empty'), empty: z.object({}) }),
  z.object({ payload: z.literal('books'), books: z.object({ books: z.array(bookSchema) }) }),
  z.object({ payload: z.literal('stockBooks'), stockBooks: z.object({ books: z.array(stockBookSchema) }) }),
  z.object({ payload: z.literal('error'), error: wireErrorSchema }),
]);

export type RequestObject = z.infer<typeof requestObjectSchema>;
export type ResponseObject = z.infer<typeof responseObjectSchema>;
