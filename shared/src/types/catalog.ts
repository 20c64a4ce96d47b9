// Catalog entities as they cross the API boundary. Every value handed to a
// caller is a frozen snapshot; the live records stay inside the store.

/** Public view of a book, as customers see it */
export interface Book {
  readonly isbn: number;
  readonly title: string;
  readonly author: string;
  readonly price: number;
}

/** Administrative view: the book plus stock, rating and demand counters */
export interface StockBook extends Book {
  readonly numCopies: number;
  readonly numSaleMisses: number;
  readonly totalRating: number;
  readonly numTimesRated: number;
  readonly editorPick: boolean;
}

/** One item of an add-books batch */
export interface BookSpec {
  isbn: number;
  title: string;
  author: string;
  price: number;
  numCopies: number;
  editorPick?: boolean;
}

export interface EditorPickUpdate {
  isbn: number;
  editorPick: boolean;
}

/** isbn -> number of copies to buy or add */
export type CopyRequests = ReadonlyMap<number, number>;

/** isbn -> rating in [0, 5] */
export type RatingSubmissions = ReadonlyMap<number, number>;

export const MIN_RATING = 0;
export const MAX_RATING = 5;

export function averageRating(book: Pick<StockBook, 'totalRating' | 'numTimesRated'>): number {
  return book.numTimesRated > 0 ? book.totalRating / book.numTimesRated : 0;
}

/**
 * Project an administrative record onto the public view.
 */
export function toBook(book: Book): Book {
  return Object.freeze({
    isbn: book.isbn,
    title: book.title,
    author: book.author,
    price: book.price,
  });
}

export function toStockBook(book: StockBook): StockBook {
  return Object.freeze({
    isbn: book.isbn,
    title: book.title,
    author: book.author,
    price: book.price,
    numCopies: book.numCopies,
    numSaleMisses: book.numSaleMisses,
    totalRating: book.totalRating,
    numTimesRated: book.numTimesRated,
    editorPick: book.editorPick,
  });
}
