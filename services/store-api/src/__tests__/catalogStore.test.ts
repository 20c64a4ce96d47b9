/**
 * Catalog store tests
 *
 * Batch atomicity, sale-miss recording, ratings and the query surface.
 */

import {
  DuplicateIsbnError,
  InsufficientStockError,
  InvalidBookFieldError,
  InvalidIsbnError,
  InvalidQuantityError,
  InvalidRatingError,
  NullOrEmptyInputError,
  averageRating,
  type BookSpec,
} from '@bookstore/shared';
import { CatalogStore } from '../catalog/CatalogStore';

function spec(isbn: number, overrides: Partial<BookSpec> = {}): BookSpec {
  return {
    isbn,
    title: `Title ${isbn}`,
    author: `Author ${isbn}`,
    price: 10 + isbn,
    numCopies: 5,
    ...overrides,
  };
}

describe('CatalogStore', () => {
  let store: CatalogStore;

  beforeEach(() => {
    store = new CatalogStore();
  });

  describe('addBooks', () => {
    it('inserts every book with empty counters, listed by ascending isbn', () => {
      store.addBooks([spec(7), spec(3, { editorPick: true })]);

      expect(store.listBooks()).toEqual([
        {
          isbn: 3,
          title: 'Title 3',
          author: 'Author 3',
          price: 13,
          numCopies: 5,
          numSaleMisses: 0,
          totalRating: 0,
          numTimesRated: 0,
          editorPick: true,
        },
        {
          isbn: 7,
          title: 'Title 7',
          author: 'Author 7',
          price: 17,
          numCopies: 5,
          numSaleMisses: 0,
          totalRating: 0,
          numTimesRated: 0,
          editorPick: false,
        },
      ]);
    });

    it('rejects null and empty batches', () => {
      expect(() => store.addBooks(null)).toThrow(NullOrEmptyInputError);
      expect(() => store.addBooks([])).toThrow(NullOrEmptyInputError);
    });

    it('rejects an isbn repeated within the batch without inserting anything', () => {
      expect(() => store.addBooks([spec(1), spec(2), spec(1)])).toThrow(
        'isbn 1 appears more than once in the batch'
      );
      expect(store.listBooks()).toEqual([]);
    });

    it('rejects an isbn already in the catalog', () => {
      store.addBooks([spec(1)]);

      expect(() => store.addBooks([spec(2), spec(1)])).toThrow(DuplicateIsbnError);
      expect(store.listBooks().map((b) => b.isbn)).toEqual([1]);
    });

    it('validates every field of every book', () => {
      expect(() => store.addBooks([spec(0)])).toThrow(InvalidIsbnError);
      expect(() => store.addBooks([spec(1, { title: '  ' })])).toThrow(InvalidBookFieldError);
      expect(() => store.addBooks([spec(1, { author: '' })])).toThrow(InvalidBookFieldError);
      expect(() => store.addBooks([spec(1, { price: -2 })])).toThrow('isbn 1 has invalid price -2');
      expect(() => store.addBooks([spec(1, { numCopies: 0 })])).toThrow(InvalidQuantityError);
      expect(store.listBooks()).toEqual([]);
    });
  });

  describe('buyBooks', () => {
    beforeEach(() => {
      store.addBooks([spec(1, { numCopies: 2 }), spec(2, { numCopies: 5 }), spec(3, { numCopies: 1 })]);
    });

    it('decrements every copy count when stock suffices', () => {
      store.buyBooks(
        new Map([
          [1, 2],
          [2, 3],
        ])
      );

      expect(store.listBooks().map((b) => [b.isbn, b.numCopies])).toEqual([
        [1, 0],
        [2, 2],
        [3, 1],
      ]);
    });

    it('records the shortfall of a single understocked book', () => {
      expect(() => store.buyBooks(new Map([[1, 3]]))).toThrow(InsufficientStockError);

      const inDemand = store.getBooksInDemand();
      expect(inDemand.map((b) => [b.isbn, b.numSaleMisses])).toEqual([[1, 1]]);
      expect(store.getBooksByIsbn([1])[0].numCopies).toBe(2);
    });

    it('fails the whole batch and records misses only for understocked books', () => {
      expect(() =>
        store.buyBooks(
          new Map([
            [1, 3],
            [2, 1],
            [3, 4],
          ])
        )
      ).toThrow('Insufficient stock: isbn 1 has 2 copies, 3 requested; isbn 3 has 1 copies, 4 requested');

      expect(store.listBooks().map((b) => [b.isbn, b.numCopies, b.numSaleMisses])).toEqual([
        [1, 2, 1],
        [2, 5, 0],
        [3, 1, 3],
      ]);
    });

    it('accumulates misses across failed purchases', () => {
      expect(() => store.buyBooks(new Map([[3, 2]]))).toThrow(InsufficientStockError);
      expect(() => store.buyBooks(new Map([[3, 4]]))).toThrow(InsufficientStockError);

      expect(store.getBooksInDemand().map((b) => b.numSaleMisses)).toEqual([4]);
    });

    it('has no side effect when validation fails', () => {
      expect(() =>
        store.buyBooks(
          new Map([
            [1, 3],
            [99, 1],
          ])
        )
      ).toThrow('isbn 99 is not in the catalog');
      expect(() => store.buyBooks(new Map([[1, 0]]))).toThrow(InvalidQuantityError);
      expect(() => store.buyBooks(new Map([[-1, 1]]))).toThrow(InvalidIsbnError);
      expect(() => store.buyBooks(new Map())).toThrow(NullOrEmptyInputError);
      expect(() => store.buyBooks(null)).toThrow(NullOrEmptyInputError);

      expect(store.getBooksInDemand()).toEqual([]);
      expect(store.listBooks().map((b) => b.numCopies)).toEqual([2, 5, 1]);
    });
  });

  describe('addCopies', () => {
    it('adds to every named book', () => {
      store.addBooks([spec(1, { numCopies: 1 }), spec(2, { numCopies: 1 })]);

      store.addCopies(
        new Map([
          [1, 4],
          [2, 1],
        ])
      );

      expect(store.listBooks().map((b) => b.numCopies)).toEqual([5, 2]);
    });

    it('applies nothing when one entry is invalid', () => {
      store.addBooks([spec(1, { numCopies: 1 })]);

      expect(() =>
        store.addCopies(
          new Map([
            [1, 4],
            [1000, 1],
          ])
        )
      ).toThrow(InvalidIsbnError);
      expect(() => store.addCopies(new Map([[1, -2]]))).toThrow('quantity -2 for isbn 1 must be a positive integer');
      expect(store.listBooks()[0].numCopies).toBe(1);
    });

    it('rejects a restock that would leave the safe integer range', () => {
      store.addBooks([spec(1, { numCopies: 5 }), spec(2, { numCopies: 1 })]);

      expect(() =>
        store.addCopies(
          new Map([
            [2, 1],
            [1, Number.MAX_SAFE_INTEGER - 4],
          ])
        )
      ).toThrow(`adding ${Number.MAX_SAFE_INTEGER - 4} copies to isbn 1 exceeds the largest copy count`);
      expect(store.listBooks().map((b) => b.numCopies)).toEqual([5, 1]);

      store.addCopies(new Map([[1, Number.MAX_SAFE_INTEGER - 5]]));
      expect(store.getBooksByIsbn([1])[0].numCopies).toBe(Number.MAX_SAFE_INTEGER);
    });
  });

  describe('rateBooks', () => {
    beforeEach(() => {
      store.addBooks([spec(1), spec(2)]);
    });

    it('accumulates totals and counts', () => {
      store.rateBooks(new Map([[1, 3]]));
      store.rateBooks(new Map([[1, 5]]));
      store.rateBooks(new Map([[1, 4]]));

      const [book] = store.getBooksByIsbn([1]);
      expect(book.totalRating).toBe(12);
      expect(book.numTimesRated).toBe(3);
      expect(averageRating(book)).toBe(4);
    });

    it('rejects the whole batch when one rating is out of range', () => {
      expect(() =>
        store.rateBooks(
          new Map([
            [1, 4],
            [2, 6],
          ])
        )
      ).toThrow(InvalidRatingError);

      const [book] = store.getBooksByIsbn([1]);
      expect(book.totalRating).toBe(0);
      expect(book.numTimesRated).toBe(0);
    });

    it('treats an empty map as a no-op and null as an error', () => {
      store.rateBooks(new Map());

      expect(() => store.rateBooks(null)).toThrow(NullOrEmptyInputError);
      expect(store.listBooks().map((b) => b.numTimesRated)).toEqual([0, 0]);
    });

    it('rejects ratings for unknown books', () => {
      expect(() => store.rateBooks(new Map([[3, 4]]))).toThrow(InvalidIsbnError);
    });

    it('leaves known books unrated when the batch names an unknown one', () => {
      expect(() =>
        store.rateBooks(
          new Map([
            [1, 4],
            [99, 3],
          ])
        )
      ).toThrow('isbn 99 is not in the catalog');

      const [book] = store.getBooksByIsbn([1]);
      expect(book.totalRating).toBe(0);
      expect(book.numTimesRated).toBe(0);
    });
  });

  describe('removal', () => {
    beforeEach(() => {
      store.addBooks([spec(1, { numCopies: 1 }), spec(2)]);
      expect(() => store.buyBooks(new Map([[1, 2]]))).toThrow(InsufficientStockError);
    });

    it('removes named books together with their demand state', () => {
      store.removeBooks([1]);

      expect(store.listBooks().map((b) => b.isbn)).toEqual([2]);
      expect(store.getBooksInDemand()).toEqual([]);

      store.addBooks([spec(1)]);
      expect(store.getBooksByIsbn([1])[0].numSaleMisses).toBe(0);
    });

    it('forgets the ratings of a removed book', () => {
      store.rateBooks(new Map([[1, 5]]));
      expect(store.getBooksByIsbn([1])[0].numTimesRated).toBe(1);

      store.removeBooks([1]);
      store.addBooks([spec(1)]);

      const [book] = store.getBooksByIsbn([1]);
      expect(book.totalRating).toBe(0);
      expect(book.numTimesRated).toBe(0);
    });

    it('removes nothing when one isbn is unknown', () => {
      expect(() => store.removeBooks([2, 5])).toThrow(InvalidIsbnError);
      expect(() => store.removeBooks([])).toThrow(NullOrEmptyInputError);
      expect(store.listBooks().map((b) => b.isbn)).toEqual([1, 2]);
    });

    it('clears the whole catalog', () => {
      store.removeAllBooks();

      expect(store.listBooks()).toEqual([]);
      expect(store.getBooksInDemand()).toEqual([]);
    });
  });

  describe('lookups', () => {
    beforeEach(() => {
      store.addBooks([spec(4), spec(8)]);
    });

    it('returns the public view, once per isbn, in request order', () => {
      expect(store.getBooks([8, 4, 8])).toEqual([
        { isbn: 8, title: 'Title 8', author: 'Author 8', price: 18 },
        { isbn: 4, title: 'Title 4', author: 'Author 4', price: 14 },
      ]);
    });

    it('fails the whole lookup when one isbn is absent', () => {
      expect(() => store.getBooks([4, 5])).toThrow('isbn 5 is not in the catalog');
      expect(() => store.getBooksByIsbn([9])).toThrow(InvalidIsbnError);
      expect(() => store.getBooksByIsbn(null)).toThrow(NullOrEmptyInputError);
    });

    it('hands out frozen snapshots that later writes do not change', () => {
      const [before] = store.getBooksByIsbn([4]);

      store.addCopies(new Map([[4, 10]]));

      expect(Object.isFrozen(before)).toBe(true);
      expect(before.numCopies).toBe(5);
      expect(store.getBooksByIsbn([4])[0].numCopies).toBe(15);
    });
  });

  describe('getTopRatedBooks', () => {
    it('returns nothing for k = 0 or an empty catalog', () => {
      expect(store.getTopRatedBooks(3)).toEqual([]);
      store.addBooks([spec(1)]);
      expect(store.getTopRatedBooks(0)).toEqual([]);
    });

    it('rejects a negative or fractional k', () => {
      expect(() => store.getTopRatedBooks(-1)).toThrow(InvalidQuantityError);
      expect(() => store.getTopRatedBooks(1.5)).toThrow(InvalidQuantityError);
    });

    it('orders by average rating, then ascending isbn', () => {
      store.addBooks([spec(1), spec(2), spec(3), spec(4)]);
      store.rateBooks(
        new Map([
          [1, 3],
          [2, 5],
          [3, 5],
        ])
      );
      store.rateBooks(new Map([[1, 4]]));

      expect(store.getTopRatedBooks(3).map((b) => b.isbn)).toEqual([2, 3, 1]);
      expect(store.getTopRatedBooks(10).map((b) => b.isbn)).toEqual([2, 3, 1, 4]);
    });
  });

  describe('editor picks', () => {
    beforeEach(() => {
      store = new CatalogStore({ random: () => 0 });
      store.addBooks([spec(2, { editorPick: true }), spec(3), spec(4, { editorPick: true }), spec(6, { editorPick: true })]);
    });

    it('samples only flagged books, never more than requested', () => {
      expect(store.getEditorPicks(2).map((b) => b.isbn)).toEqual([2, 4]);
      expect(store.getEditorPicks(10).map((b) => b.isbn)).toEqual([2, 4, 6]);
      expect(store.getEditorPicks(0)).toEqual([]);
    });

    it('rejects a negative count', () => {
      expect(() => store.getEditorPicks(-1)).toThrow(InvalidQuantityError);
    });

    it('updates flags atomically', () => {
      expect(() =>
        store.updateEditorPicks([
          { isbn: 3, editorPick: true },
          { isbn: 5, editorPick: true },
        ])
      ).toThrow(InvalidIsbnError);
      expect(store.getBooksByIsbn([3])[0].editorPick).toBe(false);

      store.updateEditorPicks([
        { isbn: 3, editorPick: true },
        { isbn: 2, editorPick: false },
      ]);
      expect(store.getEditorPicks(10).map((b) => b.isbn)).toEqual([3, 4, 6]);
    });

    it('treats a null update list as an error', () => {
      expect(() => store.updateEditorPicks(null)).toThrow(NullOrEmptyInputError);
    });
  });
});
