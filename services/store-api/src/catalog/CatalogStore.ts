import {
  BookStoreError,
  DuplicateIsbnError,
  InsufficientStockError,
  InvalidBookFieldError,
  InvalidIsbnError,
  InvalidQuantityError,
  InvalidRatingError,
  NullOrEmptyInputError,
  isEmpty,
  isInvalidCopies,
  isInvalidCount,
  isInvalidIsbn,
  isInvalidPrice,
  isInvalidRating,
  toBook,
  toStockBook,
  type Book,
  type BookSpec,
  type CopyRequests,
  type EditorPickUpdate,
  type Logger,
  type RatingSubmissions,
  type StockBook,
} from '@bookstore/shared';
import { logger as serviceLogger } from '../logger';
import { CatalogLock } from './CatalogLock';
import { DemandTracker } from './demand';
import { sampleWithoutReplacement, type RandomSource } from './editorPicks';
import { selectTopRated } from './ranking';

/** Live record; sale misses are kept by the DemandTracker */
interface StockRecord {
  readonly isbn: number;
  readonly title: string;
  readonly author: string;
  readonly price: number;
  numCopies: number;
  totalRating: number;
  numTimesRated: number;
  editorPick: boolean;
}

export interface CatalogStoreOptions {
  logger?: Logger;
  random?: RandomSource;
}

interface Shortfall {
  isbn: number;
  requested: number;
  available: number;
}

/**
 * In-memory catalog with all-or-nothing batches.
 *
 * Every operation validates its whole input before touching a record, inside
 * the catalog lock. The only write on a failure path is sale-miss recording
 * when a purchase runs short.
 */
export class CatalogStore {
  private readonly records = new Map<number, StockRecord>();
  private readonly demand = new DemandTracker();
  private readonly lock = new CatalogLock();
  private readonly logger: Logger;
  private readonly random: RandomSource;

  constructor(options: CatalogStoreOptions = {}) {
    this.logger = options.logger ?? serviceLogger.child({ component: 'catalog' });
    this.random = options.random ?? Math.random;
  }

  // ==================== Administration ====================

  addBooks(specs: readonly BookSpec[] | null): void {
    this.mutate('addBooks', () => {
      if (!specs || specs.length === 0) {
        throw new NullOrEmptyInputError('Book list is null or empty');
      }

      const batch = new Set<number>();
      for (const spec of specs) {
        if (isInvalidIsbn(spec.isbn)) {
          throw new InvalidIsbnError(`isbn ${spec.isbn} is not a positive integer`);
        }
        if (this.records.has(spec.isbn)) {
          throw new DuplicateIsbnError(`isbn ${spec.isbn} is already in the catalog`);
        }
        if (batch.has(spec.isbn)) {
          throw new DuplicateIsbnError(`isbn ${spec.isbn} appears more than once in the batch`);
        }
        batch.add(spec.isbn);

        if (isEmpty(spec.title)) {
          throw new InvalidBookFieldError(`isbn ${spec.isbn} has an empty title`);
        }
        if (isEmpty(spec.author)) {
          throw new InvalidBookFieldError(`isbn ${spec.isbn} has an empty author`);
        }
        if (isInvalidPrice(spec.price)) {
          throw new InvalidBookFieldError(`isbn ${spec.isbn} has invalid price ${spec.price}`);
        }
        if (isInvalidCopies(spec.numCopies)) {
          throw new InvalidQuantityError(`isbn ${spec.isbn} has invalid copy count ${spec.numCopies}`);
        }
      }

      for (const spec of specs) {
        this.records.set(spec.isbn, {
          isbn: spec.isbn,
          title: spec.title,
          author: spec.author,
          price: spec.price,
          numCopies: spec.numCopies,
          totalRating: 0,
          numTimesRated: 0,
          editorPick: spec.editorPick ?? false,
        });
      }
    });
  }

  addCopies(requests: CopyRequests | null): void {
    this.mutate('addCopies', () => {
      const validated = this.validateCopyRequests(requests);
      for (const [record, copies] of validated) {
        if (!Number.isSafeInteger(record.numCopies + copies)) {
          throw new InvalidQuantityError(`adding ${copies} copies to isbn ${record.isbn} exceeds the largest copy count`);
        }
      }
      for (const [record, copies] of validated) {
        record.numCopies += copies;
      }
    });
  }

  updateEditorPicks(picks: readonly EditorPickUpdate[] | null): void {
    this.mutate('updateEditorPicks', () => {
      if (!picks) {
        throw new NullOrEmptyInputError('Editor pick list is null');
      }
      const validated = picks.map((pick) => ({ record: this.requireRecord(pick.isbn), editorPick: pick.editorPick }));
      for (const { record, editorPick } of validated) {
        record.editorPick = editorPick;
      }
    });
  }

  removeBooks(isbns: readonly number[] | null): void {
    this.mutate('removeBooks', () => {
      if (!isbns || isbns.length === 0) {
        throw new NullOrEmptyInputError('Isbn list is null or empty');
      }
      isbns.forEach((isbn) => this.requireRecord(isbn));
      for (const isbn of isbns) {
        this.records.delete(isbn);
        this.demand.clear(isbn);
      }
    });
  }

  removeAllBooks(): void {
    this.mutate('removeAllBooks', () => {
      this.records.clear();
      this.demand.clearAll();
    });
  }

  /** Every book, ascending by isbn */
  listBooks(): StockBook[] {
    return this.query('listBooks', () =>
      [...this.records.values()].sort((a, b) => a.isbn - b.isbn).map((record) => this.snapshot(record))
    );
  }

  getBooksByIsbn(isbns: readonly number[] | null): StockBook[] {
    return this.query('getBooksByIsbn', () => this.resolveAll(isbns).map((record) => this.snapshot(record)));
  }

  getBooksInDemand(): StockBook[] {
    return this.query('getBooksInDemand', () =>
      this.demand.isbnsInDemand().map((isbn) => this.snapshot(this.requireRecord(isbn)))
    );
  }

  // ==================== Customer ====================

  buyBooks(requests: CopyRequests | null): void {
    this.mutate('buyBooks', () => {
      const validated = this.validateCopyRequests(requests);

      const shortfalls: Shortfall[] = [];
      for (const [record, requested] of validated) {
        if (record.numCopies < requested) {
          shortfalls.push({ isbn: record.isbn, requested, available: record.numCopies });
        }
      }

      if (shortfalls.length > 0) {
        for (const { isbn, requested, available } of shortfalls) {
          const total = this.demand.recordMiss(isbn, requested - available);
          this.logger.info({ isbn, requested, available, numSaleMisses: total }, 'Recorded sale miss');
        }
        const details = shortfalls.map((s) => `isbn ${s.isbn} has ${s.available} copies, ${s.requested} requested`);
        throw new InsufficientStockError(`Insufficient stock: ${details.join('; ')}`);
      }

      for (const [record, requested] of validated) {
        record.numCopies -= requested;
      }
    });
  }

  /** Public view of the requested books; repeated isbns are returned once */
  getBooks(isbns: readonly number[] | null): Book[] {
    return this.query('getBooks', () => this.resolveAll(isbns).map(toBook));
  }

  rateBooks(ratings: RatingSubmissions | null): void {
    this.mutate('rateBooks', () => {
      if (!ratings) {
        throw new NullOrEmptyInputError('Rating map is null');
      }

      const validated: Array<[StockRecord, number]> = [];
      for (const [isbn, rating] of ratings) {
        const record = this.requireRecord(isbn);
        if (isInvalidRating(rating)) {
          throw new InvalidRatingError(`rating ${rating} for isbn ${isbn} is not a whole number from 0 to 5`);
        }
        validated.push([record, rating]);
      }

      for (const [record, rating] of validated) {
        record.totalRating += rating;
        record.numTimesRated += 1;
      }
    });
  }

  getTopRatedBooks(k: number): Book[] {
    return this.query('getTopRatedBooks', () => {
      if (isInvalidCount(k)) {
        throw new InvalidQuantityError(`Top-rated count ${k} must be a non-negative integer`);
      }
      return selectTopRated(this.records.values(), k).map(toBook);
    });
  }

  getEditorPicks(numBooks: number): Book[] {
    return this.query('getEditorPicks', () => {
      if (isInvalidCount(numBooks)) {
        throw new InvalidQuantityError(`Editor pick count ${numBooks} must be a non-negative integer`);
      }
      const picks = [...this.records.values()].filter((record) => record.editorPick).sort((a, b) => a.isbn - b.isbn);
      return sampleWithoutReplacement(picks, numBooks, this.random).map(toBook);
    });
  }

  // ==================== Internals ====================

  private mutate(operation: string, section: () => void): void {
    try {
      this.lock.write(section);
    } catch (error) {
      this.logRejection(operation, error);
      throw error;
    }
    this.logger.debug({ operation }, 'Catalog batch committed');
  }

  private query<T>(operation: string, section: () => T): T {
    try {
      return this.lock.read(section);
    } catch (error) {
      this.logRejection(operation, error);
      throw error;
    }
  }

  private logRejection(operation: string, error: unknown): void {
    if (error instanceof BookStoreError) {
      this.logger.info({ operation, kind: error.kind, reason: error.message }, 'Catalog request rejected');
    }
  }

  private requireRecord(isbn: number): StockRecord {
    if (isInvalidIsbn(isbn)) {
      throw new InvalidIsbnError(`isbn ${isbn} is not a positive integer`);
    }
    const record = this.records.get(isbn);
    if (!record) {
      throw new InvalidIsbnError(`isbn ${isbn} is not in the catalog`);
    }
    return record;
  }

  private resolveAll(isbns: readonly number[] | null): StockRecord[] {
    if (!isbns || isbns.length === 0) {
      throw new NullOrEmptyInputError('Isbn list is null or empty');
    }
    return [...new Set(isbns)].map((isbn) => this.requireRecord(isbn));
  }

  private validateCopyRequests(requests: CopyRequests | null): Array<[StockRecord, number]> {
    if (!requests || requests.size === 0) {
      throw new NullOrEmptyInputError('Copy request map is null or empty');
    }

    const validated: Array<[StockRecord, number]> = [];
    for (const [isbn, copies] of requests) {
      const record = this.requireRecord(isbn);
      if (isInvalidCopies(copies)) {
        throw new InvalidQuantityError(`quantity ${copies} for isbn ${isbn} must be a positive integer`);
      }
      validated.push([record, copies]);
    }
    return validated;
  }

  private snapshot(record: StockRecord): StockBook {
    return toStockBook({ ...record, numSaleMisses: this.demand.missesFor(record.isbn) });
  }
}
