import {
  MessageTag,
  type BookSpec,
  type CopyRequests,
  type EditorPickUpdate,
  type StockBook,
} from '@bookstore/shared';
import { BaseRpcClient } from './BaseRpcClient';

/**
 * Administrative surface of the catalog.
 */
export class StockManagerClient extends BaseRpcClient {
  async addBooks(specs: readonly BookSpec[] | null): Promise<void> {
    await this.callForEmpty(MessageTag.ADDBOOKS, specs === null ? null : { type: 'bookSpecs', books: [...specs] });
  }

  async addCopies(requests: CopyRequests | null): Promise<void> {
    await this.callForEmpty(
      MessageTag.ADDCOPIES,
      requests === null ? null : { type: 'bookCopies', copies: new Map(requests) }
    );
  }

  /** Every book in the catalog, ascending by isbn */
  async getBooks(): Promise<StockBook[]> {
    return this.callForStockBooks(MessageTag.LISTBOOKS, null);
  }

  async updateEditorPicks(picks: readonly EditorPickUpdate[] | null): Promise<void> {
    await this.callForEmpty(
      MessageTag.UPDATEEDITORPICKS,
      picks === null ? null : { type: 'editorPicks', picks: [...picks] }
    );
  }

  async getBooksByIsbn(isbns: readonly number[] | null): Promise<StockBook[]> {
    return this.callForStockBooks(
      MessageTag.GETSTOCKBOOKSBYISBN,
      isbns === null ? null : { type: 'isbns', isbns: [...isbns] }
    );
  }

  async getBooksInDemand(): Promise<StockBook[]> {
    return this.callForStockBooks(MessageTag.GETBOOKSINDEMAND, null);
  }

  async removeBooks(isbns: readonly number[] | null): Promise<void> {
    await this.callForEmpty(MessageTag.REMOVEBOOKS, isbns === null ? null : { type: 'isbns', isbns: [...isbns] });
  }

  async removeAllBooks(): Promise<void> {
    await this.callForEmpty(MessageTag.REMOVEALLBOOKS, null);
  }
}
