import {
  MessageTag,
  type Book,
  type CopyRequests,
  type RatingSubmissions,
} from '@bookstore/shared';
import { BaseRpcClient } from './BaseRpcClient';

/**
 * Customer surface of the catalog.
 */
export class BookStoreClient extends BaseRpcClient {
  async buyBooks(requests: CopyRequests | null): Promise<void> {
    await this.callForEmpty(
      MessageTag.BUYBOOKS,
      requests === null ? null : { type: 'bookCopies', copies: new Map(requests) }
    );
  }

  /** Public view of the named books */
  async getBooks(isbns: readonly number[] | null): Promise<Book[]> {
    return this.callForBooks(MessageTag.GETBOOKS, isbns === null ? null : { type: 'isbns', isbns: [...isbns] });
  }

  async getEditorPicks(numBooks: number): Promise<Book[]> {
    return this.callForBooks(MessageTag.EDITORPICKS, { type: 'count', value: numBooks });
  }

  async rateBooks(ratings: RatingSubmissions | null): Promise<void> {
    await this.callForEmpty(
      MessageTag.RATEBOOKS,
      ratings === null ? null : { type: 'bookRatings', ratings: new Map(ratings) }
    );
  }

  async getTopRatedBooks(k: number): Promise<Book[]> {
    return this.callForBooks(MessageTag.TOPRATEDBOOKS, { type: 'count', value: k });
  }
}
