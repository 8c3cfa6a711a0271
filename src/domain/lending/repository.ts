// Domain: Lending repository interface

import type { PageRequest, PageResponse } from '../common/pagination.js';
import type { BookTransactionHistory } from './types.js';

export interface ITransactionHistoryRepository {
  /**
   * Inserts a new borrow row unless the user already has an open transaction
   * for the book. The check and the insert happen in one store update.
   * Returns null when an open transaction exists.
   */
  createIfNotBorrowed(bookId: string, userId: string): Promise<BookTransactionHistory | null>;
  /** Borrowed and not yet returned */
  findUnreturned(bookId: string, userId: string): Promise<BookTransactionHistory | null>;
  /** Returned, waiting for the owner's approval (oldest first) */
  findReturnedNotApproved(bookId: string): Promise<BookTransactionHistory | null>;
  update(
    id: string,
    updates: Partial<Pick<BookTransactionHistory, 'returned' | 'returnApproved'>>,
    modifiedBy: string
  ): Promise<BookTransactionHistory | null>;
  findByBorrower(request: PageRequest, userId: string): Promise<PageResponse<BookTransactionHistory>>;
  findByBookIds(request: PageRequest, bookIds: string[]): Promise<PageResponse<BookTransactionHistory>>;
}
