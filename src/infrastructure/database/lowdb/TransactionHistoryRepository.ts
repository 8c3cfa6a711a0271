// Book Transaction History Repository - LowDB implementation
// Append-only borrow history; rows are flagged, never removed

import { v4 as uuidv4 } from 'uuid';
import type { BookTransactionRecord, DatabaseConnection } from './connection.js';
import type { BookTransactionHistory } from '@/domain/lending/types.js';
import type { ITransactionHistoryRepository } from '@/domain/lending/repository.js';
import { isOpen } from '@/domain/lending/state.js';
import {
  paginate,
  sortByCreatedDesc,
  type PageRequest,
  type PageResponse,
} from '@/domain/common/pagination.js';

export class TransactionHistoryRepository implements ITransactionHistoryRepository {
  constructor(private db: DatabaseConnection) {}

  async createIfNotBorrowed(bookId: string, userId: string): Promise<BookTransactionHistory | null> {
    const record = await this.db.atomicUpdate((schema) => {
      const open = schema.bookTransactions.some(
        (t) => t.book_id === bookId && t.user_id === userId && isOpen(this.rowToTransaction(t))
      );
      if (open) return null;

      const created: BookTransactionRecord = {
        id: uuidv4(),
        book_id: bookId,
        user_id: userId,
        returned: 0,
        return_approved: 0,
        created_at: new Date().toISOString(),
        created_by: userId,
        last_modified_at: null,
        last_modified_by: null,
      };
      schema.bookTransactions.push(created);
      return created;
    });

    return record ? this.rowToTransaction(record) : null;
  }

  async findUnreturned(bookId: string, userId: string): Promise<BookTransactionHistory | null> {
    const row = this.db
      .getData()
      .bookTransactions.find(
        (t) => t.book_id === bookId && t.user_id === userId && t.returned === 0 && t.return_approved === 0
      );
    return row ? this.rowToTransaction(row) : null;
  }

  async findReturnedNotApproved(bookId: string): Promise<BookTransactionHistory | null> {
    const row = this.db
      .getData()
      .bookTransactions.find((t) => t.book_id === bookId && t.returned === 1 && t.return_approved === 0);
    return row ? this.rowToTransaction(row) : null;
  }

  async update(
    id: string,
    updates: Partial<Pick<BookTransactionHistory, 'returned' | 'returnApproved'>>,
    modifiedBy: string
  ): Promise<BookTransactionHistory | null> {
    const record = await this.db.atomicUpdate((schema) => {
      const row = schema.bookTransactions.find((t) => t.id === id);
      if (!row) return null;

      if (updates.returned !== undefined) row.returned = updates.returned ? 1 : 0;
      if (updates.returnApproved !== undefined) row.return_approved = updates.returnApproved ? 1 : 0;
      row.last_modified_at = new Date().toISOString();
      row.last_modified_by = modifiedBy;

      return { ...row };
    });

    return record ? this.rowToTransaction(record) : null;
  }

  async findByBorrower(
    request: PageRequest,
    userId: string
  ): Promise<PageResponse<BookTransactionHistory>> {
    return this.page(request, (t) => t.user_id === userId);
  }

  async findByBookIds(
    request: PageRequest,
    bookIds: string[]
  ): Promise<PageResponse<BookTransactionHistory>> {
    const wanted = new Set(bookIds);
    return this.page(request, (t) => wanted.has(t.book_id));
  }

  private page(
    request: PageRequest,
    predicate: (row: BookTransactionRecord) => boolean
  ): PageResponse<BookTransactionHistory> {
    const rows = this.db
      .getData()
      .bookTransactions.filter(predicate)
      .map((t) => this.rowToTransaction(t));
    return paginate(sortByCreatedDesc(rows), request);
  }

  private rowToTransaction(row: BookTransactionRecord): BookTransactionHistory {
    return {
      id: row.id,
      bookId: row.book_id,
      userId: row.user_id,
      returned: row.returned === 1,
      returnApproved: row.return_approved === 1,
      createdAt: new Date(row.created_at),
      createdBy: row.created_by,
      lastModifiedAt: row.last_modified_at ? new Date(row.last_modified_at) : null,
      lastModifiedBy: row.last_modified_by,
    };
  }
}
