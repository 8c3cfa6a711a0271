// Application: Lending Service
// Borrow, return and approve-return workflows over the transaction history

import type { Book, BorrowedBookResponse } from '@/domain/book/types.js';
import type { IBookRepository } from '@/domain/book/repository.js';
import type { BookTransactionHistory } from '@/domain/lending/types.js';
import type { ITransactionHistoryRepository } from '@/domain/lending/repository.js';
import { assertLendable, assertNotOwner, assertOwner, transition } from '@/domain/lending/state.js';
import type { PageRequest, PageResponse } from '@/domain/common/pagination.js';
import type { User } from '@/domain/user/types.js';
import { EntityNotFoundError, OperationNotPermittedError } from '@/utils/errors.js';
import { lendingLogger } from '@/utils/logger.js';

export class LendingService {
  constructor(
    private readonly books: IBookRepository,
    private readonly transactions: ITransactionHistoryRepository
  ) {}

  /**
   * Open a new borrow cycle for the connected user; returns the transaction id
   */
  async borrowBook(bookId: string, connectedUser: User): Promise<string> {
    const book = await this.requireBook(bookId);
    assertLendable(book);
    assertNotOwner(book, connectedUser.id, 'You cannot borrow your own book');

    // Check and insert run inside one store update
    const transaction = await this.transactions.createIfNotBorrowed(book.id, connectedUser.id);
    if (!transaction) {
      throw new OperationNotPermittedError('The requested book is already borrowed');
    }

    lendingLogger.info('Book borrowed', { bookId, userId: connectedUser.id, transactionId: transaction.id });
    return transaction.id;
  }

  async returnBorrowedBook(bookId: string, connectedUser: User): Promise<string> {
    const book = await this.requireBook(bookId);
    assertLendable(book);
    assertNotOwner(book, connectedUser.id, 'You cannot borrow or return your own book');

    const transaction = await this.transactions.findUnreturned(book.id, connectedUser.id);
    if (!transaction) {
      throw new OperationNotPermittedError('You did not borrow this book');
    }

    await this.transactions.update(transaction.id, transition(transaction, 'RETURNED'), connectedUser.id);
    lendingLogger.info('Book returned', { bookId, userId: connectedUser.id, transactionId: transaction.id });
    return transaction.id;
  }

  async approveReturnBorrowedBook(bookId: string, connectedUser: User): Promise<string> {
    const book = await this.requireBook(bookId);
    assertLendable(book);
    assertOwner(book, connectedUser.id, 'You cannot approve the return of a book you do not own');

    const transaction = await this.transactions.findReturnedNotApproved(book.id);
    if (!transaction) {
      throw new OperationNotPermittedError('The book is not returned yet. You cannot approve its return');
    }

    await this.transactions.update(
      transaction.id,
      transition(transaction, 'RETURN_APPROVED'),
      connectedUser.id
    );
    lendingLogger.info('Book return approved', { bookId, ownerId: connectedUser.id, transactionId: transaction.id });
    return transaction.id;
  }

  /**
   * Every transaction where the connected user is the borrower
   */
  async findAllBorrowedBooks(
    request: PageRequest,
    connectedUser: User
  ): Promise<PageResponse<BorrowedBookResponse>> {
    const page = await this.transactions.findByBorrower(request, connectedUser.id);
    return this.toResponsePage(page);
  }

  /**
   * Every transaction on books the connected user owns
   */
  async findAllReturnedBooks(
    request: PageRequest,
    connectedUser: User
  ): Promise<PageResponse<BorrowedBookResponse>> {
    const ownedIds = await this.books.findIdsByOwner(connectedUser.id);
    const page = await this.transactions.findByBookIds(request, ownedIds);
    return this.toResponsePage(page);
  }

  // ==================== Helpers ====================

  private async requireBook(bookId: string): Promise<Book> {
    const book = await this.books.findById(bookId);
    if (!book) {
      throw new EntityNotFoundError(`No book found with ID:: ${bookId}`);
    }
    return book;
  }

  private async toResponsePage(
    page: PageResponse<BookTransactionHistory>
  ): Promise<PageResponse<BorrowedBookResponse>> {
    const bookIds = [...new Set(page.content.map((t) => t.bookId))];
    const booksById = new Map((await this.books.findByIds(bookIds)).map((b) => [b.id, b]));

    const content: BorrowedBookResponse[] = [];
    for (const transaction of page.content) {
      const book = booksById.get(transaction.bookId);
      if (!book) continue;
      content.push({
        id: book.id,
        transactionId: transaction.id,
        title: book.title,
        authorName: book.authorName,
        isbn: book.isbn,
        returned: transaction.returned,
        returnApproved: transaction.returnApproved,
      });
    }

    return { ...page, content };
  }
}
