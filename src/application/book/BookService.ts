// Application: Book Service
// Book catalog: creation, listings, owner-only flag toggles and cover uploads

import type { Book, BookRequest, BookResponse } from '@/domain/book/types.js';
import type { IBookRepository } from '@/domain/book/repository.js';
import { fullName, type User } from '@/domain/user/types.js';
import type { IUserRepository } from '@/domain/user/repository.js';
import type { PageRequest, PageResponse } from '@/domain/common/pagination.js';
import { assertOwner } from '@/domain/lending/state.js';
import { EntityNotFoundError, ValidationError } from '@/utils/errors.js';
import { lendingLogger } from '@/utils/logger.js';
import { validateUpload, type FileStorageService, type UploadedFile } from '../file/FileStorageService.js';

export class BookService {
  constructor(
    private readonly books: IBookRepository,
    private readonly users: IUserRepository,
    private readonly fileStorage: FileStorageService
  ) {}

  /**
   * Create a book owned by the connected user; returns its id
   */
  async save(request: BookRequest, connectedUser: User): Promise<string> {
    const book = await this.books.create({
      title: request.title,
      authorName: request.authorName,
      isbn: request.isbn,
      synopsis: request.synopsis,
      shareable: request.shareable,
      archived: false,
      ownerId: connectedUser.id,
      createdBy: connectedUser.id,
    });

    lendingLogger.info('Book created', { bookId: book.id, ownerId: connectedUser.id });
    return book.id;
  }

  async findById(bookId: string): Promise<BookResponse> {
    return this.toBookResponse(await this.requireBook(bookId));
  }

  /**
   * Books other users may borrow: shareable, not archived, not mine
   */
  async findAllBooks(request: PageRequest, connectedUser: User): Promise<PageResponse<BookResponse>> {
    const page = await this.books.findDisplayable(request, connectedUser.id);
    return this.toResponsePage(page);
  }

  async findAllBooksByOwner(request: PageRequest, connectedUser: User): Promise<PageResponse<BookResponse>> {
    const page = await this.books.findByOwner(request, connectedUser.id);
    return this.toResponsePage(page);
  }

  async updateShareableStatus(bookId: string, connectedUser: User): Promise<string> {
    const book = await this.requireBook(bookId);
    assertOwner(book, connectedUser.id, 'You cannot update others books shareable status');

    const updated = await this.books.toggle(book.id, 'shareable', connectedUser.id);
    if (!updated) {
      throw new EntityNotFoundError(`No book found with ID:: ${bookId}`);
    }
    lendingLogger.info('Book shareable status toggled', { bookId, shareable: updated.shareable });
    return book.id;
  }

  async updateArchivedStatus(bookId: string, connectedUser: User): Promise<string> {
    const book = await this.requireBook(bookId);
    assertOwner(book, connectedUser.id, 'You cannot update others books archived status');

    const updated = await this.books.toggle(book.id, 'archived', connectedUser.id);
    if (!updated) {
      throw new EntityNotFoundError(`No book found with ID:: ${bookId}`);
    }
    lendingLogger.info('Book archived status toggled', { bookId, archived: updated.archived });
    return book.id;
  }

  async uploadBookCoverPicture(bookId: string, file: UploadedFile, connectedUser: User): Promise<void> {
    const book = await this.requireBook(bookId);
    assertOwner(book, connectedUser.id, 'You cannot update the cover of others books');

    const validation = validateUpload(file);
    if (!validation.valid) {
      throw new ValidationError([{ field: 'file', message: validation.error ?? 'Invalid file' }]);
    }

    const coverPath = await this.fileStorage.saveFile(file, connectedUser.id);
    await this.books.update(book.id, { bookCover: coverPath }, connectedUser.id);
  }

  // ==================== Helpers ====================

  private async requireBook(bookId: string): Promise<Book> {
    const book = await this.books.findById(bookId);
    if (!book) {
      throw new EntityNotFoundError(`No book found with ID:: ${bookId}`);
    }
    return book;
  }

  private async toResponsePage(page: PageResponse<Book>): Promise<PageResponse<BookResponse>> {
    const content = await Promise.all(page.content.map((book) => this.toBookResponse(book)));
    return { ...page, content };
  }

  private async toBookResponse(book: Book): Promise<BookResponse> {
    const owner = await this.users.findById(book.ownerId);
    const cover = await this.fileStorage.readFile(book.bookCover);

    return {
      id: book.id,
      title: book.title,
      authorName: book.authorName,
      isbn: book.isbn,
      synopsis: book.synopsis,
      owner: owner ? fullName(owner) : '',
      cover: cover ? cover.toString('base64') : null,
      archived: book.archived,
      shareable: book.shareable,
    };
  }
}
