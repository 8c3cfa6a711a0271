// Book Repository - LowDB implementation

import { v4 as uuidv4 } from 'uuid';
import type { BookRecord, DatabaseConnection } from './connection.js';
import type { Book } from '@/domain/book/types.js';
import type { BookFlag, BookUpdate, IBookRepository, NewBook } from '@/domain/book/repository.js';
import {
  paginate,
  sortByCreatedDesc,
  type PageRequest,
  type PageResponse,
} from '@/domain/common/pagination.js';

export class BookRepository implements IBookRepository {
  constructor(private db: DatabaseConnection) {}

  async create(data: NewBook): Promise<Book> {
    const record: BookRecord = {
      id: uuidv4(),
      title: data.title,
      author_name: data.authorName,
      isbn: data.isbn,
      synopsis: data.synopsis,
      owner_id: data.ownerId,
      shareable: data.shareable ? 1 : 0,
      archived: data.archived ? 1 : 0,
      book_cover: null,
      created_at: new Date().toISOString(),
      created_by: data.createdBy,
      last_modified_at: null,
      last_modified_by: null,
    };

    await this.db.atomicUpdate((schema) => {
      schema.books.push(record);
    });

    return this.rowToBook(record);
  }

  async findById(id: string): Promise<Book | null> {
    const book = this.db.getData().books.find((b) => b.id === id);
    return book ? this.rowToBook(book) : null;
  }

  async findByIds(ids: string[]): Promise<Book[]> {
    const wanted = new Set(ids);
    return this.db
      .getData()
      .books.filter((b) => wanted.has(b.id))
      .map((b) => this.rowToBook(b));
  }

  async update(id: string, updates: BookUpdate, modifiedBy: string): Promise<Book | null> {
    const record = await this.db.atomicUpdate((schema) => {
      const book = schema.books.find((b) => b.id === id);
      if (!book) return null;

      if (updates.bookCover !== undefined) book.book_cover = updates.bookCover;
      book.last_modified_at = new Date().toISOString();
      book.last_modified_by = modifiedBy;

      return { ...book };
    });

    return record ? this.rowToBook(record) : null;
  }

  async toggle(id: string, flag: BookFlag, modifiedBy: string): Promise<Book | null> {
    const record = await this.db.atomicUpdate((schema) => {
      const book = schema.books.find((b) => b.id === id);
      if (!book) return null;

      if (flag === 'shareable') {
        book.shareable = book.shareable === 1 ? 0 : 1;
      } else {
        book.archived = book.archived === 1 ? 0 : 1;
      }
      book.last_modified_at = new Date().toISOString();
      book.last_modified_by = modifiedBy;

      return { ...book };
    });

    return record ? this.rowToBook(record) : null;
  }

  async findDisplayable(request: PageRequest, viewerId: string): Promise<PageResponse<Book>> {
    return this.page(
      request,
      (b) => b.archived === 0 && b.shareable === 1 && b.owner_id !== viewerId
    );
  }

  async findByOwner(request: PageRequest, ownerId: string): Promise<PageResponse<Book>> {
    return this.page(request, (b) => b.owner_id === ownerId);
  }

  async findIdsByOwner(ownerId: string): Promise<string[]> {
    return this.db
      .getData()
      .books.filter((b) => b.owner_id === ownerId)
      .map((b) => b.id);
  }

  private page(request: PageRequest, predicate: (row: BookRecord) => boolean): PageResponse<Book> {
    const books = this.db.getData().books.filter(predicate).map((b) => this.rowToBook(b));
    return paginate(sortByCreatedDesc(books), request);
  }

  private rowToBook(row: BookRecord): Book {
    return {
      id: row.id,
      title: row.title,
      authorName: row.author_name,
      isbn: row.isbn,
      synopsis: row.synopsis,
      ownerId: row.owner_id,
      shareable: row.shareable === 1,
      archived: row.archived === 1,
      bookCover: row.book_cover,
      createdAt: new Date(row.created_at),
      createdBy: row.created_by,
      lastModifiedAt: row.last_modified_at ? new Date(row.last_modified_at) : null,
      lastModifiedBy: row.last_modified_by,
    };
  }
}
