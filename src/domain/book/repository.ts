// Domain: Book repository interface

import type { PageRequest, PageResponse } from '../common/pagination.js';
import type { Book } from './types.js';

export type NewBook = Omit<Book, 'id' | 'createdAt' | 'lastModifiedAt' | 'lastModifiedBy' | 'bookCover'>;

export type BookUpdate = Partial<Pick<Book, 'bookCover'>>;

export type BookFlag = 'shareable' | 'archived';

export interface IBookRepository {
  create(data: NewBook): Promise<Book>;
  findById(id: string): Promise<Book | null>;
  findByIds(ids: string[]): Promise<Book[]>;
  update(id: string, updates: BookUpdate, modifiedBy: string): Promise<Book | null>;
  /** Negates the flag inside one store update */
  toggle(id: string, flag: BookFlag, modifiedBy: string): Promise<Book | null>;
  /** Shareable, non-archived books owned by someone other than `viewerId` */
  findDisplayable(request: PageRequest, viewerId: string): Promise<PageResponse<Book>>;
  findByOwner(request: PageRequest, ownerId: string): Promise<PageResponse<Book>>;
  findIdsByOwner(ownerId: string): Promise<string[]>;
}
