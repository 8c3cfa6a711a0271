// Domain: Book types

export interface Book {
  id: string;
  title: string;
  authorName: string;
  isbn: string;
  synopsis: string;
  ownerId: string;
  shareable: boolean;
  archived: boolean;
  bookCover: string | null;      // Path of the stored cover image
  createdAt: Date;
  createdBy: string;
  lastModifiedAt: Date | null;
  lastModifiedBy: string | null;
}

export interface BookRequest {
  title: string;
  authorName: string;
  isbn: string;
  synopsis: string;
  shareable: boolean;
}

export interface BookResponse {
  id: string;
  title: string;
  authorName: string;
  isbn: string;
  synopsis: string;
  owner: string;                 // Owner's full name
  cover: string | null;          // Base64 image bytes
  archived: boolean;
  shareable: boolean;
}

export interface BorrowedBookResponse {
  id: string;                    // Book id
  transactionId: string;
  title: string;
  authorName: string;
  isbn: string;
  returned: boolean;
  returnApproved: boolean;
}
