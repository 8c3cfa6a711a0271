// API layer: Book routes
// Catalog, lending workflow and cover uploads; every route needs an identity

import express, { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { currentUser } from '@/api/middleware/AuthModule.js';
import { BookRequestSchema, PageRequestSchema, parseOrThrow } from '@/api/validation.js';
import type { BookService } from '@/application/book/BookService.js';
import type { LendingService } from '@/application/lending/LendingService.js';
import { MAX_COVER_SIZE } from '@/application/file/FileStorageService.js';
import { ValidationError } from '@/utils/errors.js';

function mimeTypeOf(req: Request): string {
  return (req.headers['content-type'] ?? '').split(';')[0].trim().toLowerCase();
}

export function createBookRouter(bookService: BookService, lendingService: LendingService): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const request = parseOrThrow(BookRequestSchema, req.body);
      res.json(await bookService.save(request, currentUser(req)));
    })
  );

  /**
   * GET /books?page=0&size=10
   * Books other users are lending out
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const page = parseOrThrow(PageRequestSchema, req.query);
      res.json(await bookService.findAllBooks(page, currentUser(req)));
    })
  );

  router.get(
    '/owner',
    asyncHandler(async (req: Request, res: Response) => {
      const page = parseOrThrow(PageRequestSchema, req.query);
      res.json(await bookService.findAllBooksByOwner(page, currentUser(req)));
    })
  );

  router.get(
    '/borrowed',
    asyncHandler(async (req: Request, res: Response) => {
      const page = parseOrThrow(PageRequestSchema, req.query);
      res.json(await lendingService.findAllBorrowedBooks(page, currentUser(req)));
    })
  );

  router.get(
    '/returned',
    asyncHandler(async (req: Request, res: Response) => {
      const page = parseOrThrow(PageRequestSchema, req.query);
      res.json(await lendingService.findAllReturnedBooks(page, currentUser(req)));
    })
  );

  router.get(
    '/:bookId',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await bookService.findById(req.params.bookId));
    })
  );

  router.patch(
    '/shareable/:bookId',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await bookService.updateShareableStatus(req.params.bookId, currentUser(req)));
    })
  );

  router.patch(
    '/archived/:bookId',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await bookService.updateArchivedStatus(req.params.bookId, currentUser(req)));
    })
  );

  // ==================== Lending ====================

  router.post(
    '/borrow/:bookId',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await lendingService.borrowBook(req.params.bookId, currentUser(req)));
    })
  );

  router.patch(
    '/borrow/return/:bookId',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await lendingService.returnBorrowedBook(req.params.bookId, currentUser(req)));
    })
  );

  router.patch(
    '/borrow/return/approve/:bookId',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await lendingService.approveReturnBorrowedBook(req.params.bookId, currentUser(req)));
    })
  );

  /**
   * POST /books/cover/:bookId
   * Raw image body, e.g. Content-Type: image/png
   */
  router.post(
    '/cover/:bookId',
    express.raw({ type: 'image/*', limit: MAX_COVER_SIZE }),
    asyncHandler(async (req: Request, res: Response) => {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        throw new ValidationError([{ field: 'file', message: 'An image body is required' }]);
      }

      await bookService.uploadBookCoverPicture(
        req.params.bookId,
        { bytes: body, mimeType: mimeTypeOf(req) },
        currentUser(req)
      );
      res.status(202).end();
    })
  );

  return router;
}
