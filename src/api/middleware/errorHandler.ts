// API layer: Global error handler middleware
// Maps typed errors to the JSON error envelope

import type { Request, Response, NextFunction } from 'express';
import {
  ActivationError,
  AuthError,
  ConflictError,
  EmailDeliveryError,
  EntityNotFoundError,
  OperationNotPermittedError,
  UnauthenticatedError,
  ValidationError,
} from '@/utils/errors.js';
import { appLogger, errorMessage } from '@/utils/logger.js';

/**
 * Error body returned by every failing endpoint. Empty fields are omitted.
 */
export interface ExceptionResponse {
  businessErrorCode?: number;
  businessErrorDescription?: string;
  error?: string;
  validationErrors?: string[];
  errors?: Record<string, string>;
}

const INTERNAL_ERROR_DESCRIPTION = 'Internal error, please contact the admin';

// Errors whose message is safe to return as-is
type MessageError =
  | UnauthenticatedError
  | ActivationError
  | EntityNotFoundError
  | OperationNotPermittedError
  | ConflictError
  | EmailDeliveryError;

function isMessageError(err: unknown): err is MessageError {
  return (
    err instanceof UnauthenticatedError ||
    err instanceof ActivationError ||
    err instanceof EntityNotFoundError ||
    err instanceof OperationNotPermittedError ||
    err instanceof ConflictError ||
    err instanceof EmailDeliveryError
  );
}

// body-parser failures carry `type` and `status`
function bodyParserStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  if (!('type' in err) || !('status' in err)) return null;
  const { type, status } = err;
  if (typeof type !== 'string' || !type.startsWith('entity.')) return null;
  return typeof status === 'number' ? status : 400;
}

export function toExceptionResponse(err: unknown): { status: number; body: ExceptionResponse } {
  if (err instanceof ValidationError) {
    const errors: Record<string, string> = {};
    for (const fieldError of err.fieldErrors) {
      errors[fieldError.field] = fieldError.message;
    }
    return {
      status: err.statusCode,
      body: {
        validationErrors: [...new Set(err.fieldErrors.map((e) => e.message))],
        errors,
      },
    };
  }

  if (err instanceof AuthError) {
    return {
      status: err.statusCode,
      body: {
        businessErrorCode: err.businessCode,
        businessErrorDescription: err.businessDescription,
        error: err.message,
      },
    };
  }

  if (isMessageError(err)) {
    return { status: err.statusCode, body: { error: err.message } };
  }

  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== null) {
    return {
      status: parserStatus,
      body: { error: parserStatus === 413 ? 'Request body too large' : 'Malformed request body' },
    };
  }

  return {
    status: 500,
    body: {
      businessErrorDescription: INTERNAL_ERROR_DESCRIPTION,
      error: 'Unexpected error',
    },
  };
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { status, body } = toExceptionResponse(err);

  if (status >= 500) {
    appLogger.error('Request failed', {
      method: req.method,
      path: req.originalUrl,
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  }

  res.status(status).json(body);
}

export function notFoundHandler(_req: Request, res: Response): void {
  const body: ExceptionResponse = { error: 'Resource not found' };
  res.status(404).json(body);
}

// Async handler wrapper to avoid try-catch in every route
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
