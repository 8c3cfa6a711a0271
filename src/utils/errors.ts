// Utilities: Custom error types

/**
 * Stable business error codes returned alongside the HTTP status
 */
export const BusinessErrorCodes = {
  NO_CODE: { code: 0, statusCode: 501, description: 'No code' },
  INCORRECT_CURRENT_PASSWORD: { code: 300, statusCode: 400, description: 'Current password is incorrect' },
  NEW_PASSWORD_DOES_NOT_MATCH: { code: 301, statusCode: 400, description: 'The new password does not match' },
  ACCOUNT_LOCKED: { code: 302, statusCode: 403, description: 'User account is locked' },
  ACCOUNT_DISABLED: { code: 303, statusCode: 403, description: 'User account is disabled' },
  BAD_CREDENTIALS: { code: 304, statusCode: 403, description: 'Login and / or Password is incorrect' },
} as const;

export type BusinessErrorCode = keyof typeof BusinessErrorCodes;

export interface FieldError {
  field: string;
  message: string;
}

export class ValidationError extends Error {
  statusCode = 400;
  code = 'VALIDATION_ERROR';
  readonly fieldErrors: FieldError[];

  constructor(fieldErrors: FieldError[]) {
    super('Validation failed');
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Authentication and credential errors, each carrying a business error code
 */
export class AuthError extends Error {
  readonly statusCode: number;
  readonly businessCode: number;
  readonly businessDescription: string;

  constructor(
    public readonly code: BusinessErrorCode,
    message?: string
  ) {
    const entry = BusinessErrorCodes[code];
    super(message ?? entry.description);
    this.name = 'AuthError';
    this.statusCode = entry.statusCode;
    this.businessCode = entry.code;
    this.businessDescription = entry.description;
  }
}

export class UnauthenticatedError extends Error {
  statusCode = 401;
  code = 'AUTH_REQUIRED';

  constructor(message = 'Authentication required') {
    super(message);
    this.name = 'UnauthenticatedError';
  }
}

// Invalid, reused or expired activation code
export class ActivationError extends Error {
  statusCode = 400;
  code = 'ACTIVATION_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'ActivationError';
  }
}

export class EntityNotFoundError extends Error {
  statusCode = 404;
  code = 'NOT_FOUND';

  constructor(message: string) {
    super(message);
    this.name = 'EntityNotFoundError';
  }
}

export class OperationNotPermittedError extends Error {
  statusCode = 400;
  code = 'OPERATION_NOT_PERMITTED';

  constructor(message: string) {
    super(message);
    this.name = 'OperationNotPermittedError';
  }
}

export class ConflictError extends Error {
  statusCode = 409;
  code = 'CONFLICT';

  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

export class EmailDeliveryError extends Error {
  statusCode = 500;
  code = 'EMAIL_DELIVERY_FAILED';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EmailDeliveryError';
    this.details = details;
  }
}
