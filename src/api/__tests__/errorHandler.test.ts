import { describe, it, expect } from 'vitest';
import { toExceptionResponse } from '../middleware/errorHandler.js';
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

describe('toExceptionResponse', () => {
  it('collects validation messages and a field map', () => {
    const error = new ValidationError([
      { field: 'email', message: 'Email is mandatory' },
      { field: 'password', message: 'Password is mandatory' },
    ]);

    expect(toExceptionResponse(error)).toEqual({
      status: 400,
      body: {
        validationErrors: ['Email is mandatory', 'Password is mandatory'],
        errors: { email: 'Email is mandatory', password: 'Password is mandatory' },
      },
    });
  });

  it('returns business codes for credential errors', () => {
    expect(toExceptionResponse(new AuthError('BAD_CREDENTIALS'))).toEqual({
      status: 403,
      body: {
        businessErrorCode: 304,
        businessErrorDescription: 'Login and / or Password is incorrect',
        error: 'Login and / or Password is incorrect',
      },
    });

    expect(toExceptionResponse(new AuthError('ACCOUNT_DISABLED', 'User is disabled'))).toEqual({
      status: 403,
      body: {
        businessErrorCode: 303,
        businessErrorDescription: 'User account is disabled',
        error: 'User is disabled',
      },
    });

    expect(toExceptionResponse(new AuthError('NEW_PASSWORD_DOES_NOT_MATCH')).status).toBe(400);
  });

  it('maps typed errors to their status with the message', () => {
    const cases: Array<[Error, number]> = [
      [new UnauthenticatedError(), 401],
      [new ActivationError('Invalid token'), 400],
      [new EntityNotFoundError('No book found with ID:: 42'), 404],
      [new OperationNotPermittedError('You cannot borrow your own book'), 400],
      [new ConflictError('An account with this email already exists'), 409],
      [new EmailDeliveryError('Activation email could not be sent'), 500],
    ];

    for (const [error, status] of cases) {
      expect(toExceptionResponse(error)).toEqual({ status, body: { error: error.message } });
    }
  });

  it('reports malformed bodies as client errors', () => {
    const parseFailure = Object.assign(new SyntaxError('Unexpected token'), {
      type: 'entity.parse.failed',
      status: 400,
    });
    expect(toExceptionResponse(parseFailure)).toEqual({
      status: 400,
      body: { error: 'Malformed request body' },
    });

    const tooLarge = Object.assign(new Error('request entity too large'), {
      type: 'entity.too.large',
      status: 413,
    });
    expect(toExceptionResponse(tooLarge).status).toBe(413);
  });

  it('hides unexpected errors behind a generic message', () => {
    expect(toExceptionResponse(new Error('database exploded'))).toEqual({
      status: 500,
      body: {
        businessErrorDescription: 'Internal error, please contact the admin',
        error: 'Unexpected error',
      },
    });
  });
});
