// API layer: Request validation
// One zod schema per request body; failures become field errors

import { z } from 'zod';
import { DEFAULT_PAGE_SIZE, type PageRequest } from '@/domain/common/pagination.js';
import type { BookRequest } from '@/domain/book/types.js';
import type {
  AuthenticationRequest,
  ChangePasswordRequest,
  RegistrationRequest,
} from '@/domain/user/types.js';
import { ValidationError, type FieldError } from '@/utils/errors.js';

export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PAGE_SIZE = 100;

function mandatory(label: string) {
  const message = `${label} is mandatory`;
  return z.string({ required_error: message, invalid_type_error: message }).trim().min(1, message);
}

const email = mandatory('Email').email('Email is not well formatted');

const password = z
  .string({ required_error: 'Password is mandatory', invalid_type_error: 'Password is mandatory' })
  .min(1, 'Password is mandatory')
  .min(MIN_PASSWORD_LENGTH, `Password should be ${MIN_PASSWORD_LENGTH} characters long minimum`);

export const RegistrationRequestSchema = z.object({
  firstname: mandatory('Firstname'),
  lastname: mandatory('Lastname'),
  email,
  password,
}) satisfies z.ZodType<RegistrationRequest>;

export const AuthenticationRequestSchema = z.object({
  email,
  password,
}) satisfies z.ZodType<AuthenticationRequest>;

export const BookRequestSchema = z.object({
  title: mandatory('Title'),
  authorName: mandatory('Author name'),
  isbn: mandatory('ISBN'),
  synopsis: mandatory('Synopsis'),
  shareable: z.boolean({ invalid_type_error: 'Shareable must be true or false' }).default(false),
}) satisfies z.ZodType<BookRequest, z.ZodTypeDef, unknown>;

export const ChangePasswordRequestSchema = z.object({
  currentPassword: mandatory('Current password'),
  newPassword: password,
  confirmationPassword: mandatory('Confirmation password'),
}) satisfies z.ZodType<ChangePasswordRequest>;

export const PageRequestSchema = z.object({
  page: z.coerce
    .number({ invalid_type_error: 'Page must be a number' })
    .int('Page must be an integer')
    .min(0, 'Page must not be negative')
    .default(0),
  size: z.coerce
    .number({ invalid_type_error: 'Size must be a number' })
    .int('Size must be an integer')
    .min(1, 'Size must be at least 1')
    .max(MAX_PAGE_SIZE, `Size must be at most ${MAX_PAGE_SIZE}`)
    .default(DEFAULT_PAGE_SIZE),
}) satisfies z.ZodType<PageRequest, z.ZodTypeDef, unknown>;

/**
 * First issue per field, in schema order
 */
export function toFieldErrors(error: z.ZodError): FieldError[] {
  const byField = new Map<string, string>();
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    if (!byField.has(field)) {
      byField.set(field, issue.message);
    }
  }
  return [...byField].map(([field, message]) => ({ field, message }));
}

/**
 * Parse input against a schema, throwing ValidationError with every field error
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
}
