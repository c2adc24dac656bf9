/**
 * Service Results and Errors
 * Services return a Result instead of throwing; the HTTP layer maps error kinds to status codes
 */

import type { ZodError } from 'zod';

// ============================================
// Result
// ============================================

export type Result<T, E = ServiceError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================
// Service Errors
// ============================================

export type ServiceErrorKind = 'validation' | 'unauthorized' | 'backend';

export abstract class ServiceError extends Error {
  abstract readonly kind: ServiceErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Request payload or query failed schema validation
 */
export class ValidationError extends ServiceError {
  readonly kind = 'validation';

  constructor(readonly issues: ValidationIssue[], message = 'Validation failed') {
    super(message);
  }

  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(
      error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
}

export class UnauthorizedError extends ServiceError {
  readonly kind = 'unauthorized';

  constructor(message = 'Invalid credentials') {
    super(message);
  }
}

/**
 * Persistence failure. Keeps the underlying error's message so it can be reported as-is.
 */
export class BackendError extends ServiceError {
  readonly kind = 'backend';

  static from(cause: unknown): BackendError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new BackendError(message, { cause });
  }
}

export function statusForError(error: ServiceError): number {
  switch (error.kind) {
    case 'validation':
      return 422;
    case 'unauthorized':
      return 401;
    case 'backend':
      return 500;
  }
}
