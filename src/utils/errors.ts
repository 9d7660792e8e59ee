// This module provides the typed application error and the fixed error values shared by calls and dispatch.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This error reports call arguments that could not be decoded into the requested shape.
export class DecodeError extends Error {
  public readonly issues?: unknown;

  public constructor(message: string, issues?: unknown) {
    super(message);
    this.name = 'DecodeError';
    this.issues = issues;
  }
}

// This error reports direct-call arguments whose stored value does not fit the destination type.
export class NotAssignableError extends DecodeError {
  public constructor(message: string, issues?: unknown) {
    super(message, issues);
    this.name = 'NotAssignableError';
  }
}

// Returned by ServeMux when no handler is registered for the called method.
export const ErrMethodNotFound: Error = new Error('method not found');

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

// This helper turns any thrown value into an Error while keeping real Error instances intact.
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(typeof value === 'string' ? value : 'An unexpected error occurred.');
}
