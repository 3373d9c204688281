import type { Caller } from '../types/caller.js';

/**
 * Base class for errors a request can fail with. Carries the HTTP status and
 * a machine-readable code for the error middleware.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

/**
 * The voter already has a vote on this park. Votes are never edited.
 */
export class DuplicateVoteError extends AppError {
  constructor(parkId: string) {
    super(`A vote on park ${parkId} has already been cast`, 409, 'DUPLICATE_VOTE');
    this.name = 'DuplicateVoteError';
  }
}

/**
 * A vote referenced a park that does not exist.
 */
export class UnknownSubmissionError extends AppError {
  constructor(parkId: string) {
    super(`Park ${parkId} does not exist`, 404, 'UNKNOWN_SUBMISSION');
    this.name = 'UnknownSubmissionError';
  }
}

/**
 * The row is absent, or the caller is not allowed to see it. The two cases
 * are indistinguishable from outside.
 */
export class NotFoundOrHiddenError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundOrHiddenError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(caller: Caller, action: string) {
    super(
      caller.id === null ? `Authentication required to ${action}` : `Not allowed to ${action}`,
      caller.id === null ? 401 : 403,
      'UNAUTHORIZED'
    );
    this.name = 'UnauthorizedError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed', details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export const isAppError = (err: unknown): err is AppError => err instanceof AppError;
