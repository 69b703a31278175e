export type ErrorCategory =
  | 'unauthorized'
  | 'bad_request'
  | 'service_unavailable'
  | 'internal';

/**
 * Base class for every failure the API reports to a caller.
 * The message is always safe to show to an end user.
 */
export abstract class AppError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends AppError {
  readonly category = 'unauthorized' as const;
  readonly statusCode = 403;

  constructor(message = 'You must be a member of the household') {
    super(message);
  }
}

export class BadRequestError extends AppError {
  readonly category = 'bad_request' as const;
  readonly statusCode = 400;
}

/**
 * A single field failed to parse, either in a request body or in a model reply.
 */
export class FieldValidationError extends BadRequestError {
  constructor(readonly field: string, detail: string) {
    super(`Invalid value for '${field}': ${detail}`);
  }
}

export class ServiceUnavailableError extends AppError {
  readonly category = 'service_unavailable' as const;
  readonly statusCode = 503;

  constructor(message: string, readonly retryable = false) {
    super(message);
  }
}

export class InternalError extends AppError {
  readonly category = 'internal' as const;
  readonly statusCode = 500;

  constructor(message = 'An internal server error occurred.') {
    super(message);
  }
}

/**
 * Raised by a store when (householdId, lower(name)) already exists.
 * Callers re-resolve by lookup instead of failing.
 */
export class DuplicateEntityError extends Error {
  constructor(readonly householdId: number, readonly entityName: string) {
    super(`Ingredient '${entityName}' already exists in household ${householdId}`);
    this.name = 'DuplicateEntityError';
  }
}
