import {
  AppError,
  BadRequestError,
  InternalError,
  ServiceUnavailableError,
} from '../errors.js';

export const CONFIGURATION_MESSAGE = 'AI service configuration error. Please contact administrator.';
export const BUSY_MESSAGE = 'AI service is busy. Please try again in a few moments.';
export const TIMEOUT_MESSAGE = 'AI request timed out. Please try with a simpler request.';

/**
 * Map a failed model call onto the error taxonomy by inspecting its text.
 * Checks run in order: credentials, rate limiting, timeout, anything else.
 * Errors that are already classified pass through unchanged.
 */
export function classifyGenerationError(error: unknown, operation: string): AppError {
  if (error instanceof AppError) return error;

  const text = (error instanceof Error ? error.message : String(error)).toLowerCase();

  if (
    (text.includes('api') && text.includes('key')) ||
    text.includes('credential') ||
    text.includes('unauthenticated') ||
    text.includes('permission denied')
  ) {
    return new ServiceUnavailableError(CONFIGURATION_MESSAGE);
  }

  if (
    text.includes('rate') ||
    text.includes('limit') ||
    text.includes('quota') ||
    text.includes('resource_exhausted') ||
    text.includes('429')
  ) {
    return new ServiceUnavailableError(BUSY_MESSAGE, true);
  }

  if (text.includes('timeout') || text.includes('timed out') || text.includes('deadline')) {
    return new BadRequestError(TIMEOUT_MESSAGE);
  }

  return new InternalError(`Failed to generate ${operation}. Please try again later.`);
}
