import type { ErrorRequestHandler } from 'express';
import { AppError, BadRequestError, InternalError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('HTTP');

export interface ErrorBody {
  success: false;
  error: {
    category: AppError['category'];
    message: string;
  };
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  // express.json() rejects malformed bodies with a SyntaxError
  if (error instanceof SyntaxError) return new BadRequestError('Request body is not valid JSON');
  return new InternalError();
}

export function errorBody(error: AppError): ErrorBody {
  return { success: false, error: { category: error.category, message: error.message } };
}

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const appError = toAppError(err);

  if (appError instanceof InternalError) {
    log.error(`${req.method} ${req.path} failed`, {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    log.warn(`${req.method} ${req.path} -> ${appError.statusCode}`, { category: appError.category });
  }

  res.status(appError.statusCode).json(errorBody(appError));
};
