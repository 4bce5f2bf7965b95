import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { AppError, logger } from '../utils';
import { isExtractionError } from '../extraction';
import { env } from '../config';

const MULTER_STATUS: Partial<Record<MulterError['code'], number>> = {
  LIMIT_FILE_SIZE: 413,
  LIMIT_FILE_COUNT: 413,
};

// Client errors raised by body parsing (malformed JSON, payload too large)
const isClientHttpError = (err: Error): err is Error & { status: number } =>
  'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;
  let code: string | undefined;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    isOperational = err.isOperational;
    if (isExtractionError(err)) {
      code = err.code;
    }
  } else if (err instanceof MulterError) {
    statusCode = MULTER_STATUS[err.code] ?? 400;
    message = `Upload rejected: ${err.message}`;
    isOperational = true;
    code = err.code;
  } else if (err instanceof ZodError) {
    statusCode = 400;
    const issues = err.errors.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    message = `Validation failed: ${issues.join('; ')}`;
    isOperational = true;
  } else if (isClientHttpError(err)) {
    statusCode = err.status;
    message = err.message;
    isOperational = true;
  }

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  // Send response
  res.status(statusCode).json({
    success: false,
    error: message,
    ...(code !== undefined && { code }),
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
