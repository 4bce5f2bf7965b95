import { Response } from 'express';
import { ApiResponse } from '../types';

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send an error response. `code` carries a machine-readable failure code
 * (for example an extraction error code) next to the human message.
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  code?: string
): Response => {
  const response: ApiResponse = {
    success: false,
    error,
    ...(code !== undefined && { code }),
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};
