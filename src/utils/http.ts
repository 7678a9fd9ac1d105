import { Response } from 'express';
import { isAppError } from '../errors';
import { ApiResponse } from '../types';

export function sendSuccess<T>(res: Response, data: T, status = 200, message?: string): void {
  const response: ApiResponse<T> = { success: true, data };
  if (message) response.message = message;
  res.status(status).json(response);
}

/**
 * Map a thrown error onto the response envelope. Application errors carry
 * their own status and kind; anything else is logged and reported as 500.
 */
export function sendError(res: Response, error: unknown, context: string): void {
  if (isAppError(error)) {
    if (error.status >= 500) {
      console.error(`Error ${context}:`, error);
    }
    const response: ApiResponse = { success: false, error: error.message, kind: error.kind };
    res.status(error.status).json(response);
    return;
  }

  console.error(`Error ${context}:`, error);
  const response: ApiResponse = {
    success: false,
    error: 'Internal server error',
    kind: 'internal_error',
  };
  res.status(500).json(response);
}
