import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { StoreConflictError, StoreNotFoundError } from '../services/database';

export class ApiError extends Error {
  status: number;
  code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.status = status;
    this.code = code;
  }
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof ZodError) {
    const detail = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return new ApiError(400, 'VALIDATION_ERROR', detail);
  }

  // body-parser rejects malformed JSON with a SyntaxError carrying status 400
  if (error instanceof SyntaxError) {
    return new ApiError(400, 'INVALID_JSON', 'Request body is not valid JSON');
  }

  if (error instanceof StoreConflictError) {
    return new ApiError(409, 'CONFLICT', error.message);
  }

  if (error instanceof StoreNotFoundError) {
    return new ApiError(404, 'NOT_FOUND', error.message);
  }

  console.error('[API] Unhandled error:', error);
  return new ApiError(500, 'INTERNAL_ERROR', 'Internal error');
}

export function sendError(res: Response, error: unknown) {
  const apiError = toApiError(error);
  return res.status(apiError.status).json({
    error: {
      code: apiError.code,
      message: apiError.message,
    },
  });
}

/** Wraps a route so thrown errors, sync or async, become JSON error responses. */
export const handle =
  (fn: (req: Request, res: Response) => unknown): RequestHandler =>
  async (req, res) => {
    try {
      await fn(req, res);
    } catch (error: unknown) {
      sendError(res, error);
    }
  };

// Express recognises error middleware by its four parameters.
export function errorMiddleware(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  sendError(res, error);
}
