/**
 * Error handler middleware.
 * AppError subclasses keep their status code and details; anything else is a
 * 500 with a fixed message.
 */

import { AppError } from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';
import { jsonResponse } from './json.js';

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };
        return jsonResponse(body, err.statusCode);
      }

      // Unknown error: don't leak internals
      ctx.internalError = err;
      const body: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        },
      };
      return jsonResponse(body, 500);
    }
  };
}
