import { ValidationError } from '../errors.js';
import type { Pagination } from '../types/api.js';
import type { PaginationOptions } from '../types/common.js';

export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;

export function resolvePagination(input: Pagination): PaginationOptions {
  const limit = input.limit ?? DEFAULT_LIMIT;
  const offset = input.offset ?? 0;

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIMIT}`);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError('offset must be a non-negative integer');
  }
  return { limit, offset };
}
