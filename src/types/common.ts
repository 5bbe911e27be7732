/**
 * Request body schemas used by the validateBody middleware.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings only. */
  maxLength?: number;
  /** Strings only: rejects empty or whitespace-only values. */
  nonEmpty?: boolean;
  /** Strings only. */
  enum?: readonly string[];
  /** Numbers only. */
  min?: number;
  max?: number;
  /** Numbers only. */
  integer?: boolean;
  /** Arrays only: every element must be a string. */
  stringItems?: boolean;
}

export type BodySchema = Record<string, FieldSchema>;

export interface PaginationOptions {
  limit: number;
  offset: number;
}
