/**
 * Path and query parameter helpers shared by the endpoint handlers.
 */

import { ValidationError } from '../errors.js';
import { validateFields } from '../middleware/validate-body.js';
import type { BodySchema } from '../types/common.js';

/** The path segment following `collection`, e.g. the id in /api/v1/agents/:id. */
export function pathId(req: Request, collection: string): string {
  const parts = new URL(req.url).pathname.split('/').filter((p) => p.length > 0);
  const index = parts.indexOf(collection);
  const id = index >= 0 ? parts[index + 1] : undefined;
  if (!id) {
    throw new ValidationError(`Missing ${collection} id in path`);
  }
  try {
    return decodeURIComponent(id);
  } catch {
    throw new ValidationError(`Malformed ${collection} id in path`);
  }
}

export function queryParams(req: Request): URLSearchParams {
  return new URL(req.url).searchParams;
}

/** Absent parameters are undefined; present ones must parse as numbers. */
export function numberParam(params: URLSearchParams, name: string): number | undefined {
  const raw = params.get(name);
  if (raw === null || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number`);
  }
  return value;
}

export function enumParam<T extends string>(
  params: URLSearchParams,
  name: string,
  allowed: readonly T[]
): T | undefined {
  const raw = params.get(name);
  if (raw === null || raw === '') return undefined;
  const match = allowed.find((v) => v === raw);
  if (match === undefined) {
    throw new ValidationError(`${name} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

export function stringParam(params: URLSearchParams, name: string): string | undefined {
  const raw = params.get(name);
  return raw === null || raw === '' ? undefined : raw;
}

/**
 * For endpoints whose body may be absent: an empty body reads as `{}`,
 * anything else must be a JSON object matching `schema`.
 */
export async function optionalBody(req: Request, schema: BodySchema): Promise<Record<string, unknown>> {
  const text = await req.text();
  if (text.trim().length === 0) return {};

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const record = Object.fromEntries(Object.entries(body));
  const errors = validateFields(record, schema);
  if (errors.length > 0) {
    throw new ValidationError(errors.join('; '), { fields: errors });
  }
  return record;
}
