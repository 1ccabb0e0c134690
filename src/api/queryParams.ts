import { z } from 'zod';
import { NotFoundError, ValidationError } from '../utils/errors';

/**
 * Express parses repeated keys into arrays and nested keys into objects;
 * list filters only care about a single string value.
 */
export function queryString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}

/** First non-empty value among alternative spellings of a parameter */
export function firstQueryString(...values: unknown[]): string | undefined {
  for (const value of values) {
    const parsed = queryString(value);
    if (parsed !== undefined && parsed !== '') {
      return parsed;
    }
  }
  return undefined;
}

const uuidSchema = z.string().uuid();

/**
 * Path ids that are not UUIDs cannot match any row.
 */
export function resourceId(value: string, resource: string): string {
  if (!uuidSchema.safeParse(value).success) {
    throw new NotFoundError(`${resource} not found`);
  }
  return value;
}

/** Optional UUID filter; a malformed value is a validation error */
export function uuidFilter(value: unknown, field: string): string | undefined {
  const raw = queryString(value);
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (!uuidSchema.safeParse(raw).success) {
    throw ValidationError.forField(field, `${field} must be a valid UUID.`);
  }
  return raw;
}
