import { z } from 'zod';
import type { StorageResource } from '../../errors/storage-error.js';
import { StorageError } from '../../errors/storage-error.js';

export const stringListColumn = z.array(z.string());
export const formColumn = z.record(z.array(z.string()));

/**
 * Parse a JSON text column, failing with `malformed` on corrupt data
 */
export function parseJsonColumn<T>(
  schema: z.ZodType<T>,
  value: string,
  column: string,
  resource: StorageResource
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw StorageError.malformed(`Column ${column} does not hold valid JSON`, { resource, cause: err });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw StorageError.malformed(`Column ${column} has an unexpected shape`, { resource, cause: result.error });
  }
  return result.data;
}
