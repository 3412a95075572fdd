import { z } from 'zod';

/** A batching cap: absent means unlimited. */
export const batchLimitSchema = z.number().int().positive().optional();

/**
 * Validates a caller-supplied cap before any event is formatted.
 * @throws RangeError when the cap is not a positive integer
 */
export function parseBatchLimit(name: string, value: number | undefined): number {
  const parsed = batchLimitSchema.safeParse(value);
  if (!parsed.success) {
    throw new RangeError(`${name} must be a positive integer, got ${String(value)}`);
  }
  return parsed.data ?? Number.POSITIVE_INFINITY;
}
