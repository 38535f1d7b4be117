import { z } from 'zod';
import { createLogger } from '../logging/logger.js';

const log = createLogger('store');

export const JsonObjectSchema = z.record(z.unknown());

/**
 * Decode a JSON text column. Columns that fail to decode or validate fall
 * back to `fallback` so a single bad row never breaks a read.
 */
export function parseJsonColumn<T>(
  text: string | null,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
): T {
  if (text === null || text === '') return fallback;

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    log.warn('Ignoring undecodable JSON column', error);
    return fallback;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Ignoring JSON column with unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    return fallback;
  }
  return parsed.data;
}
