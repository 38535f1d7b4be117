import type { z } from 'zod';

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export type ParsedBody<T> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

/**
 * Read and validate a JSON request body. Failures come back as a ready
 * 400 response carrying `{error, details}`.
 */
export async function parseJsonBody<T>(
  request: Request,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<ParsedBody<T>> {
  let raw: unknown;
  try {
    raw = await request.json();
  } catch {
    return { ok: false, response: jsonResponse({ error: 'Invalid JSON body', details: [] }, 400) };
  }
  return validate(raw, schema);
}

export function validate<T>(
  raw: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ParsedBody<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
    return { ok: false, response: jsonResponse({ error: 'Invalid request', details }, 400) };
  }
  return { ok: true, data: result.data };
}
