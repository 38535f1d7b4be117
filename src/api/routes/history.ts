import type { ApiContext } from '../context.js';
import { jsonResponse, validate } from '../response.js';
import { HistoryQuerySchema } from '../schemas.js';
import { serializeStoredScan } from '../serializers.js';

/**
 * GET /api/scan-history/{id}?limit=&offset=
 *
 * Newest first. `limit` defaults to 50 and is capped at 200.
 */
export function handleScanHistory(userId: string, searchParams: URLSearchParams, ctx: ApiContext): Response {
  const query = validate(Object.fromEntries(searchParams), HistoryQuerySchema);
  if (!query.ok) return query.response;

  const { limit, offset } = query.data;
  const { scans, total } = ctx.scanStore.getHistory(userId, limit, offset);

  return jsonResponse({
    user_id: userId,
    scans: scans.map(serializeStoredScan),
    total,
    limit,
    offset,
  });
}
