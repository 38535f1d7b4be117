import type { ApiContext } from '../context.js';
import { jsonResponse, parseJsonBody } from '../response.js';
import { ScanRequestSchema } from '../schemas.js';
import { serializeStoredScan } from '../serializers.js';
import { serializeScan } from '../../pipeline/serialize.js';

/**
 * POST /api/scan
 *
 * Run an email through the escalation pipeline. Invalid bodies are rejected
 * before any scan record exists.
 */
export async function handleScan(request: Request, ctx: ApiContext): Promise<Response> {
  const parsed = await parseJsonBody(request, ScanRequestSchema);
  if (!parsed.ok) return parsed.response;

  const { email_data: emailData, user_id: userId, scan_type: scanType } = parsed.data;
  const email = ctx.normalizer.normalize(emailData);

  const record = await ctx.orchestrator.scan({ email, userId, scanType });
  return jsonResponse(serializeScan(record));
}

/**
 * GET /api/scan/{scan_id}
 */
export function handleGetScan(scanId: string, ctx: ApiContext): Response {
  const scan = ctx.scanStore.get(scanId);
  if (!scan) return jsonResponse({ error: 'Scan not found' }, 404);
  return jsonResponse(serializeStoredScan(scan));
}
