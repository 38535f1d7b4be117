import type { ApiContext } from '../context.js';
import { jsonResponse, parseJsonBody } from '../response.js';
import { SuspectRequestSchema } from '../schemas.js';
import { serializeSuspect } from '../serializers.js';

/**
 * POST /api/suspect
 *
 * Report a suspect sender. Repeat reports increment its frequency count.
 */
export async function handleSuspect(request: Request, ctx: ApiContext): Promise<Response> {
  const parsed = await parseJsonBody(request, SuspectRequestSchema);
  if (!parsed.ok) return parsed.response;

  const { suspect_info: info, email_metadata: metadata } = parsed.data;
  const suspect = ctx.userContext.recordSuspect({
    sender: info.sender,
    senderName: info.sender_name,
    tacticsUsed: info.tactics_used,
    threatLevel: info.threat_level,
    socialEngineeringScore: info.social_engineering_score,
    emailMetadata: metadata,
  });

  return jsonResponse({ success: true, suspect: serializeSuspect(suspect) });
}

/**
 * GET /api/suspect/{sender}
 */
export function handleGetSuspect(sender: string, ctx: ApiContext): Response {
  const suspect = ctx.userContext.getSuspect(sender);
  if (!suspect) return jsonResponse({ error: 'Suspect not found' }, 404);
  return jsonResponse({ suspect: serializeSuspect(suspect) });
}
