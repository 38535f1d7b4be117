import type { ApiContext } from '../context.js';
import { jsonResponse, parseJsonBody } from '../response.js';
import { FeedbackRequestSchema } from '../schemas.js';

/**
 * POST /api/feedback
 *
 * Store a user-labeled email as a training sample.
 */
export async function handleFeedback(request: Request, ctx: ApiContext): Promise<Response> {
  const parsed = await parseJsonBody(request, FeedbackRequestSchema);
  if (!parsed.ok) return parsed.response;

  const body = parsed.data;
  const sample = ctx.feedbackStore.addTrainingSample({
    emailContent: body.email_content,
    emailSubject: body.email_subject,
    emailSender: body.email_sender,
    trueLabel: body.correct_label,
    userFeedback: body.user_feedback,
    confidenceScore: body.confidence_score,
  });

  return jsonResponse({ success: true, sample_id: sample.id, created_at: sample.createdAt });
}
