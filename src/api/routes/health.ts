import type { ApiContext } from '../context.js';
import { jsonResponse } from '../response.js';
import { serializeContextStatistics, serializeMetrics } from '../serializers.js';

/**
 * GET /api/health
 *
 * 200 when the database answers, 503 otherwise.
 */
export function handleHealth(ctx: ApiContext): Response {
  const now = ctx.now?.() ?? Date.now();
  const database = ctx.checkDatabase();

  return jsonResponse({
    status: database.ok ? 'healthy' : 'degraded',
    version: ctx.version,
    timestamp: new Date(now).toISOString(),
    uptime_seconds: Math.floor((now - ctx.startedAt) / 1000),
    database: {
      connected: database.ok,
      tables: database.tables,
      ...(database.error ? { error: database.error } : {}),
    },
    services: {
      classifier: ctx.services.classifier,
      reasoning: ctx.services.reasoning,
    },
    stages: {
      layer1: true,
      layer2: ctx.services.layer2Enabled,
      layer3: ctx.services.layer3Enabled,
    },
  }, database.ok ? 200 : 503);
}

/**
 * GET /api/metrics
 */
export function handleMetrics(ctx: ApiContext): Response {
  return jsonResponse(serializeMetrics(ctx.metrics.snapshot()));
}

/**
 * GET /api/rag/status
 *
 * Store-wide counts behind the user context: profiles, suspects,
 * conversations, scans, training samples and documents.
 */
export function handleContextStatus(ctx: ApiContext): Response {
  return jsonResponse({
    status: 'active',
    statistics: serializeContextStatistics(
      ctx.userContext.getStatistics(),
      ctx.scanStore.getOverallStatistics(),
      ctx.feedbackStore.count(),
      ctx.documentStore.count(),
    ),
    features: {
      document_storage: true,
      user_profiling: true,
      conversation_tracking: true,
    },
  });
}
