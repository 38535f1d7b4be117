import type { ScanRecord, StageLayers, StageResult } from './types.js';

type Json = Record<string, unknown>;

/** Wire form of a single stage result (snake_case). */
export function serializeStage(result: StageResult): Json {
  const base: Json = {
    status: result.status,
    confidence: result.confidence,
    indicators: result.indicators,
    processing_time: result.processingTime,
  };

  if (result.status === 'error') {
    return { ...base, error: result.error };
  }

  switch (result.stage) {
    case 'layer1':
      return { ...base, cached: result.cached, checks_performed: result.checksPerformed };
    case 'layer2':
      return {
        ...base,
        label: result.label,
        raw_label: result.rawLabel,
        manual_override: result.manualOverride,
      };
    case 'layer3':
      return {
        ...base,
        threat_level: result.threatLevel,
        social_engineering_score: result.socialEngineeringScore,
        tactics: result.tactics,
        impersonation_risk: result.impersonationRisk,
        total_score: result.totalScore,
        detailed_analysis: result.detailedAnalysis,
        personal_relevance: result.personalRelevance,
        recommended_action: result.recommendedAction,
      };
  }
}

export function serializeLayers(layers: StageLayers): Json {
  const out: Json = {};
  if (layers.layer1) out.layer1 = serializeStage(layers.layer1);
  if (layers.layer2) out.layer2 = serializeStage(layers.layer2);
  if (layers.layer3) out.layer3 = serializeStage(layers.layer3);
  return out;
}

/** Wire form of a scan record as returned by the scan endpoint. */
export function serializeScan(record: ScanRecord): Json {
  const out: Json = {
    scan_id: record.scanId,
    timestamp: record.timestamp,
    user_id: record.userId,
    scan_type: record.scanType,
    email: record.email,
    layers: serializeLayers(record.layers),
    final_verdict: record.finalVerdict,
    threat_level: record.threatLevel,
    confidence_score: record.confidence,
    processing_time: record.processingTime,
  };
  if (record.error !== undefined) out.error = record.error;
  return out;
}
