import type { PhishScopeError } from '../errors.js';

export type StageId = 'layer1' | 'layer2' | 'layer3';

export type StageStatus = 'clean' | 'threat' | 'suspicious' | 'safe' | 'error';

export type FinalVerdict = 'safe' | 'suspicious' | 'threat' | 'error';

export type ThreatLevel = 'low' | 'medium' | 'high' | 'unknown';

export type ImpersonationRisk = 'low' | 'medium' | 'high';

export type ClassifierLabel = 'benign' | 'suspicious';

export type PersonalRelevance = 'low' | 'medium' | 'high';

interface StageResultBase {
  stage: StageId;
  status: StageStatus;
  /** 0.0 - 1.0 */
  confidence: number;
  indicators: string[];
  /** Seconds. */
  processingTime: number;
}

/** Stage 1: deterministic rule checks. */
export interface RuleStageResult extends StageResultBase {
  stage: 'layer1';
  status: 'clean' | 'threat';
  cached: boolean;
  checksPerformed: string[];
}

/** Stage 2: statistical classifier. */
export interface ClassifierStageResult extends StageResultBase {
  stage: 'layer2';
  status: 'safe' | 'suspicious';
  label: ClassifierLabel;
  /** Label exactly as the classifier returned it. */
  rawLabel: string;
  manualOverride: boolean;
}

/** Stage 3: contextual detective. */
export interface DetectiveStageResult extends StageResultBase {
  stage: 'layer3';
  status: 'threat' | 'suspicious' | 'safe';
  threatLevel: Exclude<ThreatLevel, 'unknown'>;
  /** 0 - 100 */
  socialEngineeringScore: number;
  tactics: string[];
  impersonationRisk: ImpersonationRisk;
  totalScore: number;
  detailedAnalysis: string;
  personalRelevance: PersonalRelevance;
  recommendedAction: string;
}

/** A stage that could not produce a verdict. */
export interface FailedStageResult extends StageResultBase {
  status: 'error';
  error: string;
}

export type StageResult =
  | RuleStageResult
  | ClassifierStageResult
  | DetectiveStageResult
  | FailedStageResult;

/** Explicit success/failure value returned by stages that call external services. */
export type StageOutcome<T> =
  | { ok: true; result: T }
  | { ok: false; error: PhishScopeError };

export interface StageLayers {
  layer1?: RuleStageResult;
  layer2?: ClassifierStageResult | FailedStageResult;
  layer3?: DetectiveStageResult;
}

/** Results of the stages that ran before Stage 3. */
export interface PriorStages {
  layer1: RuleStageResult;
  layer2?: ClassifierStageResult | FailedStageResult;
}

export interface ScanRecord {
  scanId: string;
  userId: string;
  scanType: string;
  email: {
    sender: string;
    subject: string;
    date: string;
  };
  layers: StageLayers;
  finalVerdict: FinalVerdict;
  threatLevel: ThreatLevel;
  confidence: number;
  /** Seconds. */
  processingTime: number;
  /** ISO 8601. */
  timestamp: string;
  error?: string;
}

export function failedStage(stage: StageId, error: unknown, processingTime = 0): FailedStageResult {
  return {
    stage,
    status: 'error',
    confidence: 0,
    indicators: [],
    processingTime,
    error: error instanceof Error ? error.message : String(error),
  };
}

/** Stage results that were produced, in pipeline order. */
export function completedStages(layers: StageLayers): StageResult[] {
  const results: StageResult[] = [];
  if (layers.layer1) results.push(layers.layer1);
  if (layers.layer2) results.push(layers.layer2);
  if (layers.layer3) results.push(layers.layer3);
  return results;
}
