import * as crypto from 'node:crypto';
import { ClassifierUnavailableError } from '../errors.js';
import { createLogger, errorMessage } from '../logging/logger.js';
import type { NormalizedEmail } from '../email/types.js';
import type { ScanStore } from '../store/scan-store.js';
import type { SessionStore } from '../store/session-store.js';
import type { UserContextStore } from '../store/user-context-store.js';
import type { AuditLogger } from '../reporting/audit-logger.js';
import type { ScanMetrics } from '../reporting/metrics.js';
import type { RuleEngine } from './stages/rule-engine.js';
import { isConfidentlySafe, type ClassifierStage } from './stages/classifier-stage.js';
import type { ContextualDetective } from './stages/detective.js';
import {
  failedStage,
  type FinalVerdict,
  type ScanRecord,
  type StageLayers,
  type ThreatLevel,
} from './types.js';

const log = createLogger('orchestrator');

/** Confidence reported when Stage 3 is disabled and Stage 2 produced nothing usable. */
const UNRESOLVED_CONFIDENCE = 0.5;

export interface ScanRequest {
  email: NormalizedEmail;
  userId: string;
  scanType: string;
}

export interface StageSwitches {
  layer2Enabled: boolean;
  layer3Enabled: boolean;
}

export interface OrchestratorDependencies {
  ruleEngine: RuleEngine;
  classifierStage: ClassifierStage;
  detective: ContextualDetective;
  scanStore: ScanStore;
  userContext: UserContextStore;
  sessions: SessionStore;
  auditLogger?: AuditLogger;
  metrics?: ScanMetrics;
  stages?: Partial<StageSwitches>;
  now?: () => Date;
}

interface Outcome {
  finalVerdict: FinalVerdict;
  threatLevel: ThreatLevel;
  confidence: number;
  error?: string;
}

/**
 * Runs the escalation pipeline:
 *   Stage 1 rules → Stage 2 classifier → Stage 3 detective → Finalize
 *
 * Each stage runs only when the previous one could not settle the verdict.
 * Every request ends in exactly one persisted scan record, including
 * requests that fail part way.
 */
export class EscalationOrchestrator {
  private stages: StageSwitches;
  private now: () => Date;

  constructor(private deps: OrchestratorDependencies) {
    this.stages = { layer2Enabled: true, layer3Enabled: true, ...deps.stages };
    this.now = deps.now ?? (() => new Date());
  }

  async scan(request: ScanRequest): Promise<ScanRecord> {
    const startTime = performance.now();
    const startedAt = this.now();
    const layers: StageLayers = {};

    let outcome: Outcome;
    try {
      outcome = await this.escalate(request, layers);
    } catch (error) {
      log.error(`Scan failed for ${request.userId}`, error);
      outcome = {
        finalVerdict: 'error',
        threatLevel: 'unknown',
        confidence: 0,
        error: errorMessage(error),
      };
    }

    const record: ScanRecord = {
      scanId: createScanId(startedAt, request.userId),
      userId: request.userId,
      scanType: request.scanType,
      email: {
        sender: request.email.sender,
        subject: request.email.subject,
        date: request.email.timestamp,
      },
      layers,
      ...outcome,
      processingTime: (performance.now() - startTime) / 1000,
      timestamp: startedAt.toISOString(),
    };

    await this.finalize(record, request.email);
    return record;
  }

  private async escalate(request: ScanRequest, layers: StageLayers): Promise<Outcome> {
    const { email, userId } = request;

    // Stage 1
    const layer1 = await this.deps.ruleEngine.check(email);
    layers.layer1 = layer1;
    if (layer1.status === 'threat') {
      return { finalVerdict: 'threat', threatLevel: 'high', confidence: layer1.confidence };
    }

    // Stage 2
    const layer2Outcome = this.stages.layer2Enabled
      ? await this.deps.classifierStage.classify(email, layer1)
      : { ok: false as const, error: new ClassifierUnavailableError('Stage 2 is disabled') };

    const layer2 = layer2Outcome.ok
      ? layer2Outcome.result
      : failedStage('layer2', layer2Outcome.error);
    layers.layer2 = layer2;

    if (!layer2Outcome.ok) {
      log.warn(`Stage 2 unavailable, escalating: ${layer2Outcome.error.message}`);
    } else if (isConfidentlySafe(layer2Outcome.result)) {
      return { finalVerdict: 'safe', threatLevel: 'low', confidence: layer2Outcome.result.confidence };
    }

    // Stage 3
    if (!this.stages.layer3Enabled) {
      return {
        finalVerdict: 'suspicious',
        threatLevel: 'medium',
        confidence: layer2.status === 'error' ? UNRESOLVED_CONFIDENCE : layer2.confidence,
      };
    }

    const layer3 = await this.deps.detective.analyze(email, userId, { layer1, layer2 });
    layers.layer3 = layer3;
    return {
      finalVerdict: layer3.status,
      threatLevel: layer3.threatLevel,
      confidence: layer3.confidence,
    };
  }

  private async finalize(record: ScanRecord, email: NormalizedEmail): Promise<void> {
    this.followUpMonitoring(record, email);

    try {
      this.deps.scanStore.save(record);
    } catch (error) {
      log.error(`Failed to persist scan ${record.scanId}`, error);
    }

    await this.deps.auditLogger?.logScan(record);
    this.deps.metrics?.recordScan(record);

    log.info(
      `Scan ${record.scanId}: ${record.finalVerdict}/${record.threatLevel} ` +
      `(${record.confidence.toFixed(2)}) in ${record.processingTime.toFixed(3)}s`,
    );
  }

  /**
   * Emails from a sender under monitoring join the conversation history even
   * when they were not flagged themselves.
   */
  private followUpMonitoring(record: ScanRecord, email: NormalizedEmail): void {
    const layer3 = record.layers.layer3;
    if (layer3 && layer3.status !== 'safe') return; // already recorded by Stage 3

    try {
      if (this.deps.sessions.getActive(record.userId, email.sender)) {
        this.deps.userContext.addConversationEntry(record.userId, email);
      }
    } catch (error) {
      log.warn(`Follow-up monitoring failed for ${email.sender}`, error);
    }
  }
}

/** `scan_<yyyymmdd>_<hhmmss>_<userId>_<8 hex>`, in UTC. */
export function createScanId(at: Date, userId: string): string {
  const iso = at.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, '');
  const time = iso.slice(11, 19).replace(/:/g, '');
  return `scan_${date}_${time}_${userId}_${crypto.randomUUID().replace(/-/g, '').slice(0, 8)}`;
}
