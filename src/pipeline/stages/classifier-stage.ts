import { ClassifierUnavailableError, PhishScopeError } from '../../errors.js';
import type { NormalizedEmail } from '../../email/types.js';
import type { Classification, ClassifierService } from '../../services/classifier-client.js';
import type {
  ClassifierLabel,
  ClassifierStageResult,
  RuleStageResult,
  StageOutcome,
} from '../types.js';

/** Benign results at or below this confidence are overridden when Stage 1 saw indicators. */
export const OVERRIDE_CONFIDENCE_CEILING = 0.8;

/** A benign result must exceed this confidence for the pipeline to stop at Stage 2. */
export const SAFE_STOP_CONFIDENCE = 0.8;

const BENIGN_LABELS = new Set(['benign', 'legitimate', 'safe', 'ham', 'clean', 'not_phishing']);

/**
 * Stage 2: statistical classifier adapter.
 *
 * Failures are returned as values so the orchestrator can escalate.
 */
export class ClassifierStage {
  constructor(private classifier: ClassifierService | null) {}

  async classify(
    email: NormalizedEmail,
    ruleResult: RuleStageResult,
  ): Promise<StageOutcome<ClassifierStageResult>> {
    const startTime = performance.now();

    if (!this.classifier) {
      return { ok: false, error: new ClassifierUnavailableError('Classifier is not configured') };
    }

    let classification: Classification;
    try {
      classification = await this.classifier.classify(`${email.subject}\n\n${email.body}`);
    } catch (error) {
      return {
        ok: false,
        error: error instanceof PhishScopeError
          ? error
          : new ClassifierUnavailableError(error instanceof Error ? error.message : String(error), { cause: error }),
      };
    }

    const label = normalizeLabel(classification.label);
    const confidence = clamp01(classification.confidence);
    const manualOverride =
      label === 'benign' &&
      ruleResult.indicators.length > 0 &&
      confidence <= OVERRIDE_CONFIDENCE_CEILING;

    const indicators = [`Classifier label: ${label} (${confidence.toFixed(2)})`];
    if (manualOverride) {
      indicators.push('Stage 1 indicators override a low-confidence benign classification');
    }

    return {
      ok: true,
      result: {
        stage: 'layer2',
        status: label === 'benign' && !manualOverride ? 'safe' : 'suspicious',
        confidence,
        indicators,
        label,
        rawLabel: classification.label,
        manualOverride,
        processingTime: (performance.now() - startTime) / 1000,
      },
    };
  }
}

/** Map any classifier vocabulary onto benign/suspicious. */
export function normalizeLabel(raw: string): ClassifierLabel {
  return BENIGN_LABELS.has(raw.trim().toLowerCase()) ? 'benign' : 'suspicious';
}

/** True when Stage 2 clears the email and the pipeline can stop. */
export function isConfidentlySafe(result: ClassifierStageResult): boolean {
  return result.status === 'safe' && result.confidence > SAFE_STOP_CONFIDENCE;
}

function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}
