import { describe, it, expect, vi } from 'vitest';
import { EscalationOrchestrator, createScanId } from '../../../src/pipeline/orchestrator.js';
import { RuleEngine } from '../../../src/pipeline/stages/rule-engine.js';
import { ClassifierStage } from '../../../src/pipeline/stages/classifier-stage.js';
import { ContextualDetective } from '../../../src/pipeline/stages/detective.js';
import { SocialEngineeringAnalyzer } from '../../../src/pipeline/analysis/social-engineering.js';
import { ScanMetrics } from '../../../src/reporting/metrics.js';
import type { ClassifierService } from '../../../src/services/classifier-client.js';
import type { StageSwitches } from '../../../src/pipeline/orchestrator.js';
import {
  createStores,
  FakeClassifier,
  FakeReasoning,
  makeEmail,
  SSN_REQUEST_EMAIL,
} from '../../support/fixtures.js';

interface PipelineOptions {
  classifier?: ClassifierService | null;
  reasoning?: string | Error;
  stages?: Partial<StageSwitches>;
}

function buildPipeline(options: PipelineOptions = {}) {
  const stores = createStores();
  const ruleEngine = new RuleEngine(null);
  const metrics = new ScanMetrics();
  const detective = new ContextualDetective({
    userContext: stores.userContext,
    sessions: stores.sessions,
    socialEngineering: new SocialEngineeringAnalyzer(new FakeReasoning(options.reasoning ?? '{"score": 10}')),
    conversationTimeoutHours: 10,
  });
  const orchestrator = new EscalationOrchestrator({
    ruleEngine,
    classifierStage: new ClassifierStage(options.classifier === undefined
      ? new FakeClassifier({ label: 'benign', confidence: 0.95 })
      : options.classifier),
    detective,
    scanStore: stores.scanStore,
    userContext: stores.userContext,
    sessions: stores.sessions,
    metrics,
    stages: options.stages,
    now: stores.clock.now,
  });
  return { orchestrator, stores, ruleEngine, metrics };
}

const CLEAN_EMAIL = makeEmail();

describe('EscalationOrchestrator', () => {
  describe('short circuits', () => {
    it('stops at Stage 1 for a rule hit', async () => {
      const classifier = new FakeClassifier({ label: 'benign', confidence: 0.99 });
      const { orchestrator, stores } = buildPipeline({ classifier });

      const record = await orchestrator.scan({ email: SSN_REQUEST_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(record.finalVerdict).toBe('threat');
      expect(record.threatLevel).toBe('high');
      expect(record.confidence).toBe(0.95);
      expect(record.layers.layer2).toBeUndefined();
      expect(record.layers.layer3).toBeUndefined();
      expect(classifier.calls).toEqual([]);
      expect(stores.scanStore.get(record.scanId)?.finalVerdict).toBe('threat');
    });

    it('stops at Stage 2 for a confident benign label', async () => {
      const { orchestrator } = buildPipeline({
        classifier: new FakeClassifier({ label: 'benign', confidence: 0.95 }),
        reasoning: '{"score": 99}',
      });

      const record = await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(record.finalVerdict).toBe('safe');
      expect(record.threatLevel).toBe('low');
      expect(record.confidence).toBe(0.95);
      expect(record.layers.layer2?.status).toBe('safe');
      expect(record.layers.layer3).toBeUndefined();
    });
  });

  describe('escalation', () => {
    it('takes Stage 3 verdict after a suspicious label', async () => {
      const { orchestrator } = buildPipeline({
        classifier: new FakeClassifier({ label: 'phishing', confidence: 0.9 }),
        reasoning: '{"score": 85, "tactics": ["authority"]}',
      });

      const record = await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(record.layers.layer2?.status).toBe('suspicious');
      expect(record.layers.layer3?.totalScore).toBe(85);
      expect(record.finalVerdict).toBe('threat');
      expect(record.threatLevel).toBe('high');
      expect(record.confidence).toBe(0.9);
    });

    it('escalates past a classifier failure and records it', async () => {
      const { orchestrator, metrics } = buildPipeline({
        classifier: new FakeClassifier(new Error('connection refused')),
      });

      const record = await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(record.layers.layer2).toMatchObject({ status: 'error', error: 'connection refused', confidence: 0 });
      expect(record.layers.layer3?.status).toBe('safe');
      expect(record.finalVerdict).toBe('safe');
      expect(record.error).toBeUndefined();
      expect(metrics.snapshot().classifierFailures).toBe(1);
    });

    it('treats a disabled Stage 2 as a failure', async () => {
      const classifier = new FakeClassifier({ label: 'benign', confidence: 0.99 });
      const { orchestrator } = buildPipeline({ classifier, stages: { layer2Enabled: false } });

      const record = await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(record.layers.layer2).toMatchObject({ status: 'error', error: 'Stage 2 is disabled' });
      expect(record.layers.layer3).toBeDefined();
      expect(classifier.calls).toEqual([]);
    });

    it('reports suspicious when Stage 3 is disabled', async () => {
      const { orchestrator } = buildPipeline({
        classifier: new FakeClassifier({ label: 'phishing', confidence: 0.7 }),
        stages: { layer3Enabled: false },
      });

      const record = await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(record.finalVerdict).toBe('suspicious');
      expect(record.threatLevel).toBe('medium');
      expect(record.confidence).toBe(0.7);
      expect(record.layers.layer3).toBeUndefined();
    });

    it('reports 0.5 confidence when neither Stage 2 nor Stage 3 can decide', async () => {
      const { orchestrator } = buildPipeline({ classifier: null, stages: { layer3Enabled: false } });

      const record = await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(record.finalVerdict).toBe('suspicious');
      expect(record.confidence).toBe(0.5);
      expect(record.layers.layer2).toMatchObject({ status: 'error', error: 'Classifier is not configured' });
    });
  });

  describe('failures', () => {
    it('turns an unexpected exception into a stored error record', async () => {
      const { orchestrator, ruleEngine, stores } = buildPipeline();
      vi.spyOn(ruleEngine, 'check').mockRejectedValue(new Error('rules exploded'));

      const record = await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(record.finalVerdict).toBe('error');
      expect(record.threatLevel).toBe('unknown');
      expect(record.confidence).toBe(0);
      expect(record.error).toBe('rules exploded');
      expect(record.layers).toEqual({});
      expect(stores.scanStore.get(record.scanId)?.error).toBe('rules exploded');
    });

    it('returns the record even when it cannot be stored', async () => {
      const { orchestrator, stores } = buildPipeline();
      stores.db.close();

      const record = await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });
      expect(record.finalVerdict).toBe('safe');
    });
  });

  describe('follow-up monitoring', () => {
    it('adds mail from a monitored sender to history even when safe', async () => {
      const { orchestrator, stores } = buildPipeline();
      stores.sessions.open('user-1', CLEAN_EMAIL.sender, 10);

      await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(stores.userContext.getConversationHistory('user-1', CLEAN_EMAIL.sender)).toHaveLength(1);
    });

    it('does not record unmonitored safe mail', async () => {
      const { orchestrator, stores } = buildPipeline();

      await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(stores.userContext.getConversationHistory('user-1', CLEAN_EMAIL.sender)).toEqual([]);
    });

    it('records a flagged monitored email only once', async () => {
      const { orchestrator, stores } = buildPipeline({
        classifier: new FakeClassifier({ label: 'phishing', confidence: 0.9 }),
        reasoning: '{"score": 85}',
      });
      stores.sessions.open('user-1', CLEAN_EMAIL.sender, 10);

      await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

      expect(stores.userContext.getConversationHistory('user-1', CLEAN_EMAIL.sender)).toHaveLength(1);
    });
  });

  it('counts each scan in the metrics', async () => {
    const { orchestrator, metrics } = buildPipeline();

    await orchestrator.scan({ email: SSN_REQUEST_EMAIL, userId: 'user-1', scanType: 'full' });
    await orchestrator.scan({ email: CLEAN_EMAIL, userId: 'user-1', scanType: 'full' });

    const snapshot = metrics.snapshot();
    expect(snapshot.scansTotal).toBe(2);
    expect(snapshot.verdicts).toEqual({ safe: 1, suspicious: 0, threat: 1, error: 0 });
    expect(snapshot.stoppedAt).toEqual({ layer1: 1, layer2: 1, layer3: 0 });
  });
});

describe('createScanId', () => {
  it('encodes the UTC time and user id', () => {
    expect(createScanId(new Date('2025-03-14T09:30:05.000Z'), 'user-1'))
      .toMatch(/^scan_20250314_093005_user-1_[0-9a-f]{8}$/);
  });

  it('is unique per call', () => {
    const at = new Date('2025-03-14T09:30:05.000Z');
    expect(createScanId(at, 'user-1')).not.toBe(createScanId(at, 'user-1'));
  });
});
