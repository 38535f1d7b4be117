import { describe, it, expect } from 'vitest';
import { ScanMetrics } from '../../../src/reporting/metrics.js';
import { failedStage } from '../../../src/pipeline/types.js';
import { makeRuleResult, makeScanRecord } from '../../support/fixtures.js';

describe('ScanMetrics', () => {
  it('starts at zero', () => {
    expect(new ScanMetrics().snapshot()).toEqual({
      scansTotal: 0,
      verdicts: { safe: 0, suspicious: 0, threat: 0, error: 0 },
      stoppedAt: { layer1: 0, layer2: 0, layer3: 0 },
      cacheHits: 0,
      cacheMisses: 0,
      cacheHitRate: 0,
      classifierFailures: 0,
      averageProcessingTime: 0,
      p95ProcessingTime: 0,
    });
  });

  it('tracks verdicts, stopping stage and cache hits', () => {
    const metrics = new ScanMetrics();
    metrics.recordScan(makeScanRecord({
      finalVerdict: 'threat',
      layers: { layer1: makeRuleResult({ status: 'threat', cached: true }) },
      processingTime: 0.1,
    }));
    metrics.recordScan(makeScanRecord({
      finalVerdict: 'suspicious',
      layers: { layer1: makeRuleResult(), layer2: failedStage('layer2', new Error('down')) },
      processingTime: 0.3,
    }));
    metrics.recordScan(makeScanRecord({ finalVerdict: 'error', layers: {}, processingTime: 0.2 }));

    const snapshot = metrics.snapshot();
    expect(snapshot.scansTotal).toBe(3);
    expect(snapshot.verdicts).toEqual({ safe: 0, suspicious: 1, threat: 1, error: 1 });
    expect(snapshot.stoppedAt).toEqual({ layer1: 1, layer2: 1, layer3: 0 });
    expect(snapshot.cacheHits).toBe(1);
    expect(snapshot.cacheMisses).toBe(1);
    expect(snapshot.cacheHitRate).toBe(0.5);
    expect(snapshot.classifierFailures).toBe(1);
    expect(snapshot.averageProcessingTime).toBeCloseTo(0.2);
    expect(snapshot.p95ProcessingTime).toBe(0.3);
  });
});
