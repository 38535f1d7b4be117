import { completedStages, type FinalVerdict, type ScanRecord, type StageId } from '../pipeline/types.js';

const MAX_SAMPLES = 500;

export interface MetricsSnapshot {
  scansTotal: number;
  verdicts: Record<FinalVerdict, number>;
  stoppedAt: Record<StageId, number>;
  cacheHits: number;
  cacheMisses: number;
  cacheHitRate: number;
  classifierFailures: number;
  averageProcessingTime: number;
  p95ProcessingTime: number;
}

/**
 * In-process scan counters. Processing times keep a sliding window of the
 * latest samples.
 */
export class ScanMetrics {
  private scansTotal = 0;
  private verdicts: Record<FinalVerdict, number> = { safe: 0, suspicious: 0, threat: 0, error: 0 };
  private stoppedAt: Record<StageId, number> = { layer1: 0, layer2: 0, layer3: 0 };
  private cacheHits = 0;
  private cacheMisses = 0;
  private classifierFailures = 0;
  private processingTimes: number[] = [];

  recordScan(record: ScanRecord): void {
    this.scansTotal++;
    this.verdicts[record.finalVerdict]++;

    const stages = completedStages(record.layers);
    const last = stages[stages.length - 1];
    if (last) this.stoppedAt[last.stage]++;

    const layer1 = record.layers.layer1;
    if (layer1?.cached) this.cacheHits++;
    else if (layer1) this.cacheMisses++;

    if (record.layers.layer2?.status === 'error') this.classifierFailures++;

    this.processingTimes.push(record.processingTime);
    if (this.processingTimes.length > MAX_SAMPLES) this.processingTimes.shift();
  }

  snapshot(): MetricsSnapshot {
    const lookups = this.cacheHits + this.cacheMisses;
    return {
      scansTotal: this.scansTotal,
      verdicts: { ...this.verdicts },
      stoppedAt: { ...this.stoppedAt },
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      cacheHitRate: lookups === 0 ? 0 : this.cacheHits / lookups,
      classifierFailures: this.classifierFailures,
      averageProcessingTime: this.average(),
      p95ProcessingTime: this.p95(),
    };
  }

  private average(): number {
    if (this.processingTimes.length === 0) return 0;
    return this.processingTimes.reduce((sum, t) => sum + t, 0) / this.processingTimes.length;
  }

  private p95(): number {
    if (this.processingTimes.length === 0) return 0;
    const sorted = [...this.processingTimes].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)];
  }
}
