import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger } from '../logging/logger.js';
import { completedStages, type ScanRecord, type StageId } from '../pipeline/types.js';

const log = createLogger('audit');

/**
 * Structured JSONL audit logger for PhishScope scans.
 *
 * Writes one JSON line per scan to:
 *   <logDir>/phishscope-audit-YYYY-MM-DD.jsonl
 *
 * Entries carry the sender and verdicts but never the subject or body.
 */
export class AuditLogger {
  private logDir: string;
  private enabled: boolean;

  constructor(options: { logDir: string; enabled?: boolean }) {
    this.logDir = options.logDir;
    this.enabled = options.enabled ?? true;
  }

  /**
   * Append a scan to today's log. Write failures are logged and never
   * reach the caller.
   */
  async logScan(record: ScanRecord): Promise<void> {
    if (!this.enabled) return;

    const stages = completedStages(record.layers);

    const entry: AuditEntry = {
      timestamp: record.timestamp,
      scanId: record.scanId,
      userId: record.userId,
      scanType: record.scanType,
      sender: record.email.sender,
      finalVerdict: record.finalVerdict,
      threatLevel: record.threatLevel,
      confidence: record.confidence,
      stages: stages.map(s => s.stage),
      cached: record.layers.layer1?.cached ?? false,
      indicatorCount: stages.reduce((sum, stage) => sum + stage.indicators.length, 0),
      processingTime: record.processingTime,
      error: record.error,
    };

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
      await fs.promises.appendFile(this.getLogFilePath(record.timestamp), JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      log.warn(`Failed to write audit entry for ${record.scanId}`, error);
    }
  }

  getLogFilePath(timestamp: string = new Date().toISOString()): string {
    const date = timestamp.slice(0, 10); // YYYY-MM-DD
    return path.join(this.logDir, `phishscope-audit-${date}.jsonl`);
  }
}

/** Shape of a single audit log entry. */
export interface AuditEntry {
  timestamp: string;
  scanId: string;
  userId: string;
  scanType: string;
  sender: string;
  finalVerdict: string;
  threatLevel: string;
  confidence: number;
  stages: StageId[];
  cached: boolean;
  indicatorCount: number;
  processingTime: number;
  error?: string;
}
