import type Database from 'better-sqlite3';
import { z } from 'zod';
import { serializeLayers } from '../pipeline/serialize.js';
import type { ScanRecord } from '../pipeline/types.js';
import { withStore } from './database.js';
import { parseJsonColumn } from './json.js';
import type { ScanStatistics, StoredScan } from './types.js';

interface ScanRow {
  scan_id: string;
  user_id: string;
  scan_type: string;
  email_sender: string;
  email_subject: string;
  email_date: string;
  final_verdict: string;
  threat_level: string;
  confidence_score: number;
  layers: string;
  processing_time: number;
  error: string | null;
  scan_timestamp: string;
}

interface StatisticsRow {
  total: number;
  threats: number | null;
  suspicious: number | null;
  safe: number | null;
  errors: number | null;
}

const STATISTICS_SELECT = `
  SELECT
    COUNT(*) AS total,
    SUM(CASE WHEN final_verdict = 'threat' THEN 1 ELSE 0 END) AS threats,
    SUM(CASE WHEN final_verdict = 'suspicious' THEN 1 ELSE 0 END) AS suspicious,
    SUM(CASE WHEN final_verdict IN ('safe', 'clean') THEN 1 ELSE 0 END) AS safe,
    SUM(CASE WHEN final_verdict = 'error' THEN 1 ELSE 0 END) AS errors
  FROM scan_history`;

/**
 * Scan history. Each scan id is written once; a second write for the same
 * id fails.
 */
export class ScanStore {
  constructor(private db: Database.Database) {}

  save(record: ScanRecord): void {
    withStore(`save scan ${record.scanId}`, () => {
      this.db.prepare(`
        INSERT INTO scan_history
          (scan_id, user_id, scan_type, email_sender, email_subject, email_date,
           final_verdict, threat_level, confidence_score, layers, processing_time, error, scan_timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        record.scanId,
        record.userId,
        record.scanType,
        record.email.sender,
        record.email.subject,
        record.email.date,
        record.finalVerdict,
        record.threatLevel,
        record.confidence,
        JSON.stringify(serializeLayers(record.layers)),
        record.processingTime,
        record.error ?? null,
        record.timestamp,
      );
    });
  }

  get(scanId: string): StoredScan | null {
    return withStore('load scan', () => {
      const row = this.db
        .prepare<[string], ScanRow>('SELECT * FROM scan_history WHERE scan_id = ?')
        .get(scanId);
      return row ? toStoredScan(row) : null;
    });
  }

  /** A page of a user's scans, newest first, with the user's total scan count. */
  getHistory(userId: string, limit: number, offset = 0): { scans: StoredScan[]; total: number } {
    return withStore('load scan history', () => {
      const scans = this.db
        .prepare<[string, number, number], ScanRow>(`
          SELECT * FROM scan_history WHERE user_id = ?
          ORDER BY scan_timestamp DESC, rowid DESC
          LIMIT ? OFFSET ?
        `)
        .all(userId, limit, offset)
        .map(toStoredScan);
      const total = this.db
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM scan_history WHERE user_id = ?')
        .get(userId)?.count ?? 0;
      return { scans, total };
    });
  }

  /** Most recent scans with a threat verdict. */
  getRecentThreats(userId: string, limit: number): StoredScan[] {
    return withStore('load recent threats', () => this.db
      .prepare<[string, number], ScanRow>(`
        SELECT * FROM scan_history WHERE user_id = ? AND final_verdict = 'threat'
        ORDER BY scan_timestamp DESC, rowid DESC
        LIMIT ?
      `)
      .all(userId, limit)
      .map(toStoredScan));
  }

  getStatistics(userId: string): ScanStatistics {
    return withStore('load scan statistics', () => toStatistics(this.db
      .prepare<[string], StatisticsRow>(`${STATISTICS_SELECT} WHERE user_id = ?`)
      .get(userId)));
  }

  /** Verdict counts across every user. */
  getOverallStatistics(): ScanStatistics {
    return withStore('load scan statistics', () => toStatistics(this.db
      .prepare<[], StatisticsRow>(STATISTICS_SELECT)
      .get()));
  }
}

function toStatistics(row: StatisticsRow | undefined): ScanStatistics {
  return {
    total: row?.total ?? 0,
    threats: row?.threats ?? 0,
    suspicious: row?.suspicious ?? 0,
    safe: row?.safe ?? 0,
    errors: row?.errors ?? 0,
  };
}

function toStoredScan(row: ScanRow): StoredScan {
  return {
    scanId: row.scan_id,
    userId: row.user_id,
    scanType: row.scan_type,
    sender: row.email_sender,
    subject: row.email_subject,
    emailDate: row.email_date,
    finalVerdict: row.final_verdict,
    threatLevel: row.threat_level,
    confidence: row.confidence_score,
    processingTime: row.processing_time,
    timestamp: row.scan_timestamp,
    error: row.error,
    layers: parseJsonColumn(row.layers, z.unknown(), {}),
  };
}
