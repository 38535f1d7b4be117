import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { StoreFailureError } from '../errors.js';

/** Every table the stores read or write. The health check counts these. */
export const TABLES = [
  'user_experience',
  'suspect_info',
  'conversation_history',
  'conversation_sessions',
  'scan_history',
  'model_training_data',
  'user_documents',
] as const;

export type TableName = (typeof TABLES)[number];

export interface DatabaseCheck {
  ok: boolean;
  tables: Partial<Record<TableName, number>>;
  error?: string;
}

/**
 * Open (creating if needed) the PhishScope database and bring its schema
 * up to date. Pass `:memory:` for a throwaway database.
 */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const db = new Database(filename);
  if (filename !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  runMigrations(db);
  return db;
}

/** Row counts for every table, or the failure that prevented reading them. */
export function checkDatabase(db: Database.Database): DatabaseCheck {
  const tables: Partial<Record<TableName, number>> = {};
  try {
    for (const table of TABLES) {
      const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
      tables[table] = row?.count ?? 0;
    }
    return { ok: true, tables };
  } catch (error) {
    return { ok: false, tables, error: error instanceof Error ? error.message : String(error) };
  }
}

/** Run `fn`, converting driver errors into {@link StoreFailureError}. */
export function withStore<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StoreFailureError) throw error;
    throw new StoreFailureError(
      `Failed to ${action}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

function getSchemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/** Versioned migrations. Add new migrations when schema changes. */
function runMigrations(db: Database.Database): void {
  const v = getSchemaVersion(db);
  if (v < 1) {
    db.transaction(() => {
      createTables(db);
      db.pragma('user_version = 1');
    })();
  }
  if (v < 2) {
    db.transaction(() => {
      createDocumentTables(db);
      db.pragma('user_version = 2');
    })();
  }
}

function createTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS user_experience (
      user_id TEXT PRIMARY KEY,
      personal_info TEXT NOT NULL DEFAULT '{}',
      contacts TEXT NOT NULL DEFAULT '[]',
      organizations TEXT NOT NULL DEFAULT '[]',
      previous_scams TEXT NOT NULL DEFAULT '[]',
      risk_profile TEXT NOT NULL DEFAULT '{}',
      preferences TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS suspect_info (
      sender_email TEXT PRIMARY KEY,
      sender_name TEXT,
      tactics_used TEXT NOT NULL DEFAULT '[]',
      threat_level TEXT NOT NULL DEFAULT 'unknown',
      social_engineering_score INTEGER,
      email_metadata TEXT NOT NULL DEFAULT '{}',
      first_seen TEXT NOT NULL,
      last_seen TEXT NOT NULL,
      frequency_count INTEGER NOT NULL DEFAULT 1
    );
    CREATE TABLE IF NOT EXISTS conversation_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      sender_email TEXT NOT NULL,
      subject TEXT NOT NULL,
      body_snippet TEXT NOT NULL,
      timestamp TEXT NOT NULL,
      is_reply INTEGER NOT NULL DEFAULT 0,
      thread_id TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS conversation_sessions (
      user_id TEXT NOT NULL,
      sender_email TEXT NOT NULL,
      started_at TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'monitoring',
      PRIMARY KEY (user_id, sender_email)
    );
    CREATE TABLE IF NOT EXISTS scan_history (
      scan_id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      scan_type TEXT NOT NULL,
      email_sender TEXT NOT NULL,
      email_subject TEXT NOT NULL,
      email_date TEXT NOT NULL,
      final_verdict TEXT NOT NULL,
      threat_level TEXT NOT NULL,
      confidence_score REAL NOT NULL,
      layers TEXT NOT NULL,
      processing_time REAL NOT NULL,
      error TEXT,
      scan_timestamp TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS model_training_data (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email_content TEXT NOT NULL,
      email_subject TEXT,
      email_sender TEXT,
      true_label TEXT NOT NULL,
      user_feedback TEXT,
      confidence_score REAL,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_history_user_sender ON conversation_history(user_id, sender_email, id DESC);
    CREATE INDEX IF NOT EXISTS idx_sessions_expires ON conversation_sessions(expires_at);
    CREATE INDEX IF NOT EXISTS idx_scans_user_time ON scan_history(user_id, scan_timestamp DESC);
  `);
}

function createDocumentTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS user_documents (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      document_name TEXT NOT NULL,
      document_type TEXT NOT NULL DEFAULT 'text',
      document_content TEXT NOT NULL,
      document_summary TEXT NOT NULL,
      document_hash TEXT NOT NULL,
      file_size INTEGER NOT NULL,
      tags TEXT NOT NULL DEFAULT '[]',
      uploaded_at TEXT NOT NULL,
      last_accessed TEXT,
      access_count INTEGER NOT NULL DEFAULT 0,
      is_active INTEGER NOT NULL DEFAULT 1
    );
    CREATE UNIQUE INDEX IF NOT EXISTS idx_documents_active_hash
      ON user_documents(user_id, document_hash) WHERE is_active = 1;
    CREATE INDEX IF NOT EXISTS idx_documents_user_time ON user_documents(user_id, uploaded_at DESC);
  `);
}
