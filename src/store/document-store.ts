import * as crypto from 'node:crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { withStore } from './database.js';
import { parseJsonColumn } from './json.js';
import type { AddDocumentResult, UserDocument, UserDocumentInput, UserDocumentSummary } from './types.js';

const SUMMARY_LENGTH = 500;

interface DocumentRow {
  id: number;
  user_id: string;
  document_name: string;
  document_type: string;
  document_content: string;
  document_summary: string;
  document_hash: string;
  file_size: number;
  tags: string;
  uploaded_at: string;
  last_accessed: string | null;
  access_count: number;
}

type SummaryRow = Omit<DocumentRow, 'document_content' | 'document_hash' | 'last_accessed'>;

/**
 * Reference documents a user keeps alongside their profile. Every read and
 * write is scoped to the owning user. Deletes are soft; a deleted document
 * no longer counts as a duplicate.
 */
export class DocumentStore {
  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date(),
  ) {}

  /** Store a document, or return the user's active copy with the same content. */
  add(userId: string, input: UserDocumentInput): AddDocumentResult {
    const documentHash = crypto.createHash('sha256').update(input.content).digest('hex');

    return withStore('add document', () => this.db.transaction((): AddDocumentResult => {
      const existing = this.db
        .prepare<[string, string], { id: number }>(
          'SELECT id FROM user_documents WHERE user_id = ? AND document_hash = ? AND is_active = 1',
        )
        .get(userId, documentHash);
      if (existing) return { status: 'duplicate', documentId: existing.id, documentHash };

      const summary = input.content.length > SUMMARY_LENGTH
        ? `${input.content.slice(0, SUMMARY_LENGTH)}...`
        : input.content;
      const result = this.db.prepare(`
        INSERT INTO user_documents
          (user_id, document_name, document_type, document_content, document_summary,
           document_hash, file_size, tags, uploaded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        userId,
        input.name,
        input.type,
        input.content,
        summary,
        documentHash,
        input.content.length,
        JSON.stringify(input.tags),
        this.now().toISOString(),
      );
      return { status: 'created', documentId: Number(result.lastInsertRowid), documentHash };
    })());
  }

  /** Active documents, newest first. */
  list(userId: string, limit = 50): UserDocumentSummary[] {
    return withStore('list documents', () => this.db
      .prepare<[string, number], SummaryRow>(`
        SELECT id, user_id, document_name, document_type, document_summary, file_size,
               tags, uploaded_at, access_count
        FROM user_documents
        WHERE user_id = ? AND is_active = 1
        ORDER BY uploaded_at DESC, id DESC
        LIMIT ?
      `)
      .all(userId, limit)
      .map(toSummary));
  }

  /** Full document, counting the read. */
  get(userId: string, documentId: number): UserDocument | null {
    return withStore('load document', () => this.db.transaction((): UserDocument | null => {
      const lastAccessed = this.now().toISOString();
      const row = this.db.prepare<[string, number, string], DocumentRow>(`
        UPDATE user_documents
        SET access_count = access_count + 1, last_accessed = ?
        WHERE id = ? AND user_id = ? AND is_active = 1
        RETURNING *
      `).get(lastAccessed, documentId, userId);
      if (!row) return null;
      return {
        ...toSummary(row),
        content: row.document_content,
        lastAccessedAt: row.last_accessed,
      };
    })());
  }

  /** Soft delete. False when the user has no such active document. */
  delete(userId: string, documentId: number): boolean {
    return withStore('delete document', () => this.db
      .prepare('UPDATE user_documents SET is_active = 0 WHERE id = ? AND user_id = ? AND is_active = 1')
      .run(documentId, userId)
      .changes > 0);
  }

  count(): number {
    return withStore('count documents', () => this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM user_documents WHERE is_active = 1')
      .get()?.count ?? 0);
  }
}

function toSummary(row: SummaryRow): UserDocumentSummary {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.document_name,
    type: row.document_type,
    summary: row.document_summary,
    size: row.file_size,
    tags: parseJsonColumn(row.tags, z.array(z.string()), []),
    uploadedAt: row.uploaded_at,
    accessCount: row.access_count,
  };
}
