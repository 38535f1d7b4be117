import type Database from 'better-sqlite3';
import { withStore } from './database.js';
import type { ConversationSession } from './types.js';

interface SessionRow {
  user_id: string;
  sender_email: string;
  started_at: string;
  expires_at: string;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Conversation monitoring windows keyed by user + sender.
 *
 * A session is active until its expiry time; expired rows are ignored on
 * read and removed by `pruneExpired()`.
 */
export class SessionStore {
  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date(),
  ) {}

  /** Open a session, or restart the window of an existing one. */
  open(userId: string, sender: string, timeoutHours: number): ConversationSession {
    return withStore('open conversation session', () => {
      const startedAt = this.now();
      const session: ConversationSession = {
        userId,
        sender,
        startedAt: startedAt.toISOString(),
        expiresAt: new Date(startedAt.getTime() + timeoutHours * HOUR_MS).toISOString(),
        status: 'monitoring',
      };

      this.db.prepare(`
        INSERT INTO conversation_sessions (user_id, sender_email, started_at, expires_at, status)
        VALUES (?, ?, ?, ?, 'monitoring')
        ON CONFLICT(user_id, sender_email) DO UPDATE SET
          started_at = excluded.started_at,
          expires_at = excluded.expires_at,
          status = 'monitoring'
      `).run(userId, sender, session.startedAt, session.expiresAt);

      return session;
    });
  }

  getActive(userId: string, sender: string): ConversationSession | null {
    return withStore('load conversation session', () => {
      const row = this.db.prepare<[string, string, string], SessionRow>(`
        SELECT * FROM conversation_sessions
        WHERE user_id = ? AND sender_email = ? AND expires_at > ?
      `).get(userId, sender, this.now().toISOString());
      return row ? toSession(row) : null;
    });
  }

  listActive(userId: string): ConversationSession[] {
    return withStore('list conversation sessions', () => this.db
      .prepare<[string, string], SessionRow>(`
        SELECT * FROM conversation_sessions
        WHERE user_id = ? AND expires_at > ?
        ORDER BY started_at DESC
      `)
      .all(userId, this.now().toISOString())
      .map(toSession));
  }

  /** Delete expired sessions. Returns the number removed. */
  pruneExpired(): number {
    return withStore('prune conversation sessions', () => this.db
      .prepare('DELETE FROM conversation_sessions WHERE expires_at <= ?')
      .run(this.now().toISOString())
      .changes);
  }
}

function toSession(row: SessionRow): ConversationSession {
  return {
    userId: row.user_id,
    sender: row.sender_email,
    startedAt: row.started_at,
    expiresAt: row.expires_at,
    status: 'monitoring',
  };
}
