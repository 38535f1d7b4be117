import type Database from 'better-sqlite3';
import { z } from 'zod';
import { EmailFingerprinter } from '../cache/fingerprint.js';
import type { NormalizedEmail } from '../email/types.js';
import { withStore } from './database.js';
import { JsonObjectSchema, parseJsonColumn } from './json.js';
import {
  ContactSchema,
  OrganizationSchema,
  type Contact,
  type ContextStatistics,
  type ConversationHistoryEntry,
  type JsonObject,
  type Organization,
  type ProfilePatch,
  type SuspectInput,
  type SuspectRecord,
  type UserProfile,
} from './types.js';

const SNIPPET_LENGTH = 200;
const REPLY_MARKER = /^\s*(re|fwd?|fw)\s*:/i;

export const DEFAULT_PERSONAL_INFO: JsonObject = {
  age_group: 'unknown',
  occupation: 'unknown',
  tech_savviness: 'medium',
  primary_email_usage: 'personal',
};

export const DEFAULT_RISK_PROFILE: JsonObject = {
  overall_risk: 'medium',
  susceptible_to: [],
  awareness_level: 'medium',
};

export const DEFAULT_PREFERENCES: JsonObject = {
  security_level: 'medium',
  notification_frequency: 'normal',
};

interface ProfileRow {
  user_id: string;
  personal_info: string;
  contacts: string;
  organizations: string;
  previous_scams: string;
  risk_profile: string;
  preferences: string;
  created_at: string;
  updated_at: string;
}

interface SuspectRow {
  sender_email: string;
  sender_name: string | null;
  tactics_used: string;
  threat_level: string;
  social_engineering_score: number | null;
  email_metadata: string;
  first_seen: string;
  last_seen: string;
  frequency_count: number;
}

interface SuspectParams {
  sender: string;
  senderName: string | null;
  tactics: string;
  threatLevel: string;
  score: number | null;
  metadata: string;
  now: string;
}

interface HistoryRow {
  id: number;
  user_id: string;
  sender_email: string;
  subject: string;
  body_snippet: string;
  timestamp: string;
  is_reply: number;
  thread_id: string;
}

/**
 * Per-user profiles, the suspect sender registry and conversation history.
 *
 * Profiles are created lazily with defaults on first access. Contacts and
 * organizations are deduplicated by lowercase email and domain.
 */
export class UserContextStore {
  private fingerprinter = new EmailFingerprinter();

  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date(),
  ) {}

  getUserExperience(userId: string): UserProfile {
    return withStore('load user profile', () => {
      const timestamp = this.now().toISOString();
      this.db.prepare(`
        INSERT OR IGNORE INTO user_experience
          (user_id, personal_info, contacts, organizations, previous_scams, risk_profile, preferences, created_at, updated_at)
        VALUES (?, ?, '[]', '[]', '[]', ?, ?, ?, ?)
      `).run(
        userId,
        JSON.stringify(DEFAULT_PERSONAL_INFO),
        JSON.stringify(DEFAULT_RISK_PROFILE),
        JSON.stringify(DEFAULT_PREFERENCES),
        timestamp,
        timestamp,
      );
      return this.readProfile(userId);
    });
  }

  /**
   * Merge personal info, risk profile and preferences; replace contacts,
   * organizations and previous scams when given.
   */
  updateProfile(userId: string, patch: ProfilePatch): UserProfile {
    return withStore('update user profile', () => this.db.transaction(() => {
      const current = this.getUserExperience(userId);
      return this.writeProfile({
        ...current,
        personalInfo: { ...current.personalInfo, ...patch.personalInfo },
        riskProfile: { ...current.riskProfile, ...patch.riskProfile },
        preferences: { ...current.preferences, ...patch.preferences },
        contacts: patch.contacts ? dedupeContacts(patch.contacts) : current.contacts,
        organizations: patch.organizations ? dedupeOrganizations(patch.organizations) : current.organizations,
        previousScams: patch.previousScams ?? current.previousScams,
      });
    })());
  }

  /** Append contacts, skipping emails already present. */
  addContacts(userId: string, contacts: Contact[]): { profile: UserProfile; added: number } {
    return withStore('add contacts', () => this.db.transaction(() => {
      const current = this.getUserExperience(userId);
      const merged = dedupeContacts([...current.contacts, ...contacts]);
      const profile = this.writeProfile({ ...current, contacts: merged });
      return { profile, added: merged.length - current.contacts.length };
    })());
  }

  /** Append organizations, skipping domains already present. */
  addOrganizations(userId: string, organizations: Organization[]): { profile: UserProfile; added: number } {
    return withStore('add organizations', () => this.db.transaction(() => {
      const current = this.getUserExperience(userId);
      const merged = dedupeOrganizations([...current.organizations, ...organizations]);
      const profile = this.writeProfile({ ...current, organizations: merged });
      return { profile, added: merged.length - current.organizations.length };
    })());
  }

  /**
   * Insert a suspect or, for a known sender, bump its frequency count in the
   * same statement.
   */
  recordSuspect(input: SuspectInput): SuspectRecord {
    return withStore('record suspect', () => {
      const row = this.db.prepare<SuspectParams, SuspectRow>(`
        INSERT INTO suspect_info
          (sender_email, sender_name, tactics_used, threat_level, social_engineering_score,
           email_metadata, first_seen, last_seen, frequency_count)
        VALUES (@sender, @senderName, @tactics, @threatLevel, @score, @metadata, @now, @now, 1)
        ON CONFLICT(sender_email) DO UPDATE SET
          frequency_count = frequency_count + 1,
          last_seen = excluded.last_seen,
          sender_name = COALESCE(excluded.sender_name, suspect_info.sender_name),
          tactics_used = excluded.tactics_used,
          threat_level = excluded.threat_level,
          social_engineering_score = COALESCE(excluded.social_engineering_score, suspect_info.social_engineering_score),
          email_metadata = excluded.email_metadata
        RETURNING *
      `).get({
        sender: input.sender.trim().toLowerCase(),
        senderName: input.senderName?.trim() || null,
        tactics: JSON.stringify(input.tacticsUsed ?? []),
        threatLevel: input.threatLevel ?? 'unknown',
        score: input.socialEngineeringScore ?? null,
        metadata: JSON.stringify(input.emailMetadata ?? {}),
        now: this.now().toISOString(),
      });
      if (!row) throw new Error(`No row returned for suspect ${input.sender}`);
      return toSuspect(row);
    });
  }

  getSuspect(sender: string): SuspectRecord | null {
    return withStore('load suspect', () => {
      const row = this.db
        .prepare<[string], SuspectRow>('SELECT * FROM suspect_info WHERE sender_email = ?')
        .get(sender.trim().toLowerCase());
      return row ? toSuspect(row) : null;
    });
  }

  /** Store-wide counts across every user. */
  getStatistics(): ContextStatistics {
    return withStore('load context statistics', () => {
      const row = this.db.prepare<[], {
        users: number;
        suspects: number;
        avg_frequency: number | null;
        conversations: number;
      }>(`
        SELECT
          (SELECT COUNT(*) FROM user_experience) AS users,
          (SELECT COUNT(*) FROM suspect_info) AS suspects,
          (SELECT AVG(frequency_count) FROM suspect_info) AS avg_frequency,
          (SELECT COUNT(*) FROM conversation_history) AS conversations
      `).get();
      return {
        users: row?.users ?? 0,
        suspects: row?.suspects ?? 0,
        avgSuspectFrequency: row?.avg_frequency ?? 0,
        conversations: row?.conversations ?? 0,
      };
    });
  }

  /** Append an email to the user's history with its sender. */
  addConversationEntry(userId: string, email: NormalizedEmail): ConversationHistoryEntry {
    return withStore('append conversation history', () => {
      const bodySnippet = email.body.length > SNIPPET_LENGTH
        ? `${email.body.slice(0, SNIPPET_LENGTH)}...`
        : email.body;
      const entry = {
        userId,
        sender: email.sender,
        subject: email.subject,
        bodySnippet,
        timestamp: this.now().toISOString(),
        isReply: REPLY_MARKER.test(email.subject),
        threadId: this.fingerprinter.threadId(userId, email.sender, email.subject),
      };

      const result = this.db.prepare(`
        INSERT INTO conversation_history
          (user_id, sender_email, subject, body_snippet, timestamp, is_reply, thread_id)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        entry.userId,
        entry.sender,
        entry.subject,
        entry.bodySnippet,
        entry.timestamp,
        entry.isReply ? 1 : 0,
        entry.threadId,
      );
      return { id: Number(result.lastInsertRowid), ...entry };
    });
  }

  /** History with one sender, newest first. */
  getConversationHistory(userId: string, sender: string, limit = 10): ConversationHistoryEntry[] {
    return withStore('load conversation history', () => this.db
      .prepare<[string, string, number], HistoryRow>(`
        SELECT * FROM conversation_history
        WHERE user_id = ? AND sender_email = ?
        ORDER BY id DESC
        LIMIT ?
      `)
      .all(userId, sender, limit)
      .map(row => ({
        id: row.id,
        userId: row.user_id,
        sender: row.sender_email,
        subject: row.subject,
        bodySnippet: row.body_snippet,
        timestamp: row.timestamp,
        isReply: row.is_reply === 1,
        threadId: row.thread_id,
      })));
  }

  private readProfile(userId: string): UserProfile {
    const row = this.db
      .prepare<[string], ProfileRow>('SELECT * FROM user_experience WHERE user_id = ?')
      .get(userId);
    if (!row) throw new Error(`Profile for ${userId} not found`);

    return {
      userId: row.user_id,
      personalInfo: parseJsonColumn(row.personal_info, JsonObjectSchema, {}),
      contacts: parseJsonColumn(row.contacts, z.array(ContactSchema), []),
      organizations: parseJsonColumn(row.organizations, z.array(OrganizationSchema), []),
      previousScams: parseJsonColumn(row.previous_scams, z.array(JsonObjectSchema), []),
      riskProfile: parseJsonColumn(row.risk_profile, JsonObjectSchema, {}),
      preferences: parseJsonColumn(row.preferences, JsonObjectSchema, {}),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private writeProfile(profile: UserProfile): UserProfile {
    const updatedAt = this.now().toISOString();
    this.db.prepare(`
      UPDATE user_experience SET
        personal_info = ?, contacts = ?, organizations = ?, previous_scams = ?,
        risk_profile = ?, preferences = ?, updated_at = ?
      WHERE user_id = ?
    `).run(
      JSON.stringify(profile.personalInfo),
      JSON.stringify(profile.contacts),
      JSON.stringify(profile.organizations),
      JSON.stringify(profile.previousScams),
      JSON.stringify(profile.riskProfile),
      JSON.stringify(profile.preferences),
      updatedAt,
      profile.userId,
    );
    return { ...profile, updatedAt };
  }
}

export function dedupeContacts(contacts: Contact[]): Contact[] {
  const seen = new Set<string>();
  const result: Contact[] = [];
  for (const contact of contacts) {
    const key = contact.email.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push({ name: contact.name.trim(), email: contact.email.trim() });
  }
  return result;
}

export function dedupeOrganizations(organizations: Organization[]): Organization[] {
  const seen = new Set<string>();
  const result: Organization[] = [];
  for (const organization of organizations) {
    const key = organization.domain.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push({ name: organization.name.trim(), domain: organization.domain.trim() });
  }
  return result;
}

function toSuspect(row: SuspectRow): SuspectRecord {
  return {
    sender: row.sender_email,
    senderName: row.sender_name,
    tacticsUsed: parseJsonColumn(row.tactics_used, z.array(z.string()), []),
    threatLevel: row.threat_level,
    socialEngineeringScore: row.social_engineering_score,
    emailMetadata: parseJsonColumn(row.email_metadata, JsonObjectSchema, {}),
    frequencyCount: row.frequency_count,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
  };
}
