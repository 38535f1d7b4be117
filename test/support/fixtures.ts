import type Database from 'better-sqlite3';
import type { NormalizedEmail } from '../../src/email/types.js';
import type { RuleStageResult, ScanRecord } from '../../src/pipeline/types.js';
import type { ConversationHistoryEntry, UserProfile } from '../../src/store/types.js';
import type { Classification, ClassifierService } from '../../src/services/classifier-client.js';
import type { ReasoningService } from '../../src/services/reasoning-client.js';
import { openDatabase } from '../../src/store/database.js';
import { UserContextStore } from '../../src/store/user-context-store.js';
import { SessionStore } from '../../src/store/session-store.js';
import { ScanStore } from '../../src/store/scan-store.js';
import { FeedbackStore } from '../../src/store/feedback-store.js';
import { DocumentStore } from '../../src/store/document-store.js';

export function makeEmail(overrides: Partial<NormalizedEmail> = {}): NormalizedEmail {
  return {
    sender: 'colleague@example.com',
    subject: 'Lunch on Friday',
    body: 'Want to grab lunch on Friday?',
    urls: [],
    emails: [],
    phones: [],
    timestamp: '2025-03-14T09:30:00.000Z',
    ...overrides,
  };
}

/** The SSN request used across stage and pipeline tests. */
export const SSN_REQUEST_EMAIL = makeEmail({
  sender: 'benefits@healthservice-verification.com',
  subject: 'URGENT: SSN Required for Health Benefits Verification',
  body:
    'Dear valued member, we need to verify your Social Security Number within 24 hours ' +
    'to maintain your health benefits. Please reply with your SSN immediately.',
});

/** A routine notification that no rule should flag. */
export const MERGE_NOTIFICATION_EMAIL = makeEmail({
  sender: 'notifications@github.com',
  subject: 'Your pull request has been merged',
  body:
    'Hi there,\n\nYour pull request #123 has been successfully merged into the main branch.\n\n' +
    'Thanks for your contribution!\n\nBest regards,\nGitHub Team',
});

export class ManualClock {
  constructor(private current: number = Date.parse('2025-03-14T09:30:00.000Z')) {}

  now = (): Date => new Date(this.current);

  nowMs = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export class FakeClassifier implements ClassifierService {
  calls: string[] = [];

  constructor(private response: Classification | Error) {}

  async classify(text: string): Promise<Classification> {
    this.calls.push(text);
    if (this.response instanceof Error) throw this.response;
    return this.response;
  }
}

export class FakeReasoning implements ReasoningService {
  prompts: string[] = [];

  constructor(private response: string | Error) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.response instanceof Error) throw this.response;
    return this.response;
  }
}

export interface TestStores {
  db: Database.Database;
  clock: ManualClock;
  userContext: UserContextStore;
  sessions: SessionStore;
  scanStore: ScanStore;
  feedbackStore: FeedbackStore;
  documents: DocumentStore;
}

export function createStores(clock = new ManualClock()): TestStores {
  const db = openDatabase(':memory:');
  return {
    db,
    clock,
    userContext: new UserContextStore(db, clock.now),
    sessions: new SessionStore(db, clock.now),
    scanStore: new ScanStore(db),
    feedbackStore: new FeedbackStore(db, clock.now),
    documents: new DocumentStore(db, clock.now),
  };
}

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    userId: 'user-1',
    personalInfo: {},
    contacts: [],
    organizations: [],
    previousScams: [],
    riskProfile: {},
    preferences: {},
    createdAt: '2025-03-14T09:30:00.000Z',
    updatedAt: '2025-03-14T09:30:00.000Z',
    ...overrides,
  };
}

export function makeHistoryEntry(
  bodySnippet: string,
  overrides: Partial<ConversationHistoryEntry> = {},
): ConversationHistoryEntry {
  return {
    id: 1,
    userId: 'user-1',
    sender: 'colleague@example.com',
    subject: 'Update',
    bodySnippet,
    timestamp: '2025-03-13T09:30:00.000Z',
    isReply: false,
    threadId: 'thread-1',
    ...overrides,
  };
}

export function makeRuleResult(overrides: Partial<RuleStageResult> = {}): RuleStageResult {
  return {
    stage: 'layer1',
    status: 'clean',
    confidence: 0.95,
    indicators: [],
    cached: false,
    checksPerformed: [],
    processingTime: 0,
    ...overrides,
  };
}

export function makeScanRecord(overrides: Partial<ScanRecord> = {}): ScanRecord {
  return {
    scanId: 'scan_20250314_093000_user-1_0000abcd',
    userId: 'user-1',
    scanType: 'full',
    email: { sender: 'colleague@example.com', subject: 'Lunch on Friday', date: '2025-03-14T09:30:00.000Z' },
    layers: { layer1: makeRuleResult() },
    finalVerdict: 'safe',
    threatLevel: 'low',
    confidence: 0.95,
    processingTime: 0.012,
    timestamp: '2025-03-14T09:30:00.000Z',
    ...overrides,
  };
}
