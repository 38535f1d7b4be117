import type { EmailNormalizer } from '../email/normalizer.js';
import type { EscalationOrchestrator } from '../pipeline/orchestrator.js';
import type { ScanMetrics } from '../reporting/metrics.js';
import type { DatabaseCheck } from '../store/database.js';
import type { DocumentStore } from '../store/document-store.js';
import type { FeedbackStore } from '../store/feedback-store.js';
import type { ScanStore } from '../store/scan-store.js';
import type { SessionStore } from '../store/session-store.js';
import type { UserContextStore } from '../store/user-context-store.js';

/** Services the route handlers run against. Built once at startup. */
export interface ApiContext {
  orchestrator: EscalationOrchestrator;
  normalizer: EmailNormalizer;
  userContext: UserContextStore;
  sessions: SessionStore;
  scanStore: ScanStore;
  feedbackStore: FeedbackStore;
  documentStore: DocumentStore;
  metrics: ScanMetrics;
  checkDatabase: () => DatabaseCheck;
  services: {
    classifier: boolean;
    reasoning: boolean;
    layer2Enabled: boolean;
    layer3Enabled: boolean;
  };
  version: string;
  /** Epoch milliseconds. */
  startedAt: number;
  now?: () => number;
}
