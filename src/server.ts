import * as path from 'node:path';
import type Database from 'better-sqlite3';
import { serve, type ServerType } from '@hono/node-server';
import { loadConfig, defaultStateDir } from './config/loader.js';
import type { PhishScopeConfig } from './config/schema.js';
import { createLogger } from './logging/logger.js';
import { EmailNormalizer } from './email/normalizer.js';
import { ScanCache } from './cache/scan-cache.js';
import { ClassifierClient, type ClassifierService } from './services/classifier-client.js';
import { AnthropicReasoningClient, type ReasoningService } from './services/reasoning-client.js';
import { openDatabase, checkDatabase } from './store/database.js';
import { UserContextStore } from './store/user-context-store.js';
import { SessionStore } from './store/session-store.js';
import { ScanStore } from './store/scan-store.js';
import { FeedbackStore } from './store/feedback-store.js';
import { DocumentStore } from './store/document-store.js';
import { RuleEngine } from './pipeline/stages/rule-engine.js';
import { ClassifierStage } from './pipeline/stages/classifier-stage.js';
import { ContextualDetective } from './pipeline/stages/detective.js';
import { SocialEngineeringAnalyzer } from './pipeline/analysis/social-engineering.js';
import { EscalationOrchestrator } from './pipeline/orchestrator.js';
import { AuditLogger } from './reporting/audit-logger.js';
import { ScanMetrics } from './reporting/metrics.js';
import { createRouter, type FetchHandler } from './api/router.js';

export const VERSION = '0.1.0';

const log = createLogger('server');

/** Replacements for the external services, mainly for tests. */
export interface ServiceOverrides {
  classifier?: ClassifierService | null;
  reasoning?: ReasoningService | null;
  now?: () => Date;
}

/**
 * PhishScope HTTP server.
 *
 * Builds every store, stage and service once from the configuration and
 * serves the API router through the Node HTTP adapter.
 */
export class PhishScopeServer {
  private config: PhishScopeConfig;
  private db: Database.Database;
  private cache: ScanCache;
  private sessions: SessionStore;
  private handler: FetchHandler;
  private httpServer: ServerType | null = null;

  constructor(config: PhishScopeConfig = loadConfig(), overrides: ServiceOverrides = {}) {
    this.config = config;
    const stateDir = defaultStateDir();
    const now = overrides.now ?? (() => new Date());

    this.db = openDatabase(config.database.path ?? path.join(stateDir, 'phishscope.db'));
    this.cache = new ScanCache({
      cacheDir: config.cache.dir ?? path.join(stateDir, 'cache'),
      cacheTtlHours: config.cache.ttlHours,
      now: () => now().getTime(),
    });

    const classifier = overrides.classifier !== undefined
      ? overrides.classifier
      : config.classifier.enabled
        ? new ClassifierClient({ apiUrl: config.classifier.apiUrl, timeoutMs: config.classifier.timeoutMs })
        : null;

    const reasoning = overrides.reasoning !== undefined
      ? overrides.reasoning
      : config.reasoning.apiKey
        ? new AnthropicReasoningClient({
          apiKey: config.reasoning.apiKey,
          model: config.reasoning.model,
          maxTokens: config.reasoning.maxTokens,
          timeoutMs: config.reasoning.timeoutMs,
        })
        : null;

    const userContext = new UserContextStore(this.db, now);
    this.sessions = new SessionStore(this.db, now);
    const scanStore = new ScanStore(this.db);
    const metrics = new ScanMetrics();

    const orchestrator = new EscalationOrchestrator({
      ruleEngine: new RuleEngine(this.cache),
      classifierStage: new ClassifierStage(classifier),
      detective: new ContextualDetective({
        userContext,
        sessions: this.sessions,
        socialEngineering: new SocialEngineeringAnalyzer(reasoning),
        conversationTimeoutHours: config.conversation.timeoutHours,
      }),
      scanStore,
      userContext,
      sessions: this.sessions,
      auditLogger: new AuditLogger({
        logDir: config.audit.logDir ?? path.join(stateDir, 'logs'),
        enabled: config.audit.enabled,
      }),
      metrics,
      stages: config.stages,
      now,
    });

    this.handler = createRouter({
      orchestrator,
      normalizer: new EmailNormalizer(config.limits, now),
      userContext,
      sessions: this.sessions,
      scanStore,
      feedbackStore: new FeedbackStore(this.db, now),
      documentStore: new DocumentStore(this.db, now),
      metrics,
      checkDatabase: () => checkDatabase(this.db),
      services: {
        classifier: classifier !== null,
        reasoning: reasoning !== null,
        layer2Enabled: config.stages.layer2Enabled,
        layer3Enabled: config.stages.layer3Enabled,
      },
      version: VERSION,
      startedAt: now().getTime(),
      now: () => now().getTime(),
    });

    if (!classifier) log.info('No classifier configured; Stage 2 will escalate every email');
    if (!reasoning) log.info('No reasoning service configured; Stage 3 uses keyword analysis');
  }

  /** The fetch handler serving the API. */
  getHandler(): FetchHandler {
    return this.handler;
  }

  async start(): Promise<void> {
    const prunedEntries = await this.cache.prune();
    const prunedSessions = this.sessions.pruneExpired();
    log.debug(`Pruned ${prunedEntries} cache entries and ${prunedSessions} sessions`);

    const { host, port } = this.config.server;
    this.httpServer = serve({ fetch: this.handler, hostname: host, port }, info => {
      log.info(`PhishScope v${VERSION} listening on http://${host}:${info.port}`);
    });

    this.setupGracefulShutdown();
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
    }
    this.db.close();
  }

  private setupGracefulShutdown(): void {
    const cleanup = async () => {
      try {
        await this.stop();
        process.exit(0);
      } catch (error: unknown) {
        log.error('Cleanup error', error);
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void cleanup());
    process.once('SIGTERM', () => void cleanup());
  }
}
