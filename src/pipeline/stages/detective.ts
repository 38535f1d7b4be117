import { createLogger } from '../../logging/logger.js';
import type { NormalizedEmail } from '../../email/types.js';
import type { SessionStore } from '../../store/session-store.js';
import {
  DEFAULT_PERSONAL_INFO,
  DEFAULT_PREFERENCES,
  DEFAULT_RISK_PROFILE,
  type UserContextStore,
} from '../../store/user-context-store.js';
import type { ConversationHistoryEntry, UserProfile } from '../../store/types.js';
import { SocialEngineeringAnalyzer } from '../analysis/social-engineering.js';
import { analyzeImpersonation } from '../analysis/impersonation.js';
import { analyzeConversation } from '../analysis/conversation.js';
import { ThreatScorer } from '../analysis/scorer.js';
import type { DetectiveStageResult, PriorStages } from '../types.js';

const log = createLogger('detective');

const HISTORY_LIMIT = 10;

export interface DetectiveDependencies {
  userContext: UserContextStore;
  sessions: SessionStore;
  socialEngineering: SocialEngineeringAnalyzer;
  scorer?: ThreatScorer;
  /** Length of the monitoring window opened for flagged senders. */
  conversationTimeoutHours: number;
}

/**
 * Stage 3: contextual analysis against the user's profile and history.
 *
 * A flagged email records its sender as a suspect, opens a monitoring
 * session and joins the conversation history. Failures of those writes are
 * logged and leave the verdict unchanged.
 */
export class ContextualDetective {
  private scorer: ThreatScorer;

  constructor(private deps: DetectiveDependencies) {
    this.scorer = deps.scorer ?? new ThreatScorer();
  }

  async analyze(email: NormalizedEmail, userId: string, prior: PriorStages): Promise<DetectiveStageResult> {
    const startTime = performance.now();

    const profile = this.loadProfile(userId);
    const socialEngineering = await this.deps.socialEngineering.analyze(email, profile, prior);
    const impersonation = analyzeImpersonation(email, profile);
    const conversation = analyzeConversation(email, this.loadHistory(userId, email.sender));

    const assessment = this.scorer.assess({
      socialEngineeringScore: socialEngineering.score,
      impersonationRisk: impersonation.risk,
      conversationIndicators: conversation.indicators.length,
    });

    const result: DetectiveStageResult = {
      stage: 'layer3',
      status: assessment.verdict,
      confidence: assessment.confidence,
      indicators: [
        ...socialEngineering.tactics.map(t => `Social engineering tactic: ${t}`),
        ...impersonation.indicators,
        ...conversation.indicators,
      ],
      threatLevel: assessment.threatLevel,
      socialEngineeringScore: socialEngineering.score,
      tactics: socialEngineering.tactics,
      impersonationRisk: impersonation.risk,
      totalScore: assessment.totalScore,
      detailedAnalysis: socialEngineering.analysis,
      personalRelevance: assessment.personalRelevance,
      recommendedAction: assessment.recommendedAction,
      processingTime: 0,
    };

    if (result.status !== 'safe') {
      this.recordFlagged(email, userId, result);
    }

    result.processingTime = (performance.now() - startTime) / 1000;
    return result;
  }

  private loadProfile(userId: string): UserProfile {
    try {
      return this.deps.userContext.getUserExperience(userId);
    } catch (error) {
      log.warn(`Using default profile for ${userId}`, error);
      const now = new Date().toISOString();
      return {
        userId,
        personalInfo: { ...DEFAULT_PERSONAL_INFO },
        contacts: [],
        organizations: [],
        previousScams: [],
        riskProfile: { ...DEFAULT_RISK_PROFILE },
        preferences: { ...DEFAULT_PREFERENCES },
        createdAt: now,
        updatedAt: now,
      };
    }
  }

  private loadHistory(userId: string, sender: string): ConversationHistoryEntry[] {
    try {
      return this.deps.userContext.getConversationHistory(userId, sender, HISTORY_LIMIT);
    } catch (error) {
      log.warn(`Conversation history unavailable for ${sender}`, error);
      return [];
    }
  }

  private recordFlagged(email: NormalizedEmail, userId: string, result: DetectiveStageResult): void {
    try {
      this.deps.userContext.recordSuspect({
        sender: email.sender,
        senderName: email.senderName,
        tacticsUsed: result.tactics,
        threatLevel: result.threatLevel,
        socialEngineeringScore: result.socialEngineeringScore,
        emailMetadata: { subject: email.subject, timestamp: email.timestamp },
      });
    } catch (error) {
      log.error(`Failed to record suspect ${email.sender}`, error);
    }

    try {
      this.deps.sessions.open(userId, email.sender, this.deps.conversationTimeoutHours);
    } catch (error) {
      log.error(`Failed to open monitoring session for ${email.sender}`, error);
    }

    try {
      this.deps.userContext.addConversationEntry(userId, email);
    } catch (error) {
      log.error(`Failed to record conversation history for ${email.sender}`, error);
    }
  }
}
