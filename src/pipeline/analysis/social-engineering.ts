import { z } from 'zod';
import { createLogger } from '../../logging/logger.js';
import type { NormalizedEmail } from '../../email/types.js';
import type { ReasoningService } from '../../services/reasoning-client.js';
import type { UserProfile } from '../../store/types.js';
import type { PriorStages } from '../types.js';

const log = createLogger('social-engineering');

export interface SocialEngineeringAnalysis {
  /** 0 - 100 */
  score: number;
  tactics: string[];
  analysis: string;
  source: 'reasoning' | 'fallback';
}

/** Score used when a response mentions no usable score. */
export const DEFAULT_REASONING_SCORE = 50;

const FALLBACK_POINTS_PER_CATEGORY = 15;

const TACTIC_KEYWORDS: Record<string, string[]> = {
  urgency: ['urgent', 'immediate', 'expires', 'deadline', 'asap'],
  authority: ['bank', 'security', 'admin', 'manager', 'government'],
  fear: ['suspended', 'locked', 'blocked', 'terminated', 'fraud'],
  reward: ['winner', 'prize', 'reward', 'bonus', 'gift'],
  curiosity: ['confidential', 'secret', 'exclusive', 'private'],
};

const ReasoningResponseSchema = z.object({
  score: z.coerce.number(),
  tactics: z.array(z.string()).default([]),
  analysis: z.string().optional(),
});

/**
 * Social engineering assessment for Stage 3.
 *
 * Uses the reasoning service when one is configured and falls back to
 * keyword categories when it is absent or fails.
 */
export class SocialEngineeringAnalyzer {
  constructor(private reasoning: ReasoningService | null) {}

  async analyze(
    email: NormalizedEmail,
    profile: UserProfile,
    prior: PriorStages,
  ): Promise<SocialEngineeringAnalysis> {
    if (!this.reasoning) return keywordFallback(email);

    let response: string;
    try {
      response = await this.reasoning.generate(buildPrompt(email, profile, prior));
    } catch (error) {
      log.warn('Reasoning service failed, using keyword analysis', error);
      return keywordFallback(email);
    }

    const parsed = parseReasoningResponse(response);
    return { ...parsed, source: 'reasoning' };
  }
}

export function buildPrompt(email: NormalizedEmail, profile: UserProfile, prior: PriorStages): string {
  const layer2 = prior.layer2;
  const classifierLine = !layer2
    ? 'not run'
    : layer2.status === 'error'
      ? `unavailable (${layer2.error})`
      : `${layer2.label} at ${layer2.confidence.toFixed(2)}${layer2.manualOverride ? ', overridden by rule indicators' : ''}`;

  return [
    'Assess the following email for social engineering.',
    '',
    `From: ${email.senderName ? `${email.senderName} <${email.sender}>` : email.sender}`,
    `Subject: ${email.subject}`,
    'Body:',
    email.body.slice(0, 4000),
    '',
    'Recipient context:',
    `- Personal info: ${JSON.stringify(profile.personalInfo)}`,
    `- Known contacts: ${profile.contacts.map(c => c.email).join(', ') || 'none'}`,
    `- Organizations: ${profile.organizations.map(o => o.domain).join(', ') || 'none'}`,
    `- Risk profile: ${JSON.stringify(profile.riskProfile)}`,
    '',
    'Earlier checks:',
    `- Rule engine: ${prior.layer1.status} (${prior.layer1.indicators.join('; ') || 'no indicators'})`,
    `- Classifier: ${classifierLine}`,
    '',
    'Respond with JSON only:',
    '{"score": <0-100 social engineering likelihood>, "tactics": [<tactic names>], "analysis": "<one paragraph>"}',
  ].join('\n');
}

/**
 * Read a reasoning response. JSON is preferred; otherwise the first number
 * on a line mentioning "score" and the bullets following a "tactics" line.
 */
export function parseReasoningResponse(text: string): Omit<SocialEngineeringAnalysis, 'source'> {
  const json = extractJsonObject(text);
  if (json !== undefined) {
    const parsed = ReasoningResponseSchema.safeParse(json);
    if (parsed.success && Number.isFinite(parsed.data.score)) {
      return {
        score: clampScore(parsed.data.score),
        tactics: parsed.data.tactics.map(t => t.trim()).filter(Boolean),
        analysis: parsed.data.analysis ?? text.trim(),
      };
    }
  }

  let score = DEFAULT_REASONING_SCORE;
  let scoreFound = false;
  const tactics: string[] = [];
  let inTactics = false;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    const lower = line.toLowerCase();

    if (!scoreFound && lower.includes('score')) {
      // Skip list numbering and ranges such as "(0-100)"
      const value = lower
        .replace(/^\d+[.)]\s*/, '')
        .replace(/\(\s*\d+\s*[-–]\s*\d+\s*\)/g, '')
        .match(/\d+(?:\.\d+)?/);
      if (value) {
        score = clampScore(parseFloat(value[0]));
        scoreFound = true;
      }
    }

    if (lower.includes('tactics')) {
      inTactics = true;
      continue;
    }

    if (inTactics) {
      if (/^[-*•]\s*/.test(line)) {
        const tactic = line.replace(/^[-*•]\s*/, '').trim();
        if (tactic) tactics.push(tactic);
      } else if (line && !/^\s/.test(rawLine)) {
        inTactics = false;
      }
    }
  }

  return { score, tactics, analysis: text.trim() };
}

/** Keyword categories; each category that appears adds 15 points. */
export function keywordFallback(email: NormalizedEmail): SocialEngineeringAnalysis {
  const text = `${email.subject} ${email.body}`.toLowerCase();
  const tactics = Object.entries(TACTIC_KEYWORDS)
    .filter(([, keywords]) => keywords.some(k => text.includes(k)))
    .map(([category]) => category);

  const score = Math.min(tactics.length * FALLBACK_POINTS_PER_CATEGORY, 100);
  return {
    score,
    tactics,
    analysis: tactics.length > 0
      ? `Keyword analysis found ${tactics.join(', ')} tactics.`
      : 'Keyword analysis found no social engineering tactics.',
    source: 'fallback',
  };
}

function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

function clampScore(value: number): number {
  return Math.round(Math.min(Math.max(value, 0), 100));
}
