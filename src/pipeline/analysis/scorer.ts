import type { ImpersonationRisk, PersonalRelevance } from '../types.js';

export type DetectiveVerdict = 'threat' | 'suspicious' | 'safe';

export interface ThreatAssessment {
  totalScore: number;
  verdict: DetectiveVerdict;
  threatLevel: 'low' | 'medium' | 'high';
  confidence: number;
  personalRelevance: PersonalRelevance;
  recommendedAction: string;
}

export interface ScoringInput {
  socialEngineeringScore: number;
  impersonationRisk: ImpersonationRisk;
  conversationIndicators: number;
}

const IMPERSONATION_BONUS: Record<ImpersonationRisk, number> = {
  high: 30,
  medium: 15,
  low: 0,
};

const POINTS_PER_CONVERSATION_INDICATOR = 10;

/** Checked top to bottom; the first band whose minimum is met wins. */
const SCORE_BANDS: Array<Omit<ThreatAssessment, 'totalScore' | 'personalRelevance' | 'recommendedAction'> & { min: number }> = [
  { min: 80, verdict: 'threat', threatLevel: 'high', confidence: 0.90 },
  { min: 60, verdict: 'suspicious', threatLevel: 'medium', confidence: 0.75 },
  { min: 40, verdict: 'suspicious', threatLevel: 'low', confidence: 0.60 },
  { min: -Infinity, verdict: 'safe', threatLevel: 'low', confidence: 0.80 },
];

export const RECOMMENDED_ACTIONS: Record<DetectiveVerdict, string> = {
  threat: 'DO NOT INTERACT with this email. Delete immediately and report as phishing.',
  suspicious: 'Exercise extreme caution. Verify sender through alternative communication channel before taking any action.',
  safe: 'Email appears legitimate, but always verify requests for sensitive information.',
};

/**
 * Combines Stage 3 sub-analyses into a total score and verdict.
 */
export class ThreatScorer {
  assess(input: ScoringInput): ThreatAssessment {
    const totalScore =
      input.socialEngineeringScore +
      IMPERSONATION_BONUS[input.impersonationRisk] +
      input.conversationIndicators * POINTS_PER_CONVERSATION_INDICATOR;

    const band = scoreBand(totalScore);

    return {
      totalScore,
      verdict: band.verdict,
      threatLevel: band.threatLevel,
      confidence: band.confidence,
      personalRelevance: this.personalRelevance(totalScore),
      recommendedAction: RECOMMENDED_ACTIONS[band.verdict],
    };
  }

  private personalRelevance(totalScore: number): PersonalRelevance {
    if (totalScore > 60) return 'high';
    if (totalScore > 30) return 'medium';
    return 'low';
  }
}

function scoreBand(totalScore: number): (typeof SCORE_BANDS)[number] {
  for (const band of SCORE_BANDS) {
    if (totalScore >= band.min) return band;
  }
  return SCORE_BANDS[SCORE_BANDS.length - 1];
}
