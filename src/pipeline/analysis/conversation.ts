import type { NormalizedEmail } from '../../email/types.js';
import type { ConversationHistoryEntry } from '../../store/types.js';

export type Tone = 'urgent' | 'polite' | 'demanding' | 'neutral';

export interface ConversationAnalysis {
  indicators: string[];
  isReply: boolean;
  priorMessages: number;
  currentTone: Tone;
  /** Dominant tone of the recent history, when there is enough of it. */
  historicalTone?: Tone;
}

export const TONE_SHIFT_INDICATOR = 'Tone shift detected - possible account compromise';

/** Tie-break order for the dominant tone. */
const TONE_PRIORITY: Tone[] = ['urgent', 'polite', 'demanding', 'neutral'];

const TONE_KEYWORDS: Array<[Exclude<Tone, 'neutral'>, string[]]> = [
  ['urgent', ['urgent', 'immediate', 'deadline']],
  ['polite', ['please', 'kindly', 'thank you']],
  ['demanding', ['must', 'required', 'mandatory']],
];

const REPLY_MARKER = /^\s*(re|fwd|fw)\s*:/i;
const TONE_WINDOW = 3;

/**
 * Compare an email with the user's history with the same sender.
 *
 * @param history Prior entries with this sender, newest first.
 */
export function analyzeConversation(
  email: NormalizedEmail,
  history: readonly ConversationHistoryEntry[],
): ConversationAnalysis {
  const indicators: string[] = [];
  const isReply = REPLY_MARKER.test(email.subject);
  const currentTone = detectTone(email.body);

  if (isReply) {
    indicators.push('Part of an email thread (reply or forward)');
  }

  if (history.length > 0) {
    indicators.push(`Previous conversation history with sender (${history.length} messages)`);
  }

  let historicalTone: Tone | undefined;
  if (history.length >= TONE_WINDOW) {
    historicalTone = dominantTone(history.slice(0, TONE_WINDOW).map(entry => detectTone(entry.bodySnippet)));
    if (historicalTone !== currentTone) {
      indicators.push(TONE_SHIFT_INDICATOR);
    }
  }

  return {
    indicators,
    isReply,
    priorMessages: history.length,
    currentTone,
    historicalTone,
  };
}

/** First tone whose keywords appear, checked urgent, polite, demanding. */
export function detectTone(text: string): Tone {
  const lower = text.toLowerCase();
  for (const [tone, keywords] of TONE_KEYWORDS) {
    if (keywords.some(k => lower.includes(k))) return tone;
  }
  return 'neutral';
}

/** Most frequent tone; ties go to the earlier tone in urgent > polite > demanding > neutral. */
export function dominantTone(tones: readonly Tone[]): Tone {
  let best: Tone = 'neutral';
  let bestCount = 0;
  for (const tone of TONE_PRIORITY) {
    const count = tones.filter(t => t === tone).length;
    if (count > bestCount) {
      best = tone;
      bestCount = count;
    }
  }
  return best;
}
