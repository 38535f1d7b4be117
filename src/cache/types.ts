/** Stage 1 verdicts worth remembering. */
export type CachedVerdict = 'clean' | 'threat';

export interface CacheEntry {
  fingerprint: string;
  verdict: CachedVerdict;
  confidence: number;
  indicators: string[];
  /** Epoch milliseconds. */
  createdAt: number;
}
