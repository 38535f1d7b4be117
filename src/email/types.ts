/** Email fields as they arrive at the API boundary. */
export interface RawEmail {
  sender?: string;
  from?: string;
  subject?: string;
  body?: string;
  date?: string;
}

/** Cleaned email consumed by every pipeline stage. */
export interface NormalizedEmail {
  /** Lowercased sender address (or the raw sender text when it has no address). */
  readonly sender: string;
  readonly senderName?: string;
  readonly subject: string;
  /** Plain text body. */
  readonly body: string;
  readonly urls: readonly string[];
  readonly emails: readonly string[];
  readonly phones: readonly string[];
  /** ISO 8601 timestamp of the message, or of normalization when the date is missing. */
  readonly timestamp: string;
}

export interface NormalizerLimits {
  maxBodyLength: number;
  maxUrls: number;
}

/** Domain part of an address, lowercased. Empty when there is no `@`. */
export function senderDomain(sender: string): string {
  const at = sender.lastIndexOf('@');
  return at >= 0 ? sender.slice(at + 1).toLowerCase() : '';
}
