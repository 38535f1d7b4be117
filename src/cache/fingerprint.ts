import * as crypto from 'node:crypto';

const REPLY_PREFIX = /^\s*((re|fwd?|aw|sv)\s*:\s*)+/i;

/**
 * SHA-256 keys for scan deduplication and conversation threading.
 * Neither hash is reversible back to the email content.
 */
export class EmailFingerprinter {
  /**
   * Cache key: SHA-256 hex of `sender + subject`, concatenated as-is.
   */
  fingerprint(sender: string, subject: string): string {
    return sha256(`${sender}${subject}`);
  }

  /**
   * Thread key for conversation history. Reply and forward prefixes are
   * stripped and the subject lowercased, so a reply joins its original thread.
   */
  threadId(userId: string, sender: string, subject: string): string {
    return sha256(`${userId}_${sender}_${normalizeSubject(subject)}`);
  }
}

export function normalizeSubject(subject: string): string {
  return subject
    .replace(REPLY_PREFIX, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

function sha256(value: string): string {
  return crypto.createHash('sha256').update(value, 'utf-8').digest('hex');
}
