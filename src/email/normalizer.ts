import type { NormalizedEmail, NormalizerLimits, RawEmail } from './types.js';

const DEFAULT_LIMITS: NormalizerLimits = {
  maxBodyLength: 50_000,
  maxUrls: 10,
};

const URL_PATTERN = /https?:\/\/[^\s<>"')\]]+/gi;
const EMAIL_PATTERN = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/gi;
const PHONE_PATTERN = /(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g;
const NAMED_ADDRESS = /^\s*"?([^"<]*?)"?\s*<([^>]+)>\s*$/;

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

/**
 * Turns a raw email payload into a {@link NormalizedEmail}:
 * HTML is reduced to text, whitespace collapsed, the body capped,
 * and URLs, addresses and phone numbers extracted.
 */
export class EmailNormalizer {
  private limits: NormalizerLimits;

  constructor(limits?: Partial<NormalizerLimits>, private now: () => Date = () => new Date()) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  normalize(raw: RawEmail): NormalizedEmail {
    const { address, name } = this.parseSender(raw.sender ?? raw.from ?? '');
    const rawBody = raw.body ?? '';
    const body = this.cleanBody(rawBody).slice(0, this.limits.maxBodyLength);

    // hrefs disappear with the markup, so URLs come from the raw body
    const urls = unique(rawBody.match(URL_PATTERN) ?? [])
      .map(url => decodeEntities(url).replace(/[.,;:!?]+$/, ''))
      .slice(0, this.limits.maxUrls);

    return {
      sender: address,
      senderName: name,
      subject: this.cleanLine(raw.subject ?? ''),
      body,
      urls,
      emails: unique((body.match(EMAIL_PATTERN) ?? []).map(e => e.toLowerCase())),
      phones: unique(body.match(PHONE_PATTERN) ?? []),
      timestamp: this.parseDate(raw.date),
    };
  }

  private parseSender(value: string): { address: string; name?: string } {
    const named = NAMED_ADDRESS.exec(value);
    if (named) {
      const name = named[1].trim();
      return { address: named[2].trim().toLowerCase(), name: name || undefined };
    }
    return { address: value.trim().toLowerCase() };
  }

  private cleanLine(value: string): string {
    return decodeEntities(stripControlChars(value)).replace(/\s+/g, ' ').trim();
  }

  private cleanBody(value: string): string {
    const text = value
      .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
      .replace(/<br\s*\/?>/gi, '\n')
      .replace(/<\/(p|div|li|tr|h[1-6])\s*>/gi, '\n')
      .replace(/<[^>]+>/g, ' ');

    return decodeEntities(stripControlChars(text))
      .replace(/\r\n?/g, '\n')
      .split('\n')
      .map(line => line.replace(/[ \t\f\v]+/g, ' ').trim())
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  private parseDate(value?: string): string {
    if (value) {
      const parsed = new Date(value);
      if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
    }
    return this.now().toISOString();
  }
}

function decodeEntities(value: string): string {
  return value
    .replace(/&(amp|lt|gt|quot|apos|nbsp|#39);/g, entity => HTML_ENTITIES[entity] ?? entity)
    .replace(/&#(\d{1,7});/g, (entity, code: string) => {
      const point = Number(code);
      return point <= 0x10ffff ? String.fromCodePoint(point) : entity;
    });
}

function stripControlChars(value: string): string {
  // Keep tab and newline
  return value.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\u200B-\u200D\u2060\uFEFF]/g, '');
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
