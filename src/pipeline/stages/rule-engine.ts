import type { ScanCache } from '../../cache/scan-cache.js';
import { EmailFingerprinter } from '../../cache/fingerprint.js';
import { createLogger } from '../../logging/logger.js';
import { senderDomain, type NormalizedEmail } from '../../email/types.js';
import type { RuleStageResult } from '../types.js';

const log = createLogger('rule-engine');

/** Confidence reported when no rule fires. */
export const CLEAN_CONFIDENCE = 0.95;

export interface RuleFinding {
  ruleId: string;
  ruleName: string;
  indicator: string;
  confidence: number;
}

export interface RuleEvaluation {
  status: 'clean' | 'threat';
  confidence: number;
  findings: RuleFinding[];
}

export const CHECKS_PERFORMED = [
  'financial_terms',
  'ssn_patterns',
  'suspicious_phrases',
  'sender_blocklist',
  'free_mail_authority',
  'urgency_terms',
  'health_impersonation',
  'subject_patterns',
  'body_patterns',
  'urgency_personal_info',
  'url_shorteners',
  'sender_format',
  'suspicious_tld',
] as const;

const FINANCIAL_TERMS = [
  'ssn', 'social security', 'bank account', 'credit card',
  'routing number', 'account number', 'pin number',
];

/**
 * A line-bounded sequence of terms that must appear in order, with anything
 * between them. Regex parts carry word boundaries.
 */
export type TermSequence = readonly (string | RegExp)[];

const SSN_PHRASES = [
  /social\s+security/,
  /last\s+(?:four|4)\s+digits/,
];

const SSN_SEQUENCES: TermSequence[] = [
  [/\bssn\b/, 'number'],
  ['verify', /\bssn\b/],
];

const SUSPICIOUS_PHRASES = [
  'share it urgently asap',
  'last four digits of your ssn',
  'missing crucial details',
  'personal information',
  'public health services',
  'urgently asap',
  'share it urgently',
];

const SENDER_BLOCKLIST = [
  'suspicious-bank.com',
  'phishing-test.com',
  'fake-amazon.net',
  'secure-paypal.org',
];

const FREE_MAIL_DOMAINS = new Set([
  'gmail.com', 'yahoo.com', 'hotmail.com', 'outlook.com',
  'aol.com', 'icloud.com', 'protonmail.com', 'mail.com',
]);

const OFFICIAL_CLAIMS: Array<{ label: string; pattern: RegExp }> = [
  { label: 'government', pattern: /\bgovernment\b/ },
  { label: 'federal', pattern: /\bfederal\b/ },
  { label: 'internal revenue service', pattern: /internal revenue service/ },
  { label: 'irs', pattern: /\birs\b/ },
  { label: 'medicare', pattern: /\bmedicare\b/ },
  { label: 'medicaid', pattern: /\bmedicaid\b/ },
  { label: 'social security administration', pattern: /social security administration/ },
  { label: 'department of', pattern: /\bdepartment of\b/ },
  { label: 'official notice', pattern: /official notice/ },
  { label: 'your bank', pattern: /\byour bank\b/ },
];

const URGENCY_TERMS = [
  'urgent', 'immediately', 'asap', 'right away', 'at earliest',
  'time sensitive', 'expires soon', 'act now', 'within 24 hours',
];

const HEALTH_BENEFIT_TERMS = [
  'health benefits', 'health services', 'public health', 'medicare',
  'medicaid', 'government benefits', 'benefits verification', 'health insurance',
];

const PERSONAL_INFO_TERMS = [
  'personal information', 'personal details', 'date of birth', 'password',
  'verify your identity', 'social security', 'ssn', 'account number',
  'credit card', 'login credentials', "mother's maiden name",
];

const SUBJECT_PATTERNS: TermSequence[] = [
  ['urgent', 'verify', 'account'],
  ['click', 'here', 'immediately'],
  ['suspended', 'account'],
  ['confirm', 'identity', 'now'],
  ['limited', 'time', 'offer'],
  ['ssn', 'number', 'needed'],
  ['social', 'security', 'number'],
  ['verify', 'ssn'],
  ['last', 'four', 'digits'],
  ['personal', 'information', 'missing'],
  ['crucial', 'details', 'missing'],
  ['checkup', 'scheduled'],
  ['appointment', 'reminder'],
];

const BODY_PATTERNS: TermSequence[] = [
  ['click', 'link', 'verify'],
  ['account', 'suspended', 'verify'],
  ['urgent', 'action', 'required'],
  ['confirm', 'payment', 'information'],
  ['ssn', 'number'],
  ['social', 'security', 'number'],
  ['last', 'four', 'digits', 'ssn'],
  ['share', 'it', 'urgently'],
  ['asap', 'urgent'],
  ['personal', 'information', 'missing'],
  ['crucial', 'details', 'about', 'your'],
  ['we', 'found', 'that', 'we', 'are', 'missing'],
  ['public', 'health', 'services'],
  ['checkup', 'scheduled', 'on', 'monday'],
  ['need', 'last', 'four', 'digits'],
  ['please', 'share', 'it', 'urgently'],
];

const URL_SHORTENERS = [
  'bit.ly', 'tinyurl.com', 'short.link', 't.co', 'goo.gl',
  'ow.ly', 'is.gd', 'buff.ly', 'rebrand.ly', 'cutt.ly',
];

const SUSPICIOUS_TLDS = ['.tk', '.ml', '.ga', '.cf'];

/**
 * Stage 1: deterministic rule checks.
 *
 * Every check runs independently; the result is a threat when any check
 * fires, with the highest confidence among the fired checks. Results are
 * cached by sender+subject fingerprint.
 */
export class RuleEngine {
  constructor(
    private cache: ScanCache | null,
    private fingerprinter: EmailFingerprinter = new EmailFingerprinter(),
  ) {}

  async check(email: NormalizedEmail): Promise<RuleStageResult> {
    const startTime = performance.now();
    const fingerprint = this.fingerprinter.fingerprint(email.sender, email.subject);

    const cached = await this.cache?.lookup(fingerprint);
    if (cached) {
      log.debug(`Cache hit for ${fingerprint.slice(0, 12)}`);
      return {
        stage: 'layer1',
        status: cached.verdict,
        confidence: cached.confidence,
        indicators: cached.indicators,
        cached: true,
        checksPerformed: [...CHECKS_PERFORMED],
        processingTime: elapsedSeconds(startTime),
      };
    }

    const evaluation = this.evaluate(email);
    const indicators = evaluation.findings.map(f => f.indicator);

    await this.cache?.store(fingerprint, evaluation.status, evaluation.confidence, indicators);

    return {
      stage: 'layer1',
      status: evaluation.status,
      confidence: evaluation.confidence,
      indicators,
      cached: false,
      checksPerformed: [...CHECKS_PERFORMED],
      processingTime: elapsedSeconds(startTime),
    };
  }

  /**
   * Run every rule check without touching the cache.
   */
  evaluate(email: NormalizedEmail): RuleEvaluation {
    const subject = email.subject.toLowerCase();
    const body = email.body.toLowerCase();
    const fullText = `${subject}\n${body}`;
    const sender = email.sender.toLowerCase();
    const domain = senderDomain(sender);

    const findings: RuleFinding[] = [
      ...this.checkFinancialTerms(fullText),
      ...this.checkSsnPatterns(fullText),
      ...this.checkSuspiciousPhrases(fullText),
      ...this.checkSenderBlocklist(domain),
      ...this.checkFreeMailAuthority(domain, body),
      ...this.checkUrgency(fullText),
      ...this.checkHealthImpersonation(domain, fullText),
      ...this.checkSubjectPatterns(subject),
      ...this.checkBodyPatterns(body),
      ...this.checkUrgencyWithPersonalInfo(fullText),
      ...this.checkUrlShorteners(email.urls),
      ...this.checkSenderFormat(sender, domain),
    ];

    if (findings.length === 0) {
      return { status: 'clean', confidence: CLEAN_CONFIDENCE, findings };
    }

    return {
      status: 'threat',
      confidence: Math.max(...findings.map(f => f.confidence)),
      findings,
    };
  }

  // ---------------------------------------------------------------------------
  // R1-001: Financial information request
  // ---------------------------------------------------------------------------
  private checkFinancialTerms(text: string): RuleFinding[] {
    const matched = FINANCIAL_TERMS.filter(term => containsTerm(text, term));
    if (matched.length === 0) return [];
    return [{
      ruleId: 'R1-001',
      ruleName: 'Financial Information Request',
      indicator: `Requests sensitive financial information: ${matched.join(', ')}`,
      confidence: 0.95,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-002: SSN request phrasing
  // ---------------------------------------------------------------------------
  private checkSsnPatterns(text: string): RuleFinding[] {
    const found = SSN_PHRASES.some(p => p.test(text))
      || SSN_SEQUENCES.some(sequence => matchesInOrder(text, sequence));
    if (!found) return [];
    return [{
      ruleId: 'R1-002',
      ruleName: 'SSN Request',
      indicator: 'Social Security number request detected',
      confidence: 0.95,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-003: Known scam phrases
  // ---------------------------------------------------------------------------
  private checkSuspiciousPhrases(text: string): RuleFinding[] {
    const matched = SUSPICIOUS_PHRASES.filter(phrase => text.includes(phrase));
    if (matched.length === 0) return [];
    return [{
      ruleId: 'R1-003',
      ruleName: 'Suspicious Phrase',
      indicator: `Suspicious phrases: ${matched.map(p => `"${p}"`).join(', ')}`,
      confidence: 0.90,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-004: Sender domain blocklist (exact domain or subdomain)
  // ---------------------------------------------------------------------------
  private checkSenderBlocklist(domain: string): RuleFinding[] {
    if (!domain) return [];
    const blocked = SENDER_BLOCKLIST.find(d => domainMatches(domain, d));
    if (!blocked) return [];
    return [{
      ruleId: 'R1-004',
      ruleName: 'Blocklisted Sender',
      indicator: `Sender domain on blocklist: ${blocked}`,
      confidence: 0.90,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-005: Free-mail sender claiming official affiliation
  // ---------------------------------------------------------------------------
  private checkFreeMailAuthority(domain: string, body: string): RuleFinding[] {
    if (!FREE_MAIL_DOMAINS.has(domain)) return [];
    const claims = OFFICIAL_CLAIMS.filter(c => c.pattern.test(body)).map(c => c.label);
    if (claims.length === 0) return [];
    return [{
      ruleId: 'R1-005',
      ruleName: 'Free Mail Authority Claim',
      indicator: `Free email provider ${domain} claiming official affiliation: ${claims.join(', ')}`,
      confidence: 0.80,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-006: Two or more distinct urgency terms
  // ---------------------------------------------------------------------------
  private checkUrgency(text: string): RuleFinding[] {
    const matched = URGENCY_TERMS.filter(term => containsTerm(text, term));
    if (matched.length < 2) return [];
    return [{
      ruleId: 'R1-006',
      ruleName: 'Multiple Urgency Indicators',
      indicator: `Multiple urgency indicators: ${matched.join(', ')}`,
      confidence: 0.80,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-007: Health/benefits language from a non-government domain
  // ---------------------------------------------------------------------------
  private checkHealthImpersonation(domain: string, text: string): RuleFinding[] {
    if (isOfficialDomain(domain)) return [];
    const term = HEALTH_BENEFIT_TERMS.find(t => containsTerm(text, t));
    if (!term) return [];
    return [{
      ruleId: 'R1-007',
      ruleName: 'Health Services Impersonation',
      indicator: `Health/benefits language ("${term}") from non-official domain: ${domain || 'unknown'}`,
      confidence: 0.85,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-008: Subject patterns
  // ---------------------------------------------------------------------------
  private checkSubjectPatterns(subject: string): RuleFinding[] {
    const sequence = SUBJECT_PATTERNS.find(seq => matchesInOrder(subject, seq));
    if (!sequence) return [];
    return [{
      ruleId: 'R1-008',
      ruleName: 'Suspicious Subject',
      indicator: `Suspicious subject pattern: ${describeSequence(sequence)}`,
      confidence: 0.80,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-009: Body patterns
  // ---------------------------------------------------------------------------
  private checkBodyPatterns(body: string): RuleFinding[] {
    const sequence = BODY_PATTERNS.find(seq => matchesInOrder(body, seq));
    if (!sequence) return [];
    return [{
      ruleId: 'R1-009',
      ruleName: 'Suspicious Body',
      indicator: `Suspicious body pattern: ${describeSequence(sequence)}`,
      confidence: 0.70,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-010: Urgency combined with a personal-information request
  // ---------------------------------------------------------------------------
  private checkUrgencyWithPersonalInfo(text: string): RuleFinding[] {
    const urgent = URGENCY_TERMS.some(term => containsTerm(text, term));
    if (!urgent || !PERSONAL_INFO_TERMS.some(term => containsTerm(text, term))) return [];
    return [{
      ruleId: 'R1-010',
      ruleName: 'Urgent Personal Information Request',
      indicator: 'Urgent request for personal information',
      confidence: 0.90,
    }];
  }

  // ---------------------------------------------------------------------------
  // R1-011: URL shorteners
  // ---------------------------------------------------------------------------
  private checkUrlShorteners(urls: readonly string[]): RuleFinding[] {
    const hosts = new Set<string>();
    for (const url of urls) {
      const host = hostOf(url);
      const shortener = host ? URL_SHORTENERS.find(s => domainMatches(host, s)) : undefined;
      if (shortener) hosts.add(shortener);
    }
    return [...hosts].map(host => ({
      ruleId: 'R1-011',
      ruleName: 'URL Shortener',
      indicator: `URL shortener detected: ${host}`,
      confidence: 0.80,
    }));
  }

  // ---------------------------------------------------------------------------
  // R1-012 / R1-013: Sender reputation
  // ---------------------------------------------------------------------------
  private checkSenderFormat(sender: string, domain: string): RuleFinding[] {
    if (!sender.includes('@')) {
      return [{
        ruleId: 'R1-012',
        ruleName: 'Malformed Sender',
        indicator: 'Invalid sender format',
        confidence: 0.90,
      }];
    }

    const tld = SUSPICIOUS_TLDS.find(t => domain.endsWith(t));
    if (!tld) return [];
    return [{
      ruleId: 'R1-013',
      ruleName: 'Suspicious TLD',
      indicator: `Suspicious TLD: ${tld}`,
      confidence: 0.70,
    }];
  }
}

/** Word-start match, so "ssn" does not fire inside "classname" while "urgent" still matches "urgently". */
function containsTerm(text: string, term: string): boolean {
  return new RegExp(`\\b${escapeRegExp(term)}`).test(text);
}

/**
 * True when every part occurs on one line, each after the end of the previous
 * one. Taking the leftmost occurrence of each part keeps this linear in the
 * line length.
 */
export function matchesInOrder(text: string, sequence: TermSequence): boolean {
  return text.split('\n').some(line => {
    let from = 0;
    for (const part of sequence) {
      const end = findFrom(line, part, from);
      if (end === -1) return false;
      from = end;
    }
    return true;
  });
}

/** End offset of the first occurrence of `part` at or after `from`, or -1. */
function findFrom(line: string, part: string | RegExp, from: number): number {
  if (typeof part === 'string') {
    const at = line.indexOf(part, from);
    return at === -1 ? -1 : at + part.length;
  }
  const re = new RegExp(part.source, 'g');
  re.lastIndex = from;
  const match = re.exec(line);
  return match ? match.index + match[0].length : -1;
}

function describeSequence(sequence: TermSequence): string {
  return sequence.map(part => (typeof part === 'string' ? part : part.source)).join('.*');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function domainMatches(domain: string, candidate: string): boolean {
  return domain === candidate || domain.endsWith(`.${candidate}`);
}

function isOfficialDomain(domain: string): boolean {
  return domain.endsWith('.gov') || domain.endsWith('.mil');
}

function hostOf(url: string): string | undefined {
  const match = /^https?:\/\/(?:[^@/?#]*@)?([^/?#:]+)/i.exec(url);
  return match ? match[1].toLowerCase() : undefined;
}

function elapsedSeconds(startTime: number): number {
  return (performance.now() - startTime) / 1000;
}
