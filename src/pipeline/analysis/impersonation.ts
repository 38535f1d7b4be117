import { senderDomain, type NormalizedEmail } from '../../email/types.js';
import type { UserProfile } from '../../store/types.js';
import type { ImpersonationRisk } from '../types.js';

export interface ImpersonationAnalysis {
  risk: ImpersonationRisk;
  indicators: string[];
}

const AUTHORITY_BRANDS = ['bank', 'paypal', 'amazon', 'microsoft', 'google', 'apple'];

/** Second-level suffixes under which the registered name sits one label further left. */
const MULTI_LABEL_SUFFIXES = new Set([
  'co.uk', 'org.uk', 'ac.uk', 'gov.uk', 'com.au', 'net.au', 'org.au',
  'co.nz', 'co.jp', 'co.in', 'com.br', 'com.mx', 'co.za', 'com.sg',
]);

const RISK_RANK: Record<ImpersonationRisk, number> = { low: 0, medium: 1, high: 2 };

/**
 * Detect senders posing as one of the user's contacts or as a well-known
 * brand.
 */
export function analyzeImpersonation(email: NormalizedEmail, profile: UserProfile): ImpersonationAnalysis {
  const sender = email.sender.toLowerCase();
  const body = email.body.toLowerCase();
  const indicators: string[] = [];
  let risk: ImpersonationRisk = 'low';

  for (const contact of profile.contacts) {
    const name = contact.name.trim().toLowerCase();
    const contactEmail = contact.email.trim().toLowerCase();
    if (!name || !contactEmail) continue;

    if (body.includes(name) && !sender.includes(contactEmail)) {
      indicators.push(`Mentions contact ${contact.name} but sent from ${email.sender}`);
      risk = raise(risk, 'high');
    }
  }

  const registered = registeredLabel(senderDomain(sender));
  for (const brand of AUTHORITY_BRANDS) {
    if (sender.includes(brand) && registered !== brand) {
      indicators.push(`Sender address references ${brand} but is not from ${brand}'s own domain`);
      risk = raise(risk, 'medium');
    }
  }

  return { risk, indicators };
}

/**
 * Registered name of a domain: "paypal" for "mail.paypal.com" and
 * "example" for "www.example.co.uk".
 */
export function registeredLabel(domain: string): string {
  const labels = domain.toLowerCase().split('.').filter(Boolean);
  if (labels.length < 2) return labels[0] ?? '';

  const lastTwo = labels.slice(-2).join('.');
  if (MULTI_LABEL_SUFFIXES.has(lastTwo) && labels.length >= 3) {
    return labels[labels.length - 3];
  }
  return labels[labels.length - 2];
}

function raise(current: ImpersonationRisk, next: ImpersonationRisk): ImpersonationRisk {
  return RISK_RANK[next] > RISK_RANK[current] ? next : current;
}
