import { describe, it, expect } from 'vitest';
import { analyzeImpersonation, registeredLabel } from '../../../../src/pipeline/analysis/impersonation.js';
import { makeEmail, makeProfile } from '../../../support/fixtures.js';

describe('analyzeImpersonation', () => {
  const profile = makeProfile({ contacts: [{ name: 'Alice Chen', email: 'alice@partner.com' }] });

  it('flags a known contact named by an unknown address as high risk', () => {
    const result = analyzeImpersonation(
      makeEmail({ sender: 'alice.chen@gmail.com', body: 'Hi, Alice Chen asked me to send the wire details.' }),
      profile,
    );
    expect(result).toEqual({
      risk: 'high',
      indicators: ['Mentions contact Alice Chen but sent from alice.chen@gmail.com'],
    });
  });

  it('does not flag the contact writing from their own address', () => {
    const result = analyzeImpersonation(
      makeEmail({ sender: 'alice@partner.com', body: 'Alice Chen here, see attached.' }),
      profile,
    );
    expect(result).toEqual({ risk: 'low', indicators: [] });
  });

  it('flags a brand name outside the brand domain as medium risk', () => {
    const result = analyzeImpersonation(makeEmail({ sender: 'security@paypal-support.com' }), makeProfile());
    expect(result).toEqual({
      risk: 'medium',
      indicators: ["Sender address references paypal but is not from paypal's own domain"],
    });
  });

  it('accepts a brand writing from its own domain', () => {
    expect(analyzeImpersonation(makeEmail({ sender: 'service@mail.paypal.com' }), makeProfile()).risk)
      .toBe('low');
  });

  it('keeps the highest risk when both rules fire', () => {
    const result = analyzeImpersonation(
      makeEmail({ sender: 'amazon-billing@gmail.com', body: 'Alice Chen approved this order.' }),
      profile,
    );
    expect(result.risk).toBe('high');
    expect(result.indicators).toHaveLength(2);
  });
});

describe('registeredLabel', () => {
  it('returns the label left of the public suffix', () => {
    expect(registeredLabel('mail.paypal.com')).toBe('paypal');
    expect(registeredLabel('www.example.co.uk')).toBe('example');
    expect(registeredLabel('localhost')).toBe('localhost');
    expect(registeredLabel('')).toBe('');
  });
});
