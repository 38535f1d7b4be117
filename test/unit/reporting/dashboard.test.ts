import { describe, it, expect } from 'vitest';
import { buildDashboard, riskLevelFor, threatPercentage } from '../../../src/reporting/dashboard.js';
import { createStores, makeScanRecord } from '../../support/fixtures.js';

describe('buildDashboard', () => {
  it('summarizes scans, profile and sessions', () => {
    const stores = createStores();
    stores.scanStore.save(makeScanRecord({ scanId: 's1', finalVerdict: 'threat', threatLevel: 'high' }));
    stores.scanStore.save(makeScanRecord({ scanId: 's2' }));
    stores.scanStore.save(makeScanRecord({ scanId: 's3' }));
    stores.userContext.addContacts('user-1', [{ name: 'Alice', email: 'alice@example.com' }]);
    stores.sessions.open('user-1', 'scammer@evil.test', 10);

    const dashboard = buildDashboard('user-1', stores);

    expect(dashboard.statistics).toEqual({ total: 3, threats: 1, suspicious: 0, safe: 2, errors: 0 });
    expect(dashboard.threatPercentage).toBe(33.3);
    expect(dashboard.riskLevel).toBe('high');
    expect(dashboard.recentActivity).toHaveLength(3);
    expect(dashboard.recentThreats.map(s => s.scanId)).toEqual(['s1']);
    expect(dashboard.profile.contactsCount).toBe(1);
    expect(dashboard.activeSessions).toBe(1);
    expect(dashboard.protectionStatus).toBe('active');
  });

  it('is empty and low risk for a new user', () => {
    const dashboard = buildDashboard('new-user', createStores());
    expect(dashboard.statistics.total).toBe(0);
    expect(dashboard.threatPercentage).toBe(0);
    expect(dashboard.riskLevel).toBe('low');
  });
});

describe('threatPercentage', () => {
  it('rounds to one decimal', () => {
    expect(threatPercentage({ total: 7, threats: 1, suspicious: 0, safe: 6, errors: 0 })).toBe(14.3);
  });
});

describe('riskLevelFor', () => {
  it('uses 5 and 20 percent as the boundaries', () => {
    expect(riskLevelFor(5)).toBe('low');
    expect(riskLevelFor(5.1)).toBe('medium');
    expect(riskLevelFor(20)).toBe('medium');
    expect(riskLevelFor(20.1)).toBe('high');
  });
});
