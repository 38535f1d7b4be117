import type { ScanStore } from '../store/scan-store.js';
import type { SessionStore } from '../store/session-store.js';
import type { UserContextStore } from '../store/user-context-store.js';
import type { JsonObject, ScanStatistics, StoredScan } from '../store/types.js';

export type DashboardRiskLevel = 'low' | 'medium' | 'high';

export interface Dashboard {
  userId: string;
  statistics: ScanStatistics;
  /** Threat verdicts as a percentage of all scans, one decimal. */
  threatPercentage: number;
  riskLevel: DashboardRiskLevel;
  recentActivity: StoredScan[];
  recentThreats: StoredScan[];
  profile: {
    contactsCount: number;
    organizationsCount: number;
    riskProfile: JsonObject;
    preferences: JsonObject;
  };
  activeSessions: number;
  protectionStatus: 'active';
}

const RECENT_ACTIVITY = 10;
const RECENT_THREATS = 5;

export function buildDashboard(
  userId: string,
  stores: { scanStore: ScanStore; userContext: UserContextStore; sessions: SessionStore },
): Dashboard {
  const statistics = stores.scanStore.getStatistics(userId);
  const profile = stores.userContext.getUserExperience(userId);
  const pct = threatPercentage(statistics);

  return {
    userId,
    statistics,
    threatPercentage: pct,
    riskLevel: riskLevelFor(pct),
    recentActivity: stores.scanStore.getHistory(userId, RECENT_ACTIVITY).scans,
    recentThreats: stores.scanStore.getRecentThreats(userId, RECENT_THREATS),
    profile: {
      contactsCount: profile.contacts.length,
      organizationsCount: profile.organizations.length,
      riskProfile: profile.riskProfile,
      preferences: profile.preferences,
    },
    activeSessions: stores.sessions.listActive(userId).length,
    protectionStatus: 'active',
  };
}

export function threatPercentage(statistics: ScanStatistics): number {
  if (statistics.total === 0) return 0;
  return Math.round((statistics.threats / statistics.total) * 1000) / 10;
}

export function riskLevelFor(threatPct: number): DashboardRiskLevel {
  if (threatPct > 20) return 'high';
  if (threatPct > 5) return 'medium';
  return 'low';
}
