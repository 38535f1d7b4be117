import type { Dashboard } from '../reporting/dashboard.js';
import type { MetricsSnapshot } from '../reporting/metrics.js';
import type {
  ContextStatistics,
  ScanStatistics,
  StoredScan,
  SuspectRecord,
  UserDocument,
  UserDocumentSummary,
  UserProfile,
} from '../store/types.js';

type Json = Record<string, unknown>;

export function serializeProfile(profile: UserProfile): Json {
  return {
    user_id: profile.userId,
    personal_info: profile.personalInfo,
    contacts: profile.contacts,
    organizations: profile.organizations,
    previous_scams: profile.previousScams,
    risk_profile: profile.riskProfile,
    preferences: profile.preferences,
    created_at: profile.createdAt,
    updated_at: profile.updatedAt,
  };
}

export function serializeSuspect(suspect: SuspectRecord): Json {
  return {
    sender_email: suspect.sender,
    sender_name: suspect.senderName,
    tactics_used: suspect.tacticsUsed,
    threat_level: suspect.threatLevel,
    social_engineering_score: suspect.socialEngineeringScore,
    email_metadata: suspect.emailMetadata,
    frequency_count: suspect.frequencyCount,
    first_seen: suspect.firstSeen,
    last_seen: suspect.lastSeen,
  };
}

export function serializeStoredScan(scan: StoredScan): Json {
  return {
    scan_id: scan.scanId,
    timestamp: scan.timestamp,
    user_id: scan.userId,
    scan_type: scan.scanType,
    email: { sender: scan.sender, subject: scan.subject, date: scan.emailDate },
    layers: scan.layers,
    final_verdict: scan.finalVerdict,
    threat_level: scan.threatLevel,
    confidence_score: scan.confidence,
    processing_time: scan.processingTime,
    error: scan.error,
  };
}

/** Short form used in dashboard activity lists. */
function summarizeScan(scan: StoredScan): Json {
  return {
    scan_id: scan.scanId,
    timestamp: scan.timestamp,
    sender: scan.sender,
    subject: scan.subject,
    final_verdict: scan.finalVerdict,
    threat_level: scan.threatLevel,
    confidence_score: scan.confidence,
  };
}

export function serializeDashboard(dashboard: Dashboard): Json {
  return {
    user_id: dashboard.userId,
    statistics: {
      total_scans: dashboard.statistics.total,
      threats_detected: dashboard.statistics.threats,
      suspicious_emails: dashboard.statistics.suspicious,
      safe_emails: dashboard.statistics.safe,
      errors: dashboard.statistics.errors,
      threat_percentage: dashboard.threatPercentage,
      risk_level: dashboard.riskLevel,
    },
    recent_activity: dashboard.recentActivity.map(summarizeScan),
    recent_threats: dashboard.recentThreats.map(summarizeScan),
    user_profile: {
      contacts_count: dashboard.profile.contactsCount,
      organizations_count: dashboard.profile.organizationsCount,
      risk_profile: dashboard.profile.riskProfile,
      preferences: dashboard.profile.preferences,
    },
    active_sessions: dashboard.activeSessions,
    protection_status: dashboard.protectionStatus,
  };
}

export function serializeMetrics(snapshot: MetricsSnapshot): Json {
  return {
    scans_total: snapshot.scansTotal,
    verdicts: snapshot.verdicts,
    stopped_at: snapshot.stoppedAt,
    cache: {
      hits: snapshot.cacheHits,
      misses: snapshot.cacheMisses,
      hit_rate: snapshot.cacheHitRate,
    },
    classifier_failures: snapshot.classifierFailures,
    average_processing_time: snapshot.averageProcessingTime,
    p95_processing_time: snapshot.p95ProcessingTime,
  };
}

export function serializeDocumentSummary(document: UserDocumentSummary): Json {
  return {
    id: document.id,
    name: document.name,
    type: document.type,
    summary: document.summary,
    size: document.size,
    tags: document.tags,
    uploaded_at: document.uploadedAt,
    access_count: document.accessCount,
  };
}

export function serializeDocument(document: UserDocument): Json {
  return {
    ...serializeDocumentSummary(document),
    content: document.content,
    last_accessed: document.lastAccessedAt,
  };
}

export function serializeContextStatistics(
  context: ContextStatistics,
  scans: ScanStatistics,
  trainingSamples: number,
  documents: number,
): Json {
  return {
    total_users: context.users,
    total_suspects: context.suspects,
    avg_suspect_frequency: context.avgSuspectFrequency,
    total_conversations: context.conversations,
    total_scans: scans.total,
    threats_detected: scans.threats,
    training_samples: trainingSamples,
    total_documents: documents,
  };
}
