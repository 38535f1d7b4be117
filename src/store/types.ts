import { z } from 'zod';

export type JsonObject = Record<string, unknown>;

export const ContactSchema = z.object({
  name: z.string().trim().max(200).default(''),
  email: z.string().trim().min(3).max(320),
});

export const OrganizationSchema = z.object({
  name: z.string().trim().max(200).default(''),
  domain: z.string().trim().min(1).max(253),
});

export type Contact = z.infer<typeof ContactSchema>;
export type Organization = z.infer<typeof OrganizationSchema>;

export interface UserProfile {
  userId: string;
  personalInfo: JsonObject;
  contacts: Contact[];
  organizations: Organization[];
  previousScams: JsonObject[];
  riskProfile: JsonObject;
  preferences: JsonObject;
  createdAt: string;
  updatedAt: string;
}

/** Partial profile update. Bags are merged key by key; lists replace the stored ones. */
export interface ProfilePatch {
  personalInfo?: JsonObject;
  riskProfile?: JsonObject;
  preferences?: JsonObject;
  contacts?: Contact[];
  organizations?: Organization[];
  previousScams?: JsonObject[];
}

export interface SuspectInput {
  sender: string;
  senderName?: string;
  tacticsUsed?: string[];
  threatLevel?: string;
  socialEngineeringScore?: number;
  emailMetadata?: JsonObject;
}

export interface SuspectRecord {
  sender: string;
  senderName: string | null;
  tacticsUsed: string[];
  threatLevel: string;
  socialEngineeringScore: number | null;
  emailMetadata: JsonObject;
  frequencyCount: number;
  firstSeen: string;
  lastSeen: string;
}

export interface ConversationSession {
  userId: string;
  sender: string;
  startedAt: string;
  expiresAt: string;
  status: 'monitoring';
}

export interface ConversationHistoryEntry {
  id: number;
  userId: string;
  sender: string;
  subject: string;
  bodySnippet: string;
  timestamp: string;
  isReply: boolean;
  threadId: string;
}

/** Scan record as read back from history. */
export interface StoredScan {
  scanId: string;
  userId: string;
  scanType: string;
  sender: string;
  subject: string;
  emailDate: string;
  finalVerdict: string;
  threatLevel: string;
  confidence: number;
  processingTime: number;
  timestamp: string;
  error: string | null;
  /** Stage results in their JSON form. */
  layers: unknown;
}

export interface ScanStatistics {
  total: number;
  threats: number;
  suspicious: number;
  safe: number;
  errors: number;
}

export interface TrainingSampleInput {
  emailContent: string;
  emailSubject?: string;
  emailSender?: string;
  trueLabel: string;
  userFeedback?: string;
  confidenceScore?: number;
}

export interface TrainingSample extends TrainingSampleInput {
  id: number;
  createdAt: string;
}

export interface UserDocumentInput {
  name: string;
  content: string;
  type: string;
  tags: string[];
}

/** Listing form of a stored document; the full text is fetched separately. */
export interface UserDocumentSummary {
  id: number;
  userId: string;
  name: string;
  type: string;
  summary: string;
  size: number;
  tags: string[];
  uploadedAt: string;
  accessCount: number;
}

export interface UserDocument extends UserDocumentSummary {
  content: string;
  lastAccessedAt: string | null;
}

export interface AddDocumentResult {
  status: 'created' | 'duplicate';
  documentId: number;
  documentHash: string;
}

export interface ContextStatistics {
  users: number;
  suspects: number;
  avgSuspectFrequency: number;
  conversations: number;
}
