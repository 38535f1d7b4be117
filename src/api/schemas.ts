import { z } from 'zod';
import { JsonObjectSchema } from '../store/json.js';
import { ContactSchema, OrganizationSchema } from '../store/types.js';

export const UserIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_.@+-]+$/, 'user id may only contain letters, digits and _ . @ + -');

/** POST /api/scan */
export const ScanRequestSchema = z.object({
  email_data: z.object({
    sender: z.string().max(512).optional(),
    from: z.string().max(512).optional(),
    subject: z.string().max(2_000).default(''),
    body: z.string().max(1_000_000).default(''),
    date: z.string().max(100).optional(),
  }).refine(
    email => Boolean((email.sender ?? email.from)?.trim()),
    { message: 'sender (or from) is required', path: ['sender'] },
  ),
  user_id: UserIdSchema.default('anonymous'),
  scan_type: z.string().trim().min(1).max(32).default('full'),
});

/** POST|PUT /api/user/{id}/profile */
export const ProfileUpdateSchema = z.object({
  personal_info: JsonObjectSchema.optional(),
  risk_profile: JsonObjectSchema.optional(),
  preferences: JsonObjectSchema.optional(),
  contacts: z.array(ContactSchema).optional(),
  organizations: z.array(OrganizationSchema).optional(),
  previous_scams: z.array(JsonObjectSchema).optional(),
});

/** POST /api/user/{id}/contacts */
export const AddContactsSchema = z.object({
  contacts: z.array(ContactSchema).min(1),
});

/** POST /api/user/{id}/organizations */
export const AddOrganizationsSchema = z.object({
  organizations: z.array(OrganizationSchema).min(1),
});

/** POST /api/suspect */
export const SuspectRequestSchema = z.object({
  suspect_info: z.object({
    sender: z.string().trim().min(1).max(512),
    sender_name: z.string().trim().max(200).optional(),
    tactics_used: z.array(z.string().max(200)).default([]),
    threat_level: z.string().trim().min(1).max(32).default('unknown'),
    social_engineering_score: z.number().min(0).max(100).optional(),
  }),
  email_metadata: JsonObjectSchema.optional(),
});

/** POST /api/feedback */
export const FeedbackRequestSchema = z.object({
  email_content: z.string().min(1).max(1_000_000),
  correct_label: z.string().trim().min(1).max(64),
  email_subject: z.string().max(2_000).optional(),
  email_sender: z.string().max(512).optional(),
  user_feedback: z.string().max(10_000).optional(),
  confidence_score: z.number().min(0).max(1).optional(),
});

export const MAX_HISTORY_LIMIT = 200;

/** GET /api/scan-history/{id} query string */
export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).default(50).transform(n => Math.min(n, MAX_HISTORY_LIMIT)),
  offset: z.coerce.number().int().min(0).default(0),
});

/** POST /api/user/{id}/documents */
export const AddDocumentSchema = z.object({
  name: z.string().trim().min(1).max(255).default('Untitled Document'),
  content: z.string().min(1, 'Document content required').max(1_000_000),
  type: z.string().trim().min(1).max(32).default('text'),
  tags: z.array(z.string().trim().min(1).max(64)).max(50).default([]),
});

/** Numeric document id from a path segment. */
export const DocumentIdSchema = z
  .string()
  .regex(/^[1-9]\d{0,15}$/, 'document id must be a positive integer')
  .transform(Number);

/** Sender address from a path segment. */
export const SenderParamSchema = z.string().trim().min(1).max(512);
