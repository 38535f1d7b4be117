import type { ApiContext } from '../context.js';
import { jsonResponse, parseJsonBody } from '../response.js';
import { AddContactsSchema, AddOrganizationsSchema, ProfileUpdateSchema } from '../schemas.js';
import { serializeDashboard, serializeProfile } from '../serializers.js';
import { buildDashboard } from '../../reporting/dashboard.js';

/**
 * GET /api/user/{id}/experience
 */
export function handleGetExperience(userId: string, ctx: ApiContext): Response {
  return jsonResponse(serializeProfile(ctx.userContext.getUserExperience(userId)));
}

/**
 * POST|PUT /api/user/{id}/profile
 *
 * Merges personal info, risk profile and preferences. Contacts,
 * organizations and previous scams replace the stored lists when present.
 */
export async function handleUpdateProfile(userId: string, request: Request, ctx: ApiContext): Promise<Response> {
  const parsed = await parseJsonBody(request, ProfileUpdateSchema);
  if (!parsed.ok) return parsed.response;

  const body = parsed.data;
  const profile = ctx.userContext.updateProfile(userId, {
    personalInfo: body.personal_info,
    riskProfile: body.risk_profile,
    preferences: body.preferences,
    contacts: body.contacts,
    organizations: body.organizations,
    previousScams: body.previous_scams,
  });

  return jsonResponse({ success: true, user_experience: serializeProfile(profile) });
}

/**
 * POST /api/user/{id}/contacts
 */
export async function handleAddContacts(userId: string, request: Request, ctx: ApiContext): Promise<Response> {
  const parsed = await parseJsonBody(request, AddContactsSchema);
  if (!parsed.ok) return parsed.response;

  const { profile, added } = ctx.userContext.addContacts(userId, parsed.data.contacts);
  return jsonResponse({ success: true, added, contacts: profile.contacts });
}

/**
 * POST /api/user/{id}/organizations
 */
export async function handleAddOrganizations(userId: string, request: Request, ctx: ApiContext): Promise<Response> {
  const parsed = await parseJsonBody(request, AddOrganizationsSchema);
  if (!parsed.ok) return parsed.response;

  const { profile, added } = ctx.userContext.addOrganizations(userId, parsed.data.organizations);
  return jsonResponse({ success: true, added, organizations: profile.organizations });
}

/**
 * GET /api/user/{id}/dashboard
 */
export function handleDashboard(userId: string, ctx: ApiContext): Response {
  const dashboard = buildDashboard(userId, {
    scanStore: ctx.scanStore,
    userContext: ctx.userContext,
    sessions: ctx.sessions,
  });
  return jsonResponse(serializeDashboard(dashboard));
}
