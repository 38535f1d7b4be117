/**
 * PhishScope HTTP API
 *
 * A fetch-style handler `(Request) => Promise<Response>`; the server hands
 * it to the Node adapter and tests call it directly.
 *
 * Endpoints:
 *   POST     /api/scan                          Scan an email
 *   GET      /api/scan/:scan_id                 Stored scan record
 *   GET      /api/user/:id/experience           User profile
 *   POST|PUT /api/user/:id/profile              Update profile
 *   POST     /api/user/:id/contacts             Add contacts
 *   POST     /api/user/:id/organizations        Add organizations
 *   GET      /api/user/:id/dashboard            Scan statistics
 *   GET|POST /api/user/:id/documents            List or add documents
 *   GET|DEL  /api/user/:id/documents/:doc_id    Read or delete a document
 *   POST     /api/suspect                       Report a suspect sender
 *   GET      /api/suspect/:sender               Suspect sender record
 *   POST     /api/feedback                      Submit a labeled sample
 *   GET      /api/scan-history/:id              Paginated scan history
 *   GET      /api/health                        Service health
 *   GET      /api/metrics                       Scan counters
 *   GET      /api/rag/status                    User context store counts
 */

import { createLogger } from '../logging/logger.js';
import type { ApiContext } from './context.js';
import { jsonResponse } from './response.js';
import { DocumentIdSchema, SenderParamSchema, UserIdSchema } from './schemas.js';
import { handleGetScan, handleScan } from './routes/scan.js';
import {
  handleAddContacts,
  handleAddOrganizations,
  handleDashboard,
  handleGetExperience,
  handleUpdateProfile,
} from './routes/user.js';
import {
  handleAddDocument,
  handleDeleteDocument,
  handleGetDocument,
  handleListDocuments,
} from './routes/documents.js';
import { handleGetSuspect, handleSuspect } from './routes/suspect.js';
import { handleFeedback } from './routes/feedback.js';
import { handleScanHistory } from './routes/history.js';
import { handleContextStatus, handleHealth, handleMetrics } from './routes/health.js';

const log = createLogger('api');

const USER_ROUTE = /^\/api\/user\/([^/]+)\/(experience|profile|contacts|organizations|dashboard)\/?$/;
const DOCUMENTS_ROUTE = /^\/api\/user\/([^/]+)\/documents(?:\/([^/]+))?\/?$/;
const HISTORY_ROUTE = /^\/api\/scan-history\/([^/]+)\/?$/;
const SCAN_ROUTE = /^\/api\/scan\/([^/]+)\/?$/;
const SUSPECT_ROUTE = /^\/api\/suspect\/([^/]+)\/?$/;

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

export type FetchHandler = (request: Request) => Promise<Response>;

export function createRouter(ctx: ApiContext): FetchHandler {
  return async (request: Request): Promise<Response> => {
    // Handle preflight
    if (request.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: CORS_HEADERS });
    }

    let response: Response;
    try {
      response = await route(request, ctx);
    } catch (error) {
      log.error(`${request.method} ${new URL(request.url).pathname} failed`, error);
      response = jsonResponse({ error: 'Internal server error' }, 500);
    }

    for (const [key, value] of Object.entries(CORS_HEADERS)) {
      response.headers.set(key, value);
    }
    return response;
  };
}

async function route(request: Request, ctx: ApiContext): Promise<Response> {
  const url = new URL(request.url);
  const path = url.pathname;
  const method = request.method;

  if (method === 'POST' && path === '/api/scan') return handleScan(request, ctx);
  if (method === 'POST' && path === '/api/suspect') return handleSuspect(request, ctx);
  if (method === 'POST' && path === '/api/feedback') return handleFeedback(request, ctx);
  if (method === 'GET' && path === '/api/health') return handleHealth(ctx);
  if (method === 'GET' && path === '/api/metrics') return handleMetrics(ctx);
  if (method === 'GET' && path === '/api/rag/status') return handleContextStatus(ctx);

  const userMatch = USER_ROUTE.exec(path);
  if (userMatch) {
    const userId = parseUserId(userMatch[1]);
    if (userId === null) return jsonResponse({ error: 'Invalid user id' }, 400);

    switch (`${method} ${userMatch[2]}`) {
      case 'GET experience':
        return handleGetExperience(userId, ctx);
      case 'POST profile':
      case 'PUT profile':
        return handleUpdateProfile(userId, request, ctx);
      case 'POST contacts':
        return handleAddContacts(userId, request, ctx);
      case 'POST organizations':
        return handleAddOrganizations(userId, request, ctx);
      case 'GET dashboard':
        return handleDashboard(userId, ctx);
    }
  }

  const documentsMatch = DOCUMENTS_ROUTE.exec(path);
  if (documentsMatch) {
    const userId = parseUserId(documentsMatch[1]);
    if (userId === null) return jsonResponse({ error: 'Invalid user id' }, 400);

    const idSegment = documentsMatch[2];
    if (idSegment === undefined) {
      if (method === 'GET') return handleListDocuments(userId, ctx);
      if (method === 'POST') return handleAddDocument(userId, request, ctx);
    } else {
      const documentId = DocumentIdSchema.safeParse(idSegment);
      if (!documentId.success) return jsonResponse({ error: 'Invalid document id' }, 400);
      if (method === 'GET') return handleGetDocument(userId, documentId.data, ctx);
      if (method === 'DELETE') return handleDeleteDocument(userId, documentId.data, ctx);
    }
  }

  const scanMatch = SCAN_ROUTE.exec(path);
  if (scanMatch && method === 'GET') {
    const scanId = decodeSegment(scanMatch[1]);
    if (scanId === null) return jsonResponse({ error: 'Invalid scan id' }, 400);
    return handleGetScan(scanId, ctx);
  }

  const suspectMatch = SUSPECT_ROUTE.exec(path);
  if (suspectMatch && method === 'GET') {
    const sender = SenderParamSchema.safeParse(decodeSegment(suspectMatch[1]));
    if (!sender.success) return jsonResponse({ error: 'Invalid sender' }, 400);
    return handleGetSuspect(sender.data, ctx);
  }

  const historyMatch = HISTORY_ROUTE.exec(path);
  if (historyMatch && method === 'GET') {
    const userId = parseUserId(historyMatch[1]);
    if (userId === null) return jsonResponse({ error: 'Invalid user id' }, 400);
    return handleScanHistory(userId, url.searchParams, ctx);
  }

  return jsonResponse({ error: 'Not found' }, 404);
}

function parseUserId(segment: string): string | null {
  const parsed = UserIdSchema.safeParse(decodeSegment(segment));
  return parsed.success ? parsed.data : null;
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}
