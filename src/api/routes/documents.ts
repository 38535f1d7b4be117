import type { ApiContext } from '../context.js';
import { jsonResponse, parseJsonBody } from '../response.js';
import { AddDocumentSchema } from '../schemas.js';
import { serializeDocument, serializeDocumentSummary } from '../serializers.js';

/**
 * GET /api/user/{id}/documents
 */
export function handleListDocuments(userId: string, ctx: ApiContext): Response {
  const documents = ctx.documentStore.list(userId);
  return jsonResponse({
    user_id: userId,
    documents: documents.map(serializeDocumentSummary),
    count: documents.length,
  });
}

/**
 * POST /api/user/{id}/documents
 *
 * 201 for a new document. Re-uploading content the user already stores
 * answers 200 with the existing id.
 */
export async function handleAddDocument(userId: string, request: Request, ctx: ApiContext): Promise<Response> {
  const parsed = await parseJsonBody(request, AddDocumentSchema);
  if (!parsed.ok) return parsed.response;

  const result = ctx.documentStore.add(userId, parsed.data);
  return jsonResponse({
    success: true,
    status: result.status,
    document_id: result.documentId,
    document_hash: result.documentHash,
  }, result.status === 'created' ? 201 : 200);
}

/**
 * GET /api/user/{id}/documents/{doc_id}
 */
export function handleGetDocument(userId: string, documentId: number, ctx: ApiContext): Response {
  const document = ctx.documentStore.get(userId, documentId);
  if (!document) return jsonResponse({ error: 'Document not found' }, 404);
  return jsonResponse({ document: serializeDocument(document) });
}

/**
 * DELETE /api/user/{id}/documents/{doc_id}
 */
export function handleDeleteDocument(userId: string, documentId: number, ctx: ApiContext): Response {
  if (!ctx.documentStore.delete(userId, documentId)) {
    return jsonResponse({ error: 'Document not found' }, 404);
  }
  return jsonResponse({ success: true, document_id: documentId });
}
