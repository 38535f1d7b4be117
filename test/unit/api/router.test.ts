import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { PhishScopeServer, VERSION } from '../../../src/server.js';
import { PhishScopeConfigSchema } from '../../../src/config/schema.js';
import type { FetchHandler } from '../../../src/api/router.js';
import { FakeClassifier, ManualClock } from '../../support/fixtures.js';

const BASE = 'http://localhost';

const SSN_REQUEST = {
  email_data: {
    sender: 'benefits@healthservice-verification.com',
    subject: 'URGENT: SSN Required for Health Benefits Verification',
    body:
      'Dear valued member, we need to verify your Social Security Number within 24 hours ' +
      'to maintain your health benefits. Please reply with your SSN immediately.',
  },
  user_id: 'user-1',
};

const SAFE_REQUEST = {
  email_data: {
    sender: 'Colleague <colleague@example.com>',
    subject: 'Lunch on Friday',
    body: 'Want to grab lunch on Friday?',
  },
  user_id: 'user-1',
};

function post(pathname: string, body: unknown): Request {
  return new Request(`${BASE}${pathname}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

function get(pathname: string): Request {
  return new Request(`${BASE}${pathname}`);
}

function del(pathname: string): Request {
  return new Request(`${BASE}${pathname}`, { method: 'DELETE' });
}

const POLICY = 'Our bank never asks for your PIN by email.';

describe('HTTP API', () => {
  let cacheDir: string;
  let server: PhishScopeServer;
  let handle: FetchHandler;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'phishscope-api-test-'));
    const config = PhishScopeConfigSchema.parse({
      database: { path: ':memory:' },
      cache: { dir: cacheDir },
      audit: { enabled: false, logDir: cacheDir },
    });
    server = new PhishScopeServer(config, {
      classifier: new FakeClassifier({ label: 'benign', confidence: 0.95 }),
      reasoning: null,
      now: new ManualClock().now,
    });
    handle = server.getHandler();
  });

  afterEach(async () => {
    await server.stop();
    await fs.promises.rm(cacheDir, { recursive: true, force: true });
  });

  describe('POST /api/scan', () => {
    it('returns a threat verdict for an SSN request', async () => {
      const response = await handle(post('/api/scan', SSN_REQUEST));

      expect(response.status).toBe(200);
      expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
      const json = await response.json();
      expect(json).toMatchObject({
        user_id: 'user-1',
        scan_type: 'full',
        final_verdict: 'threat',
        threat_level: 'high',
        confidence_score: 0.95,
        email: { sender: 'benefits@healthservice-verification.com' },
      });
      expect(json).toHaveProperty('scan_id', expect.stringMatching(/^scan_20250314_093000_user-1_[0-9a-f]{8}$/));
      expect(json).toHaveProperty(
        'layers.layer1.indicators.0',
        'Requests sensitive financial information: ssn, social security',
      );
      expect(json).not.toHaveProperty('layers.layer2');
    });

    it('stops at the classifier for a routine email', async () => {
      const json = await (await handle(post('/api/scan', SAFE_REQUEST))).json();

      expect(json).toMatchObject({
        final_verdict: 'safe',
        threat_level: 'low',
        email: { sender: 'colleague@example.com', subject: 'Lunch on Friday' },
        layers: {
          layer1: { status: 'clean', cached: false },
          layer2: { status: 'safe', label: 'benign', manual_override: false },
        },
      });
    });

    it('serves a repeat scan from the rule cache', async () => {
      await handle(post('/api/scan', SSN_REQUEST));
      const json = await (await handle(post('/api/scan', SSN_REQUEST))).json();

      expect(json).toHaveProperty('layers.layer1.cached', true);
    });

    it('rejects a scan without a sender and stores nothing', async () => {
      const response = await handle(post('/api/scan', { email_data: { subject: 'Hi' }, user_id: 'user-1' }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Invalid request',
        details: ['email_data.sender: sender (or from) is required'],
      });

      const history = await (await handle(get('/api/scan-history/user-1'))).json();
      expect(history).toMatchObject({ total: 0, scans: [] });
    });

    it('rejects a body that is not JSON', async () => {
      const response = await handle(new Request(`${BASE}/api/scan`, { method: 'POST', body: '{oops' }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid JSON body', details: [] });
    });
  });

  describe('user routes', () => {
    it('creates a default profile on first read', async () => {
      const json = await (await handle(get('/api/user/user-1/experience'))).json();
      expect(json).toMatchObject({ user_id: 'user-1', contacts: [], organizations: [] });
    });

    it('adds contacts and reports how many were new', async () => {
      const contacts = [{ name: 'Alice', email: 'alice@example.com' }];
      await handle(post('/api/user/user-1/contacts', { contacts }));
      const json = await (await handle(post('/api/user/user-1/contacts', {
        contacts: [...contacts, { name: 'Bob', email: 'bob@example.com' }],
      }))).json();

      expect(json).toEqual({
        success: true,
        added: 1,
        contacts: [
          { name: 'Alice', email: 'alice@example.com' },
          { name: 'Bob', email: 'bob@example.com' },
        ],
      });
    });

    it('rejects an empty contact list', async () => {
      const response = await handle(post('/api/user/user-1/contacts', { contacts: [] }));
      expect(response.status).toBe(400);
    });

    it('merges profile updates', async () => {
      const response = await handle(new Request(`${BASE}/api/user/user-1/profile`, {
        method: 'PUT',
        body: JSON.stringify({ personal_info: { occupation: 'nurse' } }),
      }));

      expect(await response.json()).toMatchObject({
        success: true,
        user_experience: { personal_info: { occupation: 'nurse', tech_savviness: 'medium' } },
      });
    });

    it('summarizes scans on the dashboard', async () => {
      await handle(post('/api/scan', SSN_REQUEST));
      await handle(post('/api/scan', SAFE_REQUEST));

      const json = await (await handle(get('/api/user/user-1/dashboard'))).json();
      expect(json).toMatchObject({
        user_id: 'user-1',
        statistics: {
          total_scans: 2,
          threats_detected: 1,
          safe_emails: 1,
          threat_percentage: 50,
          risk_level: 'high',
        },
        protection_status: 'active',
      });
    });

    it('rejects a malformed user id', async () => {
      const response = await handle(get('/api/user/bad%20id/experience'));
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid user id' });
    });
  });

  describe('GET /api/scan/:scan_id', () => {
    it('returns a stored scan', async () => {
      const scanned = z.object({ scan_id: z.string() })
        .parse(await (await handle(post('/api/scan', SSN_REQUEST))).json());

      const response = await handle(get(`/api/scan/${scanned.scan_id}`));
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        scan_id: scanned.scan_id,
        user_id: 'user-1',
        final_verdict: 'threat',
        email: { sender: 'benefits@healthservice-verification.com' },
      });
    });

    it('returns 404 for an unknown scan', async () => {
      const response = await handle(get('/api/scan/scan_missing'));
      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Scan not found' });
    });
  });

  describe('document routes', () => {
    it('adds a document once per content', async () => {
      const created = await handle(post('/api/user/user-1/documents', { content: POLICY, tags: ['bank'] }));
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({ success: true, status: 'created', document_id: 1 });

      const repeated = await handle(post('/api/user/user-1/documents', { content: POLICY }));
      expect(repeated.status).toBe(200);
      expect(await repeated.json()).toMatchObject({ success: true, status: 'duplicate', document_id: 1 });
    });

    it('lists summaries and reads the full document', async () => {
      await handle(post('/api/user/user-1/documents', { content: POLICY, tags: ['bank'] }));

      expect(await (await handle(get('/api/user/user-1/documents'))).json()).toMatchObject({
        user_id: 'user-1',
        count: 1,
        documents: [{ id: 1, name: 'Untitled Document', type: 'text', tags: ['bank'], access_count: 0 }],
      });
      expect(await (await handle(get('/api/user/user-1/documents/1'))).json()).toEqual({
        document: {
          id: 1,
          name: 'Untitled Document',
          type: 'text',
          summary: POLICY,
          size: POLICY.length,
          tags: ['bank'],
          uploaded_at: '2025-03-14T09:30:00.000Z',
          access_count: 1,
          content: POLICY,
          last_accessed: '2025-03-14T09:30:00.000Z',
        },
      });
    });

    it('keeps documents private to their owner', async () => {
      await handle(post('/api/user/user-1/documents', { content: POLICY }));

      const response = await handle(get('/api/user/user-2/documents/1'));
      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Document not found' });
    });

    it('deletes a document once', async () => {
      await handle(post('/api/user/user-1/documents', { content: POLICY }));

      const first = await handle(del('/api/user/user-1/documents/1'));
      expect(first.status).toBe(200);
      expect(await first.json()).toEqual({ success: true, document_id: 1 });
      expect((await handle(del('/api/user/user-1/documents/1'))).status).toBe(404);
      expect(await (await handle(get('/api/user/user-1/documents'))).json()).toMatchObject({ count: 0 });
    });

    it('rejects empty content and malformed ids', async () => {
      expect((await handle(post('/api/user/user-1/documents', { content: '' }))).status).toBe(400);

      const response = await handle(get('/api/user/user-1/documents/abc'));
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid document id' });
    });
  });

  describe('GET /api/scan-history/:id', () => {
    it('pages scans newest first', async () => {
      await handle(post('/api/scan', SSN_REQUEST));
      await handle(post('/api/scan', SAFE_REQUEST));

      const json = await (await handle(get('/api/scan-history/user-1?limit=1'))).json();
      expect(json).toMatchObject({ user_id: 'user-1', total: 2, limit: 1, offset: 0 });
      expect(json).toHaveProperty('scans.length', 1);
    });

    it('caps the page size', async () => {
      const json = await (await handle(get('/api/scan-history/user-1?limit=500'))).json();
      expect(json).toHaveProperty('limit', 200);
    });

    it('rejects a negative offset', async () => {
      const response = await handle(get('/api/scan-history/user-1?offset=-1'));
      expect(response.status).toBe(400);
    });
  });

  describe('POST /api/suspect', () => {
    it('counts repeat reports of a sender', async () => {
      const report = { suspect_info: { sender: 'Scammer@Evil.test', tactics_used: ['urgency'] } };
      await handle(post('/api/suspect', report));
      const json = await (await handle(post('/api/suspect', report))).json();

      expect(json).toMatchObject({
        success: true,
        suspect: { sender_email: 'scammer@evil.test', frequency_count: 2, threat_level: 'unknown' },
      });
    });
  });

  describe('GET /api/suspect/:sender', () => {
    it('returns a reported sender', async () => {
      await handle(post('/api/suspect', { suspect_info: { sender: 'scammer@evil.test' } }));

      const response = await handle(get('/api/suspect/Scammer%40Evil.test'));
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        suspect: { sender_email: 'scammer@evil.test', frequency_count: 1 },
      });
    });

    it('returns 404 for an unknown sender', async () => {
      const response = await handle(get('/api/suspect/nobody%40example.com'));
      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Suspect not found' });
    });
  });

  describe('POST /api/feedback', () => {
    it('stores a labeled sample', async () => {
      const json = await (await handle(post('/api/feedback', {
        email_content: 'Verify your account now',
        correct_label: 'phishing',
      }))).json();

      expect(json).toEqual({ success: true, sample_id: 1, created_at: '2025-03-14T09:30:00.000Z' });
    });

    it('requires a label', async () => {
      const response = await handle(post('/api/feedback', { email_content: 'text' }));
      expect(response.status).toBe(400);
    });
  });

  describe('service routes', () => {
    it('reports health', async () => {
      const response = await handle(get('/api/health'));

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        status: 'healthy',
        version: VERSION,
        timestamp: '2025-03-14T09:30:00.000Z',
        uptime_seconds: 0,
        database: { connected: true },
        services: { classifier: true, reasoning: false },
        stages: { layer1: true, layer2: true, layer3: true },
      });
    });

    it('reports scan metrics', async () => {
      await handle(post('/api/scan', SSN_REQUEST));

      const json = await (await handle(get('/api/metrics'))).json();
      expect(json).toMatchObject({
        scans_total: 1,
        verdicts: { threat: 1 },
        stopped_at: { layer1: 1 },
        cache: { hits: 0, misses: 1 },
      });
    });

    it('reports user context store counts', async () => {
      await handle(post('/api/feedback', { email_content: 'Verify your account now', correct_label: 'phishing' }));
      await handle(post('/api/user/user-1/documents', { content: POLICY }));

      const response = await handle(get('/api/rag/status'));
      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        status: 'active',
        statistics: {
          total_users: 0,
          total_suspects: 0,
          avg_suspect_frequency: 0,
          total_conversations: 0,
          total_scans: 0,
          threats_detected: 0,
          training_samples: 1,
          total_documents: 1,
        },
        features: { document_storage: true, user_profiling: true, conversation_tracking: true },
      });
    });

    it('answers preflight requests', async () => {
      const response = await handle(new Request(`${BASE}/api/scan`, { method: 'OPTIONS' }));
      expect(response.status).toBe(204);
      expect(response.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, PUT, DELETE, OPTIONS');
    });

    it('returns 404 for unknown routes', async () => {
      const response = await handle(get('/api/nothing-here'));
      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Not found' });
    });
  });
});
