import http from 'http';
import express from 'express';
import { createRoutes } from '../../src/api/routes.js';
import { AuditService } from '../../src/services/audit-service.js';
import { AuthService } from '../../src/services/auth-service.js';
import { DocumentService } from '../../src/services/document-service.js';
import { ProposalWorkflow } from '../../src/services/proposal-service.js';
import { ThreadService } from '../../src/services/thread-service.js';
import { MemoryStorage } from '../../src/storage/memory-storage.js';
import { AuditKind } from '../../src/schemas/models.js';
import { ErrorCode } from '../../src/schemas/errors.js';
import { FakeInference } from '../helpers/fixtures.js';

interface Reply {
  status: number;
  body: unknown;
}

function get(port: number, path: string, token?: string): Promise<Reply> {
  return new Promise((resolve, reject) => {
    const headers: http.OutgoingHttpHeaders = token ? { Authorization: `Bearer ${token}` } : {};
    const req = http.request({ host: '127.0.0.1', port, path, method: 'GET', headers }, (res) => {
      let raw = '';
      res.setEncoding('utf8');
      res.on('data', (chunk: string) => { raw += chunk; });
      res.on('end', () => {
        try {
          resolve({ status: res.statusCode ?? 0, body: JSON.parse(raw) });
        } catch (err) {
          reject(err);
        }
      });
    });
    req.on('error', reject);
    req.end();
  });
}

describe('REST routes', () => {
  const authService = new AuthService('test-secret');
  const readToken = authService.generateToken({ subject: 'dashboard', permissions: ['audit:read'] });
  const bridgeToken = authService.generateToken({ subject: 'bridge-1', permissions: ['bridge'] });
  let audit: AuditService;
  let documents: DocumentService;
  let server: http.Server;
  let port: number;

  beforeEach(async () => {
    const storage = new MemoryStorage();
    const inference = new FakeInference();
    audit = new AuditService(storage);
    const proposals = new ProposalWorkflow(storage, audit);
    documents = new DocumentService(storage, proposals, inference);
    const threads = new ThreadService(inference);

    const app = express();
    app.use(express.json());
    app.use('/api/v1', createRoutes({ documents, proposals, threads, audit, authService }));

    server = http.createServer(app);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }
    port = address.port;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('reports health without a token', async () => {
    const reply = await get(port, '/api/v1/health');

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({ success: true, data: { status: 'healthy', stats: { threads: 0 } } });
  });

  it('requires a token', async () => {
    const reply = await get(port, '/api/v1/channels/C1/document');

    expect(reply.status).toBe(401);
    expect(reply.body).toMatchObject({ success: false, error: { code: ErrorCode.UNAUTHORIZED, status: 401 } });
  });

  it('rejects an invalid token', async () => {
    const reply = await get(port, '/api/v1/channels/C1/document', 'not-a-token');

    expect(reply.status).toBe(401);
    expect(reply.body).toMatchObject({ error: { code: ErrorCode.INVALID_TOKEN } });
  });

  it('requires the audit:read permission', async () => {
    const reply = await get(port, '/api/v1/channels/C1/audit', bridgeToken);

    expect(reply.status).toBe(403);
    expect(reply.body).toMatchObject({
      error: { code: ErrorCode.FORBIDDEN, message: 'Permission denied: audit:read required' },
    });
  });

  it('serves the current document with its rendered text', async () => {
    await documents.initialize('C1', [{ id: 'U1', title: 'Backend' }], 'Ship the beta');

    const reply = await get(port, '/api/v1/channels/C1/document', readToken);

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      success: true,
      data: {
        document: { channelId: 'C1', version: 1, sections: { coreObjective: 'Ship the beta', directory: { U1: 'Backend' } } },
      },
    });
  });

  it('filters the audit trail by kind', async () => {
    await audit.record('C1', AuditKind.MISALIGNMENT_FLAG, { action: 'ROUTE' });
    await audit.record('C1', AuditKind.NUDGE_FEEDBACK, { verdict: 'dismissed' });

    const reply = await get(port, '/api/v1/channels/C1/audit?kind=nudge_feedback', readToken);

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      success: true,
      data: [{ channelId: 'C1', kind: 'nudge_feedback', payload: { verdict: 'dismissed' } }],
    });
  });

  it('returns the validation envelope for an unknown audit kind', async () => {
    const reply = await get(port, '/api/v1/channels/C1/audit?kind=gossip', readToken);

    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        status: 400,
        details: { type: 'validation', errors: [{ field: 'kind', code: 'INVALID_PARAMETER', value: 'gossip' }] },
      },
    });
  });

  it('returns the validation envelope for a malformed since', async () => {
    const reply = await get(port, '/api/v1/channels/C1/audit?since=yesterday', readToken);

    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({
      error: { details: { errors: [{ field: 'since', code: 'INVALID_TIMESTAMP', value: 'yesterday' }] } },
    });
  });

  it('rejects an unknown proposal status', async () => {
    const reply = await get(port, '/api/v1/channels/C1/proposals?status=maybe', readToken);

    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({ error: { details: { errors: [{ field: 'status', value: 'maybe' }] } } });
  });

  it('serves channel stats', async () => {
    await audit.record('C1', AuditKind.PROPOSAL_RESOLUTION, { status: 'accepted', resolutionReason: 'approved', committed: true });

    const reply = await get(port, '/api/v1/channels/C1/stats', readToken);

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      data: { total: 1, resolutions: { accepted: 1, rejected: 0, failedCommits: 0 }, acceptanceRate: 1 },
    });
  });
});
