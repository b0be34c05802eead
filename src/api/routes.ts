/**
 * Groundline REST API Routes
 * Read-only dashboard access to documents, proposals, threads and the audit trail
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { AuditService } from '../services/audit-service.js';
import type { AuthService } from '../services/auth-service.js';
import type { DocumentService } from '../services/document-service.js';
import type { ProposalWorkflow } from '../services/proposal-service.js';
import type { ThreadService } from '../services/thread-service.js';
import { ProposalStatus } from '../schemas/models.js';
import { createValidationError, toErrorResponse } from '../schemas/errors.js';
import { validateAuditQuery } from '../schemas/validation.js';

// Helper to safely get string from params/query
const str = (val: unknown): string =>
  Array.isArray(val) ? str(val[0]) : (typeof val === 'string' ? val : '');

interface Services {
  documents: DocumentService;
  proposals: ProposalWorkflow;
  threads: ThreadService;
  audit: AuditService;
  authService: AuthService;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Run an async handler and map anything it throws onto the error envelope
 */
function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch((err: unknown) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      const body = toErrorResponse(err);
      if (body.error.status >= 500) {
        console.error(`[HTTP] ${req.method} ${req.path} failed:`, err);
      }
      res.status(body.error.status).json(body);
    });
  };
}

export function createRoutes(services: Services): Router {
  const router = Router();
  const { documents, proposals, threads, audit, authService } = services;
  const canRead = authService.middleware('audit:read');

  // Health check
  router.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        stats: {
          threads: threads.size,
        },
      },
    });
  });

  // ============================================================================
  // DOCUMENT ROUTES
  // ============================================================================

  // Current ground truth with its rendered text
  router.get('/channels/:channelId/document', canRead, handle(async (req, res) => {
    const document = await documents.current(str(req.params.channelId));
    res.json({
      success: true,
      data: {
        document,
        rendered: documents.render(document),
      },
    });
  }));

  router.get('/channels/:channelId/changelog', canRead, handle(async (req, res) => {
    const changelog = await documents.changelog(str(req.params.channelId));
    res.json({ success: true, data: changelog });
  }));

  // ============================================================================
  // AUDIT ROUTES
  // ============================================================================

  router.get('/channels/:channelId/audit', canRead, handle(async (req, res) => {
    const query = validateAuditQuery({ since: str(req.query.since), kind: str(req.query.kind) });
    if (!query.valid) {
      res.status(400).json(createValidationError(query.errors));
      return;
    }

    const records = await audit.query(str(req.params.channelId), query.value.since, query.value.kind);
    res.json({ success: true, data: records });
  }));

  router.get('/channels/:channelId/stats', canRead, handle(async (req, res) => {
    const stats = await audit.stats(str(req.params.channelId));
    res.json({ success: true, data: stats });
  }));

  // ============================================================================
  // PROPOSAL & THREAD ROUTES
  // ============================================================================

  router.get('/channels/:channelId/proposals', canRead, handle(async (req, res) => {
    const statusParam = str(req.query.status);
    const status = Object.values(ProposalStatus).find(s => s === statusParam);
    if (statusParam && !status) {
      res.status(400).json(createValidationError([{
        field: 'status',
        message: `status must be one of ${Object.values(ProposalStatus).join(', ')}`,
        code: 'INVALID_PARAMETER',
        value: statusParam,
      }]));
      return;
    }

    const list = await proposals.list(str(req.params.channelId), status);
    res.json({ success: true, data: list });
  }));

  router.get('/channels/:channelId/threads', canRead, handle(async (req, res) => {
    res.json({ success: true, data: threads.list(str(req.params.channelId)) });
  }));

  return router;
}

export default createRoutes;
