// =============================================================================
// PDF SCAN — Findings Routes
//
// Routes:
//   GET /findings                — all findings, paginated, optional type filter
//   GET /findings/:documentId    — one document with its findings
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { validate as isUuid } from 'uuid';
import { Backends } from '../types/backends';
import { NotFoundError } from '../types/errors';
import { findingTypeParam, intParam } from './params';
import { documentView, findingView, findingWithDocumentView } from './views';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export function findingsRouter(backends: Backends): Router {
  const router = Router();

  /**
   * GET /findings?limit&offset&finding_type
   * Highest confidence first. `total` counts the filtered set.
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = intParam(req.query.limit, 'limit', { fallback: DEFAULT_PAGE_SIZE, min: 1, max: MAX_PAGE_SIZE });
      const offset = intParam(req.query.offset, 'offset', { fallback: 0, min: 0 });
      const findingType = findingTypeParam(req.query.finding_type, 'finding_type');

      const [findings, total] = await Promise.all([
        backends.finding.getAll(limit, offset, findingType),
        backends.finding.count(undefined, findingType),
      ]);

      res.json({
        findings: findings.map(findingWithDocumentView),
        pagination: { limit, offset, total, returned: findings.length },
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /findings/:documentId
   * A malformed id cannot name a document, so it is a 404 like an unknown one.
   */
  router.get('/:documentId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { documentId } = req.params;

      const document = isUuid(documentId) ? await backends.document.get(documentId) : null;
      if (!document) {
        throw new NotFoundError(`Document not found: ${documentId}`);
      }

      const findings = await backends.finding.getByDocument(document.id);

      res.json({
        ...documentView(document),
        findings: findings.map(findingView),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
