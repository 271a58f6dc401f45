// =============================================================================
// PDF SCAN — Document Routes
//
// Routes:
//   GET /documents   — uploaded documents, newest first
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { Backends } from '../types/backends';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './findings';
import { intParam } from './params';
import { documentView } from './views';

export function documentsRouter(backends: Backends): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = intParam(req.query.limit, 'limit', { fallback: DEFAULT_PAGE_SIZE, min: 1, max: MAX_PAGE_SIZE });
      const offset = intParam(req.query.offset, 'offset', { fallback: 0, min: 0 });

      const documents = await backends.document.list(limit, offset);

      res.json({
        documents: documents.map(documentView),
        pagination: { limit, offset, returned: documents.length },
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
