// =============================================================================
// PDF SCAN — Metrics Routes
//
// Routes:
//   GET /metrics?operation&start_time&end_time — count and mean duration
//                                                per operation
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { Backends } from '../types/backends';
import { stringParam, timeParam } from './params';
import { operationSummaryView } from './views';

export function metricsRouter(backends: Backends): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const operation = stringParam(req.query.operation, 'operation') || undefined;
      const startTime = timeParam(req.query.start_time, 'start_time');
      const endTime = timeParam(req.query.end_time, 'end_time');

      const summaries = await backends.metrics.summarize({ operation, startTime, endTime });

      res.json({
        metrics: summaries.map(operationSummaryView),
        filters: {
          operation: operation ?? null,
          start_time: startTime ? startTime.toISOString() : null,
          end_time: endTime ? endTime.toISOString() : null,
        },
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
