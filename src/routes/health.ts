import { Router } from 'express';
import type { HealthReporter } from '../health/healthReporter';
import { asyncHandler } from '../middleware';

export function createHealthRouter(reporter: HealthReporter): Router {
  const router = Router();

  // Basic liveness probe (always returns 200 if process is running)
  router.get('/live', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  // Readiness: degraded still serves, down does not
  router.get(
    '/ready',
    asyncHandler(async (_req, res) => {
      const report = await reporter.report();
      const ready = report.overall !== 'down';
      res.status(ready ? 200 : 503).json({ status: ready ? 'ok' : 'not_ready', checks: report.checks });
    }),
  );

  // Full report; 200 even when degraded or down
  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.status(200).json(await reporter.report());
    }),
  );

  return router;
}
