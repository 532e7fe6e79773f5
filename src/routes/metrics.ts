import { Router } from 'express';
import { generateMetrics } from '../monitoring/metrics';

export function createMetricsRouter(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(generateMetrics());
  });

  return router;
}
