/**
 * Health Check Routes
 */

import { Router } from 'express';
import type { AppConfig } from '../../config/index.js';

export function createHealthRoutes(config: AppConfig): Router {
  const router = Router();

  /**
   * Basic health check
   */
  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'candidate-sourcing-agent',
    });
  });

  /**
   * Readiness: both external services need credentials
   */
  router.get('/ready', (_req, res) => {
    const checks: Record<string, { status: string }> = {
      search: { status: config.search.apiKey ? 'configured' : 'missing_api_key' },
      llm: { status: config.llm.apiKey ? 'configured' : 'missing_api_key' },
    };

    const allReady = Object.values(checks).every((c) => c.status === 'configured');

    res.status(allReady ? 200 : 503).json({
      status: allReady ? 'ready' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  /**
   * Liveness probe (Kubernetes)
   */
  router.get('/live', (_req, res) => {
    res.json({ status: 'live' });
  });

  return router;
}
