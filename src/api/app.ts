/**
 * Express Application - Candidate Sourcing API
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { randomUUID } from 'crypto';

import type { AppConfig } from '../config/index.js';
import type { SourcingPipeline } from '../domain/services/SourcingPipeline.js';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createHealthRoutes, createSourcingRoutes } from './routes/index.js';

// =============================================================================
// CREATE APP
// =============================================================================

export function createApp(config: AppConfig, getPipeline: () => SourcingPipeline) {
  const app = express();

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  // Security headers
  app.use(helmet());

  // CORS
  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    })
  );

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request ID
  app.use((req, _res, next) => {
    if (!req.headers['x-request-id']) {
      req.headers['x-request-id'] = randomUUID();
    }
    next();
  });

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.get('/', (_req, res) => {
    res.json({
      message: 'Candidate Sourcing Agent API',
      description: 'Profile discovery, fit scoring and outreach drafting',
      endpoints: {
        'POST /api/sourcing/source-candidates': 'Source and score candidates',
        'GET /api/sourcing/sample-request': 'Sample request body',
        'GET /health': 'Health check',
      },
    });
  });

  app.use('/health', createHealthRoutes(config));

  app.use('/api/sourcing', createSourcingRoutes(getPipeline));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  // 404 handler
  app.use(notFoundHandler);

  // Error handler
  app.use(createErrorHandler({ hideInternalErrors: config.nodeEnv === 'production' }));

  return app;
}

export default createApp;
