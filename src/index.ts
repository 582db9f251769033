/**
 * Candidate Sourcing Agent - Main Entry Point
 *
 * Serves the sourcing pipeline over HTTP.
 */

import 'dotenv/config';
import { createApp } from './api/app.js';
import { loadConfig } from './config/index.js';
import { getSourcingPipeline } from './domain/services/index.js';

// =============================================================================
// STARTUP
// =============================================================================

async function start() {
  const config = loadConfig();

  console.log(`Environment: ${config.nodeEnv}`);
  console.log('Starting Candidate Sourcing Agent...\n');

  if (!config.search.apiKey || !config.llm.apiKey) {
    console.log('Warning: SERPAPI_API_KEY or ANTHROPIC_API_KEY is not set; sourcing requests will return 503');
  }

  const app = createApp(config, () => getSourcingPipeline(config));

  const server = app.listen(config.port, () => {
    console.log(`Candidate Sourcing API running on http://localhost:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
    console.log(`API base: http://localhost:${config.port}/api\n`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);

    server.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// =============================================================================
// RUN
// =============================================================================

start().catch((error) => {
  console.error('Failed to start Candidate Sourcing Agent:', error);
  process.exit(1);
});
