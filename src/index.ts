/**
 * @file src/index.ts
 * @description Application entry point
 * @context Builds the process-wide services (rate limiter, agent gateway) and starts the server
 */

import { createApp } from './app';
import config from './config';
import { RateLimiter } from './services/rateLimiter';
import { createOpenAIAgentGateway } from './services/agents/openaiGateway';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  logger.info('Starting Deep Research service', {
    version: config.service.version,
    environment: config.env,
  });

  if (!config.openai.apiKey) {
    logger.warn('OPENAI_API_KEY is not set; every agent call will fail');
  }

  const rateLimiter = new RateLimiter(config.rateLimit);
  const gateway = createOpenAIAgentGateway();

  logger.info('Services initialized', {
    requests_per_minute: config.rateLimit.requestsPerMinute,
    daily_limit: config.rateLimit.dailyLimit,
    searches_per_plan: config.searchesPerPlan,
    search_concurrency: config.searchConcurrency || 'unbounded',
  });

  const app = createApp({ rateLimiter, gateway });

  const server = app.listen(config.port, () => {
    logger.info(`Server started on port ${config.port}`, {
      port: config.port,
      environment: config.env,
    });
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', {
      error: error.message,
      stack: error.stack,
    });
    process.exit(1);
  });
}

main().catch((error) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : 'Unknown error',
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
