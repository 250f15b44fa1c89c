/**
 * @file src/app.ts
 * @description Express application
 * @context Middleware, routes and error handling; services are injected by the caller
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { healthRouter, createResearchRouter, ResearchRouterDeps } from './routes';
import { errorHandler, requestLogger } from './middleware';
import config from './config';
import { NotFoundError } from './types/errors';

export type AppDeps = ResearchRouterDeps;

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Behind nginx / a load balancer
  app.set('trust proxy', 1);

  app.use(cors({
    origin: config.cors.origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.use(requestLogger);

  app.use('/health', healthRouter);
  app.use('/api/health', healthRouter);
  app.use('/api/research', createResearchRouter(deps));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  });

  app.use(errorHandler);

  return app;
}

export default createApp;
