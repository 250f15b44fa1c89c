/**
 * @file src/routes/health.ts
 * @description Health check endpoint
 */

import { Router, Request, Response } from 'express';
import config from '../config';

const router = Router();

router.get('/', (req: Request, res: Response) => {
  res.json({
    status: 'ok',
    service: {
      name: config.service.name,
      version: config.service.version,
    },
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

export { router as healthRouter };
export default router;
