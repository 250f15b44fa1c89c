/**
 * @file src/routes/research.ts
 * @description Research API endpoints
 * @context Both endpoints validate input first, then consume rate-limit quota.
 *          POST / streams pipeline events as SSE.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { AgentGateway } from '../services/agents/gateway';
import { RateLimiter } from '../services/rateLimiter';
import { ClarificationStage, PipelineOrchestrator, validateResearchInput } from '../services/pipeline';
import { EMPTY_QUERY_MESSAGE } from '../services/pipeline/validation';
import { AppError, ValidationError } from '../types/errors';
import {
  ApiResponse,
  ClarifyResponseData,
  clarifyRequestSchema,
  researchRequestSchema,
} from '../types/api';
import { FAILURE_PREFIX, PipelineEvent, ResearchInput } from '../types/research';
import { enforceAdmission } from '../middleware/admission';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/helpers';

export interface ResearchRouterDeps {
  rateLimiter: RateLimiter;
  gateway: AgentGateway;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request body');
  }
  return parsed.data;
}

function writeEvent(res: Response, event: PipelineEvent): void {
  res.write(`data: ${JSON.stringify(event)}\n\n`);
}

export function createResearchRouter(deps: ResearchRouterDeps): Router {
  const router = Router();
  const clarification = new ClarificationStage(deps.gateway);

  /**
   * POST /api/research/clarify
   * Generates the clarifying questions for a query
   */
  router.post('/clarify', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(clarifyRequestSchema, req.body);
      const requestId = req.id || uuidv4();

      if (!body.query.trim()) {
        throw new ValidationError(EMPTY_QUERY_MESSAGE);
      }

      enforceAdmission(deps.rateLimiter, req);

      const outcome = await clarification.clarify(body.query, { requestId });

      if (outcome.status === 'invalid_input') {
        throw new ValidationError(outcome.message);
      }
      if (outcome.status !== 'ok') {
        throw new AppError(outcome.message, 502, 'CLARIFICATION_FAILED');
      }

      const response: ApiResponse<ClarifyResponseData> = {
        status: 'success',
        data: { questions: outcome.questions },
        request_id: requestId,
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/research
   * Runs the pipeline and streams its events (SSE)
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(researchRequestSchema, req.body);

      const input: ResearchInput = {
        query: body.query,
        questions: body.questions,
        answers: body.answers,
        delivery: { enabled: body.send_email, recipient: body.recipient_email },
      };

      // Throws before any quota is consumed
      validateResearchInput(input);

      const callerId = enforceAdmission(deps.rateLimiter, req);

      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no');
      res.flushHeaders();

      // Client disconnect cancels the run
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) {
          logger.info('Client disconnected, cancelling research', { request_id: req.id, caller_id: callerId });
          controller.abort();
        }
      });

      const orchestrator = new PipelineOrchestrator(deps.gateway, { callerId });

      for await (const event of orchestrator.run(input, { signal: controller.signal })) {
        if (controller.signal.aborted) break;
        writeEvent(res, event);
      }

      res.end();
    } catch (error) {
      if (res.headersSent) {
        logger.error('Research stream failed', { request_id: req.id, error: errorMessage(error) });
        writeEvent(res, {
          type: 'failure',
          stage: 'done',
          error_code: 'RESEARCH_FAILED',
          message: `${FAILURE_PREFIX} ${errorMessage(error)}`,
        });
        res.end();
      } else {
        next(error);
      }
    }
  });

  return router;
}

export default createResearchRouter;
