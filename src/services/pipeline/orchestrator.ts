/**
 * @file src/services/pipeline/orchestrator.ts
 * @description Research pipeline state machine with a streamed progress sequence
 * @context validating → planning → searching → writing → (delivering | skipping_delivery) → done,
 *          or a single terminal failure. Stages push events into an EventChannel that run()
 *          drains, so per-search progress reaches the caller while searches are in flight.
 *          Stopping iteration early (or aborting the caller's signal) cancels the run.
 * @dependencies services/agents/gateway.ts, pipeline/search.ts, pipeline/validation.ts
 * @affects routes/research.ts
 */

import { v4 as uuidv4 } from 'uuid';
import { AgentGateway } from '../agents/gateway';
import { SearchCoordinator } from './search';
import { validateResearchInput } from './validation';
import {
  FAILURE_PREFIX,
  FailureEvent,
  PipelineEvent,
  PipelineRun,
  PipelineStage,
  Report,
  ResearchInput,
  SearchPlan,
  ValidatedResearchInput,
  isReportValid,
} from '../../types/research';
import { AppError, ResearchCancelledError, StageFailureError } from '../../types/errors';
import { createRequestLogger, logger } from '../../utils/logger';
import { EventChannel } from '../../utils/channel';
import { errorMessage } from '../../utils/helpers';

export interface PipelineOrchestratorOptions {
  searchCoordinator?: SearchCoordinator;
  /** Rate-limiter identifier of the caller, for log correlation only */
  callerId?: string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export function buildPlanningPrompt(query: string, pairs: PipelineRun['pairs']): string {
  const clarifyingContext = pairs.map(p => `Q: ${p.question}\nA: ${p.answer}`).join('\n');
  return `Query: ${query}\n\nClarifications:\n${clarifyingContext}`;
}

export function buildWritingPrompt(query: string, results: string[]): string {
  return `Original query: ${query}\n\nSearch Results:\n` + results.join('\n---\n');
}

export function failureEvent(stage: PipelineStage, error: unknown): FailureEvent {
  return {
    type: 'failure',
    stage,
    error_code: error instanceof AppError ? error.errorCode : 'RESEARCH_FAILED',
    message: `${FAILURE_PREFIX} ${errorMessage(error)}`,
  };
}

export class PipelineOrchestrator {
  private readonly coordinator: SearchCoordinator;
  private readonly callerId?: string;

  constructor(
    private readonly gateway: AgentGateway,
    options: PipelineOrchestratorOptions = {}
  ) {
    this.coordinator = options.searchCoordinator ?? new SearchCoordinator(gateway);
    this.callerId = options.callerId;
  }

  /**
   * Runs the pipeline once. Yields the trace id first, then progress events, and ends
   * with either the report (message = markdown body) or one failure event. Never throws.
   */
  async *run(input: ResearchInput, options: RunOptions = {}): AsyncGenerator<PipelineEvent, void, undefined> {
    let validated: ValidatedResearchInput;
    try {
      validated = validateResearchInput(input);
    } catch (error) {
      logger.info('Research input rejected', { caller_id: this.callerId, error: errorMessage(error) });
      yield failureEvent('validating', error);
      return;
    }

    const pipelineRun: PipelineRun = {
      traceId: uuidv4(),
      query: validated.query,
      pairs: validated.pairs,
      results: [],
    };

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const channel = new EventChannel<PipelineEvent>();
    const execution = this.execute(pipelineRun, validated.recipient, channel, controller.signal)
      .finally(() => channel.close());

    try {
      for await (const event of channel) {
        yield event;
      }
    } finally {
      // No-op after a normal finish; cancels in-flight work when the consumer stops early
      controller.abort();
      options.signal?.removeEventListener('abort', onCallerAbort);
      await execution;
    }
  }

  private async execute(
    run: PipelineRun,
    recipient: string | undefined,
    channel: EventChannel<PipelineEvent>,
    signal: AbortSignal
  ): Promise<void> {
    const log = createRequestLogger(run.traceId, this.callerId);
    const startTime = Date.now();
    let stage: PipelineStage = 'planning';

    const emitProgress = (message: string, details?: Record<string, unknown>) => {
      channel.push({ type: 'progress', stage, message, details });
      log.info(`Progress: ${stage} - ${message}`, details);
    };

    log.info('Starting research pipeline', {
      query_length: run.query.length,
      clarifications: run.pairs.length,
      delivery: recipient !== undefined,
    });

    channel.push({ type: 'trace', traceId: run.traceId, message: `Trace ID: ${run.traceId}` });

    try {
      // Planning
      emitProgress('Planning searches based on clarifications...');
      this.checkAborted(signal);
      run.plan = await this.planSearches(run, signal);

      // Searching
      stage = 'searching';
      const total = run.plan.searches.length;
      emitProgress(`Starting ${total} searches...`, { searches: total });
      this.checkAborted(signal);
      run.results = await this.coordinator.execute(run.plan, {
        requestId: run.traceId,
        signal,
        onProgress: (completed, count) => emitProgress(`Searching... ${completed}/${count} completed`),
      });
      this.checkAborted(signal);

      // Writing
      stage = 'writing';
      emitProgress('Analyzing search results and writing report...', { results: run.results.length });
      run.report = await this.writeReport(run, signal);
      this.checkAborted(signal);

      // Delivery
      if (recipient) {
        stage = 'delivering';
        emitProgress(`Sending report to ${recipient}...`);
        await this.deliverReport(run.traceId, run.report, recipient, signal);
        emitProgress(`Report sent to ${recipient}.`);
      } else {
        stage = 'skipping_delivery';
        emitProgress('Email sending skipped.');
      }

      stage = 'done';
      channel.push({ type: 'report', report: run.report, message: run.report.markdownBody });

      log.info('Research pipeline completed', {
        duration_ms: Date.now() - startTime,
        searches_planned: total,
        results: run.results.length,
      });
    } catch (error) {
      const cancelled = error instanceof ResearchCancelledError;
      const logMeta = {
        stage,
        error: errorMessage(error),
        duration_ms: Date.now() - startTime,
      };
      if (cancelled) {
        log.warn('Research pipeline cancelled', logMeta);
      } else {
        log.error('Research pipeline failed', logMeta);
      }
      channel.push(failureEvent(stage, error));
    }
  }

  private checkAborted(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new ResearchCancelledError();
    }
  }

  private async planSearches(run: PipelineRun, signal: AbortSignal): Promise<SearchPlan> {
    const outcome = await this.gateway.invoke('planner', buildPlanningPrompt(run.query, run.pairs), {
      requestId: run.traceId,
      signal,
    });

    if (!outcome.ok) {
      if (outcome.fault.kind === 'cancelled') throw new ResearchCancelledError();
      throw new StageFailureError('planning', outcome.fault.message);
    }

    if (outcome.value.searches.length === 0) {
      throw new StageFailureError('planning', 'Planner agent returned no searches');
    }

    return outcome.value;
  }

  private async writeReport(run: PipelineRun, signal: AbortSignal): Promise<Report> {
    const outcome = await this.gateway.invoke('writer', buildWritingPrompt(run.query, run.results), {
      requestId: run.traceId,
      signal,
    });

    if (!outcome.ok) {
      if (outcome.fault.kind === 'cancelled') throw new ResearchCancelledError();
      throw new StageFailureError('writing', outcome.fault.message);
    }

    if (!isReportValid(outcome.value)) {
      throw new StageFailureError('writing', 'Writer agent returned incomplete report');
    }

    return outcome.value;
  }

  private async deliverReport(
    traceId: string,
    report: Report,
    recipient: string,
    signal: AbortSignal
  ): Promise<void> {
    const outcome = await this.gateway.invoke(
      'delivery',
      { recipient, shortSummary: report.shortSummary, markdownBody: report.markdownBody },
      { requestId: traceId, signal }
    );

    if (!outcome.ok) {
      if (outcome.fault.kind === 'cancelled') throw new ResearchCancelledError();
      throw new StageFailureError('delivering', outcome.fault.message);
    }
  }
}

export default PipelineOrchestrator;
