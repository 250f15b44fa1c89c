/**
 * @file src/services/pipeline/search.ts
 * @description Searching: fans a SearchPlan out to the searcher role and collects results
 * @context Results arrive in completion order. A failed search is logged and omitted;
 *          it never aborts the batch. No overall timeout.
 * @dependencies services/agents/gateway.ts
 */

import config from '../../config';
import { AgentGateway } from '../agents/gateway';
import { SearchPlan, SearchResult, SearchTask } from '../../types/research';
import { logger } from '../../utils/logger';

export interface SearchExecutionOptions {
  requestId?: string;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

export function buildSearchPrompt(task: SearchTask): string {
  return `Search: ${task.query}\nReason: ${task.reason}`;
}

export class SearchCoordinator {
  private readonly concurrency: number;

  /**
   * @param options.concurrency - cap on simultaneous searches; 0 runs every task at once
   */
  constructor(
    private readonly gateway: AgentGateway,
    options: { concurrency?: number } = {}
  ) {
    this.concurrency = Math.max(0, options.concurrency ?? config.searchConcurrency);
  }

  async execute(plan: SearchPlan, options: SearchExecutionOptions = {}): Promise<SearchResult[]> {
    const { requestId, signal, onProgress } = options;
    const tasks = plan.searches;
    const total = tasks.length;
    const results: SearchResult[] = [];
    let completed = 0;
    let failed = 0;
    let next = 0;

    const runTask = async (task: SearchTask): Promise<void> => {
      const outcome = await this.gateway.invoke('searcher', buildSearchPrompt(task), { requestId, signal });

      if (outcome.ok) {
        results.push(outcome.value);
      } else {
        failed++;
        logger.warn('Search failed', {
          request_id: requestId,
          search_query: task.query,
          fault_kind: outcome.fault.kind,
          error: outcome.fault.message,
        });
      }

      completed++;
      onProgress?.(completed, total);
    };

    // Each worker pulls the next task until the plan is drained
    const worker = async (): Promise<void> => {
      while (next < total) {
        const task = tasks[next++];
        await runTask(task);
      }
    };

    const workerCount = this.concurrency === 0 ? total : Math.min(this.concurrency, total);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    logger.info('Searches finished', {
      request_id: requestId,
      searches_total: total,
      successful: results.length,
      failed,
      cancelled: signal?.aborted ?? false,
    });

    return results;
  }
}

export default SearchCoordinator;
