/**
 * @file src/services/pipeline/clarification.ts
 * @description Clarification: three questions that narrow the query before the pipeline runs
 * @context Independent of the orchestrator; the caller collects answers and passes them to run()
 */

import config from '../../config';
import { AgentCallContext, AgentGateway } from '../agents/gateway';
import { ClarificationOutcome } from '../../types/research';
import { logger } from '../../utils/logger';
import { EMPTY_QUERY_MESSAGE } from './validation';

export const CLARIFICATION_EMPTY_MESSAGE = 'Could not generate questions. Please try again.';
export const CLARIFICATION_ERROR_MESSAGE = 'Error generating questions. Please try again.';

export class ClarificationStage {
  private readonly questionCount: number;

  constructor(
    private readonly gateway: AgentGateway,
    options: { questionCount?: number } = {}
  ) {
    this.questionCount = options.questionCount ?? config.clarifyingQuestions;
  }

  /**
   * Returns exactly questionCount questions (cut or padded with empty strings),
   * or a user-facing message; never throws
   */
  async clarify(query: string, context: AgentCallContext = {}): Promise<ClarificationOutcome> {
    const trimmed = query.trim();
    if (!trimmed) {
      return { status: 'invalid_input', message: EMPTY_QUERY_MESSAGE };
    }

    const outcome = await this.gateway.invoke('clarifier', trimmed, context);

    if (!outcome.ok) {
      logger.error('Error generating clarifying questions', {
        request_id: context.requestId,
        fault_kind: outcome.fault.kind,
        error: outcome.fault.message,
      });
      return { status: 'error', message: CLARIFICATION_ERROR_MESSAGE };
    }

    const questions = outcome.value.questions.map(q => q.trim()).filter(q => q.length > 0);

    if (questions.length === 0) {
      logger.warn('Clarifier returned no questions', { request_id: context.requestId });
      return { status: 'empty', message: CLARIFICATION_EMPTY_MESSAGE };
    }

    const fixed = questions.slice(0, this.questionCount);
    while (fixed.length < this.questionCount) {
      fixed.push('');
    }

    logger.info('Clarifying questions generated', {
      request_id: context.requestId,
      questions_count: questions.length,
    });

    return { status: 'ok', questions: fixed };
  }
}

export default ClarificationStage;
