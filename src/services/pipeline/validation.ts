/**
 * @file src/services/pipeline/validation.ts
 * @description Input checks run before any remote call or quota use
 * @context Shared by the orchestrator (Validating stage) and routes/research.ts.
 *          A count mismatch is fatal; an individual empty pair is dropped silently.
 */

import { QAPair, ResearchInput, ValidatedResearchInput } from '../../types/research';
import { ValidationError } from '../../types/errors';

export const EMPTY_QUERY_MESSAGE = 'Please enter a research query first.';
export const MISSING_RECIPIENT_MESSAGE = 'Please enter a recipient email to send the report.';

/**
 * Keeps the positional pairs where both sides are non-empty after trimming
 */
export function collectValidPairs(questions: string[], answers: string[]): QAPair[] {
  const pairs: QAPair[] = [];
  const count = Math.min(questions.length, answers.length);

  for (let i = 0; i < count; i++) {
    const question = questions[i].trim();
    const answer = answers[i].trim();
    if (question && answer) {
      pairs.push({ question, answer });
    }
  }

  return pairs;
}

/**
 * @throws ValidationError on an empty query, a missing recipient or a question/answer count mismatch
 */
export function validateResearchInput(input: ResearchInput): ValidatedResearchInput {
  const query = input.query.trim();
  if (!query) {
    throw new ValidationError(EMPTY_QUERY_MESSAGE);
  }

  const recipient = input.delivery?.recipient?.trim() ?? '';
  if (input.delivery?.enabled && !recipient) {
    throw new ValidationError(MISSING_RECIPIENT_MESSAGE);
  }

  if (input.questions.length !== input.answers.length) {
    throw new ValidationError(
      `Input validation failed: Mismatch: ${input.questions.length} questions but ${input.answers.length} answers`
    );
  }

  return {
    query,
    pairs: collectValidPairs(input.questions, input.answers),
    recipient: input.delivery?.enabled ? recipient : undefined,
  };
}
