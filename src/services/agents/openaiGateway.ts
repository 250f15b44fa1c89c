/**
 * @file src/services/agents/openaiGateway.ts
 * @description Production AgentGateway: OpenAI Responses API for the text roles, Mailjet for delivery
 * @context Structured roles (clarifier, planner, writer) use JSON schema output checked with zod;
 *          the searcher uses the hosted web search tool and returns plain text
 * @dependencies services/openai.ts, services/mailjet.ts, config/prompts.ts
 */

import { z } from 'zod';
import config, {
  getClarifierInstructions,
  getPlannerInstructions,
  SEARCHER_INSTRUCTIONS,
  WRITER_INSTRUCTIONS,
  DELIVERY_INSTRUCTIONS,
} from '../../config';
import { OpenAIService } from '../openai';
import { MailjetService } from '../mailjet';
import { AgentHandlers, HandlerAgentGateway } from './gateway';

// ============================================
// Output schemas
// ============================================

const clarifierOutput = z.object({
  questions: z.array(z.string()),
});

const plannerOutput = z
  .object({
    searches: z.array(z.object({ reason: z.string(), query: z.string().min(1) })),
  })
  .transform(data => ({
    searches: data.searches.map(s => ({ query: s.query, reason: s.reason })),
  }));

const writerOutput = z
  .object({
    short_summary: z.string(),
    markdown_report: z.string(),
    follow_up_questions: z.string(),
  })
  .transform(data => ({
    shortSummary: data.short_summary,
    markdownBody: data.markdown_report,
    followUps: data.follow_up_questions,
  }));

const emailOutput = z.object({
  subject: z.string().min(1),
  html_body: z.string().min(1),
});

// JSON schemas sent with text.format (strict mode requires every property listed)
const CLARIFIER_JSON_SCHEMA = {
  type: 'object',
  properties: {
    questions: { type: 'array', items: { type: 'string' } },
  },
  required: ['questions'],
  additionalProperties: false,
};

const PLANNER_JSON_SCHEMA = {
  type: 'object',
  properties: {
    searches: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          reason: { type: 'string' },
          query: { type: 'string' },
        },
        required: ['reason', 'query'],
        additionalProperties: false,
      },
    },
  },
  required: ['searches'],
  additionalProperties: false,
};

const WRITER_JSON_SCHEMA = {
  type: 'object',
  properties: {
    short_summary: { type: 'string' },
    markdown_report: { type: 'string' },
    follow_up_questions: { type: 'string' },
  },
  required: ['short_summary', 'markdown_report', 'follow_up_questions'],
  additionalProperties: false,
};

const EMAIL_JSON_SCHEMA = {
  type: 'object',
  properties: {
    subject: { type: 'string' },
    html_body: { type: 'string' },
  },
  required: ['subject', 'html_body'],
  additionalProperties: false,
};

export interface OpenAIAgentGatewayOptions {
  openai?: OpenAIService;
  mailer?: MailjetService;
  questionCount?: number;
  searchCount?: number;
}

export function createOpenAIAgentHandlers(options: OpenAIAgentGatewayOptions = {}): AgentHandlers {
  const openai = options.openai ?? new OpenAIService();
  const mailer = options.mailer ?? new MailjetService();
  const questionCount = options.questionCount ?? config.clarifyingQuestions;
  const searchCount = options.searchCount ?? config.searchesPerPlan;

  return {
    clarifier: async (query, context) => {
      const result = await openai.completeJson(query, {
        instructions: getClarifierInstructions(questionCount),
        jsonSchema: { name: 'clarifying_questions', schema: CLARIFIER_JSON_SCHEMA },
        parser: clarifierOutput,
        temperature: 0.3,
        maxTokens: 500,
        action: 'clarifier',
        ...context,
      });
      return result.data;
    },

    planner: async (prompt, context) => {
      const result = await openai.completeJson(prompt, {
        instructions: getPlannerInstructions(searchCount),
        jsonSchema: { name: 'web_search_plan', schema: PLANNER_JSON_SCHEMA },
        parser: plannerOutput,
        temperature: 0.2,
        maxTokens: 1000,
        action: 'planner',
        ...context,
      });
      return result.data;
    },

    searcher: async (prompt, context) => {
      const result = await openai.complete(prompt, {
        instructions: SEARCHER_INSTRUCTIONS,
        tools: [{ type: 'web_search_preview', search_context_size: 'low' }],
        maxTokens: 1000,
        action: 'searcher',
        ...context,
      });
      return result.content;
    },

    writer: async (prompt, context) => {
      const result = await openai.completeJson(prompt, {
        instructions: WRITER_INSTRUCTIONS,
        jsonSchema: { name: 'report_data', schema: WRITER_JSON_SCHEMA },
        parser: writerOutput,
        action: 'writer',
        ...context,
      });
      return result.data;
    },

    delivery: async (request, context) => {
      const composed = await openai.completeJson(request.markdownBody, {
        instructions: DELIVERY_INSTRUCTIONS,
        jsonSchema: { name: 'report_email', schema: EMAIL_JSON_SCHEMA },
        parser: emailOutput,
        action: 'delivery',
        ...context,
      });

      const sent = await mailer.send(
        {
          to: request.recipient,
          subject: composed.data.subject,
          html: composed.data.html_body,
        },
        context
      );

      return {
        recipient: request.recipient,
        subject: composed.data.subject,
        messageId: sent.messageId,
      };
    },
  };
}

export function createOpenAIAgentGateway(options: OpenAIAgentGatewayOptions = {}): HandlerAgentGateway {
  return new HandlerAgentGateway(createOpenAIAgentHandlers(options));
}
