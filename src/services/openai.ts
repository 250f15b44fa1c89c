/**
 * @file src/services/openai.ts
 * @description Client for the OpenAI Responses API
 * @context Backs every text-producing agent role (clarifier, planner, searcher, writer, email composer)
 * @dependencies config/index.ts, utils/helpers.ts, utils/logger.ts
 * @affects services/agents/openaiGateway.ts
 */

import { z } from 'zod';
import config from '../config';
import { AIProviderError, MalformedOutputError } from '../types/errors';
import { logger, logAiCall } from '../utils/logger';
import { extractJsonFromText } from '../utils/helpers';

// ============================================
// Responses API shapes
// ============================================

interface OpenAIResponsesRequest {
  model: string;
  instructions?: string;
  input: string;
  max_output_tokens?: number;
  temperature?: number;
  tools?: OpenAITool[];
  tool_choice?: 'auto' | 'required' | 'none';
  text?: {
    format: OpenAITextFormat;
  };
}

export type OpenAITool = { type: 'web_search_preview'; search_context_size?: 'low' | 'medium' | 'high' };

type OpenAITextFormat =
  | { type: 'text' }
  | {
      type: 'json_schema';
      name: string;
      schema: Record<string, unknown>;
      strict: boolean;
    };

const responsesResponseSchema = z.object({
  id: z.string().optional(),
  output: z
    .array(
      z.object({
        type: z.string(),
        content: z
          .array(z.object({ type: z.string(), text: z.string().optional() }))
          .optional(),
      })
    )
    .default([]),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

type OpenAIResponsesResponse = z.infer<typeof responsesResponseSchema>;

export interface CompletionUsage {
  input: number;
  output: number;
}

export interface CompleteOptions {
  instructions?: string;
  temperature?: number;
  maxTokens?: number;
  tools?: OpenAITool[];
  requestId?: string;
  signal?: AbortSignal;
  /** Label for log lines (agent role) */
  action?: string;
}

export interface CompleteJsonOptions<T> extends CompleteOptions {
  jsonSchema: {
    name: string;
    schema: Record<string, unknown>;
  };
  parser: z.ZodType<T, z.ZodTypeDef, unknown>;
}

// ============================================
// OpenAIService
// ============================================

export class OpenAIService {
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private defaultMaxTokens: number;

  constructor(options: { apiKey?: string; baseUrl?: string; model?: string; maxOutputTokens?: number } = {}) {
    this.apiKey = options.apiKey ?? config.openai.apiKey;
    this.baseUrl = options.baseUrl ?? config.openai.baseUrl;
    this.model = options.model ?? config.openai.model;
    this.defaultMaxTokens = options.maxOutputTokens ?? config.openai.maxOutputTokens;
  }

  /**
   * Plain-text completion; with tools the model may call hosted tools (web search) first
   */
  async complete(
    prompt: string,
    options: CompleteOptions = {}
  ): Promise<{ content: string; usage: CompletionUsage }> {
    const requestBody: OpenAIResponsesRequest = {
      model: this.model,
      input: prompt,
      max_output_tokens: options.maxTokens ?? this.defaultMaxTokens,
    };

    if (options.instructions) {
      requestBody.instructions = options.instructions;
    }
    if (options.temperature !== undefined) {
      requestBody.temperature = options.temperature;
    }
    if (options.tools && options.tools.length > 0) {
      requestBody.tools = options.tools;
      requestBody.tool_choice = 'required';
    }

    const { content, usage } = await this.send(requestBody, prompt, options, 'complete');
    return { content, usage };
  }

  /**
   * Structured JSON completion through text.format; the payload is checked with the parser
   */
  async completeJson<T>(
    prompt: string,
    options: CompleteJsonOptions<T>
  ): Promise<{ data: T; usage: CompletionUsage }> {
    const effectiveInstructions = options.instructions
      ? `${options.instructions}\n\nIMPORTANT: Respond ONLY with valid JSON. No explanations, no markdown.`
      : 'Respond ONLY with valid JSON. No explanations, no markdown.';

    const requestBody: OpenAIResponsesRequest = {
      model: this.model,
      input: prompt,
      instructions: effectiveInstructions,
      max_output_tokens: options.maxTokens ?? this.defaultMaxTokens,
      text: {
        format: {
          type: 'json_schema',
          name: options.jsonSchema.name,
          schema: options.jsonSchema.schema,
          strict: true,
        },
      },
    };

    if (options.temperature !== undefined) {
      requestBody.temperature = options.temperature;
    }

    const { content, usage } = await this.send(requestBody, prompt, options, 'completeJson');

    let raw: unknown;
    try {
      raw = JSON.parse(extractJsonFromText(content));
    } catch {
      throw new MalformedOutputError('openai', 'response is not valid JSON');
    }

    const parsed = options.parser.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MalformedOutputError(
        'openai',
        issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'unexpected shape'
      );
    }

    return { data: parsed.data, usage };
  }

  private async send(
    requestBody: OpenAIResponsesRequest,
    prompt: string,
    options: CompleteOptions,
    method: string
  ): Promise<{ content: string; usage: CompletionUsage }> {
    const startTime = Date.now();
    const requestId = options.requestId || 'unknown';

    try {
      const res = await fetch(`${this.baseUrl}/responses`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(requestBody),
        signal: options.signal,
      });

      if (!res.ok) {
        const errorText = await res.text();
        throw new AIProviderError('openai', `HTTP ${res.status}: ${errorText}`);
      }

      const parsed = responsesResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new MalformedOutputError('openai', 'unexpected Responses API payload');
      }

      const response = parsed.data;
      const content = this.extractOutputText(response);
      const usage = {
        input: response.usage?.input_tokens ?? 0,
        output: response.usage?.output_tokens ?? 0,
      };

      logAiCall(requestId, 'openai', this.model, options.action ?? method, {
        prompt_length: prompt.length,
        response_length: content.length,
        duration_ms: Date.now() - startTime,
        tokens: usage,
      });

      if (content.length === 0) {
        throw new MalformedOutputError('openai', 'response contained no output text');
      }

      return { content, usage };
    } catch (error) {
      logger.error(`OpenAI ${method} failed`, {
        request_id: requestId,
        model: this.model,
        action: options.action,
        error: error instanceof Error ? error.message : 'Unknown error',
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }

  /**
   * First output_text block of the first message item
   */
  private extractOutputText(response: OpenAIResponsesResponse): string {
    for (const output of response.output) {
      if (output.type === 'message' && output.content) {
        for (const block of output.content) {
          if (block.type === 'output_text' && block.text) {
            return block.text;
          }
        }
      }
    }

    return '';
  }
}

export default OpenAIService;
