/**
 * @file src/types/api.ts
 * @description HTTP request and response shapes
 * @context Request bodies are checked with zod in routes/research.ts
 */

import { z } from 'zod';

// ============================================
// Requests
// ============================================

export const clarifyRequestSchema = z.object({
  query: z.string().default(''),
});

export const researchRequestSchema = z.object({
  query: z.string().default(''),
  questions: z.array(z.string()).default([]),
  answers: z.array(z.string()).default([]),
  send_email: z.boolean().default(false),
  recipient_email: z.string().default(''),
});

// ============================================
// Responses
// ============================================

export interface ApiResponse<T = unknown> {
  status: 'success' | 'error';
  data?: T;
  error_code?: string;
  message?: string;
  request_id?: string;
}

export interface ClarifyResponseData {
  questions: string[];
}
