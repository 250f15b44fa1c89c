/**
 * @file src/config/index.ts
 * @description Service configuration
 * @context Read by every component; values come from the environment (.env)
 */

import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = {
  // Service
  service: {
    name: process.env.SERVICE_NAME || 'Deep Research',
    version: process.env.SERVICE_VERSION || '1.0.0',
  },
  port: intFromEnv('PORT', 3000),
  env: process.env.NODE_ENV || 'development',
  isDev: process.env.NODE_ENV !== 'production',
  isTest: process.env.NODE_ENV === 'test',

  // CORS
  cors: {
    origins: (process.env.CORS_ORIGINS || '*').split(',').map(o => o.trim()),
  },

  // OpenAI (all agent roles)
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    baseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    maxOutputTokens: intFromEnv('OPENAI_MAX_OUTPUT_TOKENS', 4000),
  },

  // Pipeline
  clarifyingQuestions: intFromEnv('CLARIFYING_QUESTIONS', 3),
  searchesPerPlan: intFromEnv('SEARCHES_PER_PLAN', 3),
  searchConcurrency: intFromEnv('SEARCH_CONCURRENCY', 0),

  // Admission control
  rateLimit: {
    requestsPerMinute: intFromEnv('RATE_LIMIT_PER_MINUTE', 2),
    dailyLimit: intFromEnv('RATE_LIMIT_DAILY', 2),
  },

  // Email delivery
  mailjet: {
    apiKey: process.env.MAILJET_API_KEY || '',
    apiSecret: process.env.MAILJET_API_SECRET || '',
    apiUrl: process.env.MAILJET_API_URL || 'https://api.mailjet.com/v3.1',
    from: process.env.MAIL_FROM || '',
  },

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
  logToFile: process.env.LOG_TO_FILE === 'true',

  get logsPath(): string {
    return process.env.LOGS_PATH || path.join(process.cwd(), 'logs');
  },
};

export type AppConfig = typeof config;

export default config;

export * from './prompts';
