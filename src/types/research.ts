/**
 * @file src/types/research.ts
 * @description Research pipeline data model
 * @context Shared by the pipeline stages, the agent gateway and the HTTP layer
 */

// ============================================
// Base types
// ============================================

export type PipelineStage =
  | 'validating'
  | 'planning'
  | 'searching'
  | 'writing'
  | 'delivering'
  | 'skipping_delivery'
  | 'done';

export type AdmissionDenialReason = 'per_minute_limit_exceeded' | 'daily_limit_exceeded';

// ============================================
// Clarification
// ============================================

export interface ClarifyingQuestions {
  questions: string[];
}

export type ClarificationOutcome =
  | { status: 'ok'; questions: string[] }
  | { status: 'invalid_input' | 'empty' | 'error'; message: string };

export interface QAPair {
  question: string;
  answer: string;
}

// ============================================
// Planning & searching
// ============================================

export interface SearchTask {
  readonly query: string;
  readonly reason: string;
}

export interface SearchPlan {
  readonly searches: readonly SearchTask[];
}

export type SearchResult = string;

// ============================================
// Writing & delivery
// ============================================

export interface Report {
  shortSummary: string;
  markdownBody: string;
  followUps: string;
}

export interface DeliveryRequest {
  recipient: string;
  shortSummary: string;
  markdownBody: string;
}

export interface DeliveryConfirmation {
  recipient: string;
  subject: string;
  messageId?: string;
}

// ============================================
// Pipeline input & run state
// ============================================

export interface DeliveryOptions {
  enabled: boolean;
  recipient?: string;
}

export interface ResearchInput {
  query: string;
  questions: string[];
  answers: string[];
  delivery?: DeliveryOptions;
}

export interface ValidatedResearchInput {
  query: string;
  pairs: QAPair[];
  recipient?: string;
}

export interface PipelineRun {
  traceId: string;
  query: string;
  pairs: QAPair[];
  plan?: SearchPlan;
  results: SearchResult[];
  report?: Report;
}

// ============================================
// Progress events (SSE)
// ============================================

export interface TraceEvent {
  type: 'trace';
  traceId: string;
  message: string;
}

export interface ProgressEvent {
  type: 'progress';
  stage: PipelineStage;
  message: string;
  details?: Record<string, unknown>;
}

export interface ReportEvent {
  type: 'report';
  report: Report;
  message: string; // markdown body
}

export interface FailureEvent {
  type: 'failure';
  stage: PipelineStage;
  error_code: string;
  message: string; // "❌ ..." prefixed
}

export type PipelineEvent = TraceEvent | ProgressEvent | ReportEvent | FailureEvent;

export const FAILURE_PREFIX = '❌';

export function isReportValid(report: Report): boolean {
  return report.shortSummary.trim().length > 0 && report.markdownBody.trim().length > 0;
}
