/**
 * @file src/types/errors.ts
 * @description Service error taxonomy
 * @context AppError subclasses map to HTTP responses in middleware/errorHandler.ts.
 *          Per-search failures are not errors: they are AgentFault values absorbed
 *          by the search coordinator.
 */

import { AdmissionDenialReason, PipelineStage } from './research';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    errorCode: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class AdmissionDeniedError extends AppError {
  public readonly reason: AdmissionDenialReason;

  constructor(reason: AdmissionDenialReason, message: string) {
    super(message, 429, 'RATE_LIMIT_EXCEEDED');
    this.reason = reason;
  }
}

const STAGE_LABELS: Record<PipelineStage, string> = {
  validating: 'Input validation',
  planning: 'Planning',
  searching: 'Searching',
  writing: 'Writing',
  delivering: 'Delivery',
  skipping_delivery: 'Delivery',
  done: 'Pipeline',
};

/**
 * A required remote call failed or returned an unusable result; aborts the run
 */
export class StageFailureError extends AppError {
  public readonly stage: PipelineStage;
  public readonly detail: string;

  constructor(stage: PipelineStage, detail: string) {
    super(`${STAGE_LABELS[stage]} failed: ${detail}`, 502, 'STAGE_FAILED');
    this.stage = stage;
    this.detail = detail;
  }
}

export class AIProviderError extends AppError {
  public readonly provider: string;
  public readonly providerError: string;

  constructor(provider: string, error: string) {
    super(`AI Provider error (${provider}): ${error}`, 502, 'AI_PROVIDER_ERROR');
    this.provider = provider;
    this.providerError = error;
  }
}

export class MalformedOutputError extends AppError {
  public readonly provider: string;

  constructor(provider: string, detail: string) {
    super(`Malformed output from ${provider}: ${detail}`, 502, 'MALFORMED_OUTPUT');
    this.provider = provider;
  }
}

export class DeliveryProviderError extends AppError {
  public readonly provider: string;
  public readonly providerStatus: number;

  constructor(provider: string, status: number, error: string) {
    super(`Delivery provider error (${provider}): ${error}`, 502, 'DELIVERY_PROVIDER_ERROR');
    this.provider = provider;
    this.providerStatus = status;
  }
}

export class ResearchCancelledError extends AppError {
  constructor() {
    super('Research was cancelled', 400, 'RESEARCH_CANCELLED');
  }
}
