/**
 * @file src/middleware/admission.ts
 * @description Admission check for expensive endpoints
 * @context Called by route handlers after input validation, so rejected input never consumes quota
 */

import { Request } from 'express';
import { RateLimiter } from '../services/rateLimiter';
import { AdmissionDeniedError } from '../types/errors';
import { resolveIdentifier } from '../utils/identity';

/**
 * @returns the caller identifier that was admitted
 * @throws AdmissionDeniedError when the caller is over a limit
 */
export function enforceAdmission(rateLimiter: RateLimiter, req: Request): string {
  const callerId = resolveIdentifier(req);
  const decision = rateLimiter.admit(callerId);

  if (!decision.allowed) {
    throw new AdmissionDeniedError(decision.reason, decision.message);
  }

  return callerId;
}
