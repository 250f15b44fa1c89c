/**
 * @file src/utils/identity.ts
 * @description Rate-limiter identifier for a caller
 * @context X-Forwarded-For (first hop) → socket address → "unknown"; "anonymous" without a request
 */

import { IncomingHttpHeaders } from 'http';

export const UNKNOWN_IDENTIFIER = 'unknown';
export const ANONYMOUS_IDENTIFIER = 'anonymous';

export interface RequestMetadata {
  headers: IncomingHttpHeaders;
  socket?: { remoteAddress?: string };
}

export function resolveIdentifier(req?: RequestMetadata): string {
  if (!req) {
    return ANONYMOUS_IDENTIFIER;
  }

  const header = req.headers['x-forwarded-for'];
  const forwardedFor = Array.isArray(header) ? header[0] : header;
  if (forwardedFor) {
    const first = forwardedFor.split(',')[0].trim();
    if (first) return first;
  }

  const remoteAddress = req.socket?.remoteAddress;
  if (remoteAddress) {
    return remoteAddress;
  }

  return UNKNOWN_IDENTIFIER;
}
