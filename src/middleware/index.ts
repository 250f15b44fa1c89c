/**
 * @file src/middleware/index.ts
 * @description Middleware exports
 */

export { errorHandler } from './errorHandler';
export { requestLogger } from './requestLogger';
export { enforceAdmission } from './admission';
