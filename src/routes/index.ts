/**
 * @file src/routes/index.ts
 * @description Route exports
 */

export { healthRouter } from './health';
export { createResearchRouter } from './research';
export type { ResearchRouterDeps } from './research';
