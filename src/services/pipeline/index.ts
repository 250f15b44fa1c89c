/**
 * @file src/services/pipeline/index.ts
 * @description Pipeline module exports
 */

export { PipelineOrchestrator, default } from './orchestrator';
export { ClarificationStage } from './clarification';
export { SearchCoordinator } from './search';
export { validateResearchInput, collectValidPairs } from './validation';
