export * from './destroy-orchestrator.js';
export * from './infra-context.js';
export * from './provision-orchestrator.js';
export * from './state-reconciler.js';
export type * from './types.js';
