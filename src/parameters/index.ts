export * from './dependency-graph.js';
export * from './password.js';
export * from './prompt.js';
export * from './quota.js';
export * from './resolver.js';
export type * from './types.js';
export * from './validators.js';
export * from './values.js';
