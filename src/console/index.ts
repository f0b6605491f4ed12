export * from './terminal-console.js';
export type * from './types.js';
