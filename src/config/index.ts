export * from './config-store.js';
export * from './environment.js';
export * from './loader.js';
export * from './naming.js';
export * from './types.js';
export * from './validator.js';
