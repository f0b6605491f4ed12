export * from './azure-control-plane.js';
export * from './azure-errors.js';
export * from './azure-purge-services.js';
export * from './deployment-lookup.js';
export * from './deployment-target.js';
export * from './progress-reporter.js';
export * from './retry.js';
export * from './types.js';
