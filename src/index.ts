// Public library surface for infra-provision
export * from './types/index.js';
export * from './errors/index.js';
export * from './logger.js';
export * from './config/index.js';
export * from './console/index.js';
export * from './templates/index.js';
export * from './parameters/index.js';
export * from './provisioning/index.js';
export * from './orchestration/index.js';
