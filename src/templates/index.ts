export * from './compiler.js';
export * from './parameter-file.js';
export * from './types.js';
