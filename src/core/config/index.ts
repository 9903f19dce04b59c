export * from './schema.js';
export * from './types.js';
export * from './normalize.js';
export * from './loader.js';
