/**
 * Asset detection exports barrel file.
 */
export * from './types.js';
export * from './rules.js';
export * from './prioritize.js';
export * from './system-detector.js';
export * from './single-asset.js';
export * from './chain.js';
export * from './factory.js';
