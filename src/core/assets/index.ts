export * from './pattern.js';
export * from './select.js';
