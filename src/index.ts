/**
 * binpick - pick the right GitHub release asset for a platform and architecture.
 * Main library exports barrel file.
 */

// Detection
export * from './core/detect/index.js';

// Asset selection
export * from './core/assets/index.js';

// Configuration
export * from './core/config/index.js';

// GitHub
export * from './core/github/index.js';

// Platform
export * from './core/platform/index.js';

// Analysis
export * from './core/analyze/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
