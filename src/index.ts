/**
 * guidesmith library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Categories
export * from './core/category/index.js';

// Scaffolding
export * from './core/scaffold/index.js';

// Validation pipeline
export * from './core/pipeline/index.js';

// Pre-commit gate
export * from './core/gate/index.js';

// Guide listing
export * from './core/guides/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
