/**
 * Utility exports barrel file.
 */
export * from './errors.js';
export * from './logger.js';
export * from './file-system.js';
export * from './yaml.js';
export * from './path-matcher.js';
export * from './process.js';
export * from './string.js';
export * from './git.js';
