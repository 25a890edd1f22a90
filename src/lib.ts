/**
 * taskopt Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Option resolution engine
export * from './option/index.js';

// Scheduling
export * from './scheduler/index.js';

// Task Files
export * from './task-file/index.js';

// Default capabilities
export * from './runtime/index.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type TaskoptConfig } from './config/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
