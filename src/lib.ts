/**
 * Library API
 *
 * Exports the public modules for programmatic usage.
 */

// Types and errors
export * from './types/index.js';

// Composition root
export { createRuntime, type Runtime, type RuntimeConfig, type RuntimeOverrides } from './runtime.js';

// Configuration
export { getConfig, loadConfig, resetConfig, StoreKind, type DurableAgentsConfig } from './config/index.js';

// Core
export * as agent from './agent/index.js';
export * as entity from './entity/index.js';
export * as orchestrator from './orchestrator/index.js';
export * as store from './store/index.js';
export * as workflows from './workflows/index.js';

// Outer layers
export * as server from './server/index.js';
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
export { KeyedSerialQueue } from './utils/keyed-queue.js';
