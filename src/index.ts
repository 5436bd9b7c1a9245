/**
 * Column cascading engine for multi-stage data pipeline models
 *
 * Main entry point
 */

// Export all types
export * from './types/index.js';

// Export all interfaces
export * from './interfaces/index.js';

// Export repository
export * from './repository/index.js';

// Export services
export * from './services/index.js';

// Export orchestrator
export * from './orchestrator/index.js';
