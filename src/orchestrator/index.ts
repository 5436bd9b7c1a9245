/**
 * Orchestrator exports for the column cascading engine
 */

export * from './cascading-engine.js';
