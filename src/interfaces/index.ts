/**
 * Interface exports
 */

export * from './orchestrator.js';
export * from './services.js';
