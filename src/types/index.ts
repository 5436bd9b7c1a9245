/**
 * Main types export for the column cascading engine
 */

// Common types and enums
export * from './common.js';

// Audit types
export * from './audit.js';

// Pipeline model types
export * from './pipeline.js';

// Cascade processing types
export * from './cascade.js';

// Error handling types
export * from './error-handling.js';
