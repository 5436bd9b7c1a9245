/**
 * Service exports for the column cascading engine
 */

export * from './audit-trail-service.js';
export * from './cascade-config.js';
export * from './cleanup-service.js';
export * from './column-groups.js';
export * from './column-id-allocator.js';
export * from './relation-processor.js';
export * from './stage-layers.js';
export * from './technical-field-catalog.js';
export * from './technical-field-table.js';
export * from './type-mapping-table.js';
export * from './upstream-references.js';
