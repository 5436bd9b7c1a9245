/**
 * Repository exports
 */

export * from './pipeline-repository.js';
export * from './store-records.js';
export * from './workbook-store.js';
