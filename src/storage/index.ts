/**
 * Storage module exports
 */
export { PostgresContentStore } from './postgres.store.js';
export * from './types.js';
