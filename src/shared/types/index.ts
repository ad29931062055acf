/**
 * Shared types
 */

export * from './cursor.js';
export * from './job.js';
export * from './transport.js';
export * from './batch.js';
