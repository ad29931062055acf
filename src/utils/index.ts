/**
 * Utility functions
 */

// Request spacing for rate-limited APIs
export * from './request-scheduler/index.js';

// Abortable timers
export * from './timing/index.js';
