/**
 * Configuration exports
 */

export {
  ToolkitConfig,
  getToolkitConfig,
  type ToolkitSettings,
} from './toolkit-config.js';

export {
  BatchTarget,
  RECORD_STREAM_BATCH_LIMITS,
  MESSAGE_QUEUE_BATCH_LIMITS,
  getBatchLimits,
} from './batch-limits.js';
