/**
 * Toolkit Configuration
 *
 * Defaults for waiting, batching, caching and request spacing, read once
 * from the environment.
 *
 * Environment Variables (all optional, positive integers):
 * - JOB_TIMEOUT_MS            - Deadline for a job wait (default 300000)
 * - JOB_CHECK_INTERVAL_MS     - Pause between status polls (default 1000)
 * - BATCH_SINGLE_LIMIT_BYTES  - Per-entry size limit (default 1000000)
 * - BATCH_TOTAL_LIMIT_BYTES   - Per-batch size limit (default 5000000)
 * - BATCH_RECORD_LIMIT        - Entries per batch (default 500)
 * - LOOKUP_CACHE_TTL_MS       - Time to live of cached lookups (default 300000)
 * - HTTP_MIN_SPACING_MS       - Minimum gap between HTTP requests (default 200)
 *
 * Components never read this on their own; callers pass the values in.
 */

import type { BatchLimits, WaitOptions } from '../shared/types/index.js';
import { RECORD_STREAM_BATCH_LIMITS } from './batch-limits.js';

export interface ToolkitSettings {
  jobTimeoutMs: number;
  jobCheckIntervalMs: number;
  batchLimits: BatchLimits;
  lookupCacheTtlMs: number;
  httpMinSpacingMs: number;
}

type Environment = Record<string, string | undefined>;

/**
 * Toolkit Configuration Manager
 *
 * Uses singleton pattern for convenient default access.
 */
export class ToolkitConfig {
  private static instance: ToolkitConfig | null = null;
  private readonly settings: ToolkitSettings;

  /**
   * @param env - Variables to read; defaults to process.env
   * @throws Error naming the variable if a value is not a positive integer
   */
  constructor(env: Environment = process.env) {
    this.settings = {
      jobTimeoutMs: readPositiveInt(env, 'JOB_TIMEOUT_MS', 300_000),
      jobCheckIntervalMs: readPositiveInt(env, 'JOB_CHECK_INTERVAL_MS', 1_000),
      batchLimits: {
        singleLimit: readPositiveInt(
          env,
          'BATCH_SINGLE_LIMIT_BYTES',
          RECORD_STREAM_BATCH_LIMITS.singleLimit
        ),
        totalLimit: readPositiveInt(
          env,
          'BATCH_TOTAL_LIMIT_BYTES',
          RECORD_STREAM_BATCH_LIMITS.totalLimit
        ),
        recordLimit: readPositiveInt(
          env,
          'BATCH_RECORD_LIMIT',
          RECORD_STREAM_BATCH_LIMITS.recordLimit
        ),
      },
      lookupCacheTtlMs: readPositiveInt(env, 'LOOKUP_CACHE_TTL_MS', 300_000),
      httpMinSpacingMs: readPositiveInt(env, 'HTTP_MIN_SPACING_MS', 200),
    };
  }

  /**
   * Get singleton instance of ToolkitConfig
   * Lazily creates instance on first access
   */
  static getInstance(): ToolkitConfig {
    if (!ToolkitConfig.instance) {
      ToolkitConfig.instance = new ToolkitConfig();
    }
    return ToolkitConfig.instance;
  }

  /**
   * Reset singleton instance (useful for testing)
   */
  static resetInstance(): void {
    ToolkitConfig.instance = null;
  }

  /**
   * Wait options for JobPoller and ResultStreamer
   */
  getWaitOptions(): WaitOptions {
    return {
      timeoutMs: this.settings.jobTimeoutMs,
      checkIntervalMs: this.settings.jobCheckIntervalMs,
    };
  }

  getBatchLimits(): BatchLimits {
    return { ...this.settings.batchLimits };
  }

  get lookupCacheTtlMs(): number {
    return this.settings.lookupCacheTtlMs;
  }

  get httpMinSpacingMs(): number {
    return this.settings.httpMinSpacingMs;
  }
}

/**
 * Get the default ToolkitConfig singleton instance
 */
export function getToolkitConfig(): ToolkitConfig {
  return ToolkitConfig.getInstance();
}

function readPositiveInt(env: Environment, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}
