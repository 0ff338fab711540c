/**
 * Validation and defaults for ConnectionManager configuration.
 *
 * @module
 */

import { z } from 'zod';
import { ValidationError } from '../types/errors.js';
import { MAX_TIMER_DELAY_MS } from '../utils/async.js';
import { DEFAULT_QUEUE_CAPACITY } from './queue.js';
import type { ConnectionManagerConfig } from './types.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SEND_TIMEOUT_MS = 30_000;
export const DEFAULT_QUEUE_PROCESS_INTERVAL_MS = 30_000;
export const DEFAULT_LOCAL_API_TIMEOUT_MS = 25_000;
export const DEFAULT_API_PREFIX = '/api/';

// ============================================================================
// Schema
// ============================================================================

const positiveMs = z.number().int().positive().max(MAX_TIMER_DELAY_MS);

const ConnectionSettingsSchema = z.object({
  sendTimeoutMs: positiveMs.default(DEFAULT_SEND_TIMEOUT_MS),
  reachabilityTimeoutMs: positiveMs.default(2_000),
  queue: z
    .object({
      capacity: z.number().int().positive().default(DEFAULT_QUEUE_CAPACITY),
      processIntervalMs: positiveMs.default(DEFAULT_QUEUE_PROCESS_INTERVAL_MS),
    })
    .default({}),
  localApi: z
    .object({
      port: z.number().int().min(1).max(65_535),
      host: z.string().min(1).default('localhost'),
      apiPrefix: z.string().startsWith('/').default(DEFAULT_API_PREFIX),
      timeoutMs: positiveMs.default(DEFAULT_LOCAL_API_TIMEOUT_MS),
    })
    .optional(),
});

/** Numeric and string settings after defaults are applied. */
export type ConnectionSettings = z.infer<typeof ConnectionSettingsSchema>;

/** Thrown when ConnectionManager configuration is invalid. */
export class ConnectionConfigError extends ValidationError {
  constructor(field: string, reason: string) {
    super(`Invalid connection config: ${field}: ${reason}`, field);
    this.name = 'ConnectionConfigError';
  }
}

/**
 * Validate the plain-data part of `config` and fill in defaults.
 * Injected collaborators (logger, strategy, fetchFn) are not inspected.
 *
 * @throws {ConnectionConfigError} naming the first invalid field
 */
export function resolveConnectionSettings(config: ConnectionManagerConfig = {}): ConnectionSettings {
  const parsed = ConnectionSettingsSchema.safeParse({
    sendTimeoutMs: config.sendTimeoutMs,
    reachabilityTimeoutMs: config.reachabilityTimeoutMs,
    queue: config.queue && {
      capacity: config.queue.capacity,
      processIntervalMs: config.queue.processIntervalMs,
    },
    localApi: config.localApi && {
      port: config.localApi.port,
      host: config.localApi.host,
      apiPrefix: config.localApi.apiPrefix,
      timeoutMs: config.localApi.timeoutMs,
    },
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'config';
    throw new ConnectionConfigError(field, issue?.message ?? 'invalid value');
  }
  return parsed.data;
}
