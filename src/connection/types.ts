/**
 * Configuration and status types for ConnectionManager.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import type { RoutingStrategy } from '../routing/types.js';
import type { TransportMetrics } from '../transport/metrics.js';

// ============================================================================
// Configuration
// ============================================================================

export interface LocalApiConfig {
  /** Port of the local application server. Required for forwarding. */
  port: number;
  /** Loopback host. Default: 'localhost' */
  host?: string;
  /** Only request paths starting with this prefix are forwarded. Default: '/api/' */
  apiPrefix?: string;
  /** Per-call timeout in ms. Default: 25_000 */
  timeoutMs?: number;
  /** fetch implementation. Default: globalThis.fetch */
  fetchFn?: typeof fetch;
}

export interface QueueConfig {
  /** Maximum queued messages. Default: 1000 */
  capacity?: number;
  /** Interval between queue processing ticks in ms. Default: 30_000 */
  processIntervalMs?: number;
}

export interface ConnectionManagerConfig {
  /** Logger instance. */
  logger?: Logger;
  /** Initial routing strategy. Default: PriorityRoutingStrategy */
  routingStrategy?: RoutingStrategy;
  /** Local application boundary. Without it inbound requests and DMs are not forwarded. */
  localApi?: LocalApiConfig;
  /** Store-and-forward queue settings. */
  queue?: QueueConfig;
  /** Bound for one transport send attempt in ms. Default: 30_000 */
  sendTimeoutMs?: number;
  /** Bound for one reachability probe in ms. Default: 2_000 */
  reachabilityTimeoutMs?: number;
}

// ============================================================================
// Status
// ============================================================================

export interface TransportStatus {
  id: string;
  name: string;
  priority: number;
  available: boolean;
  initialized: boolean;
  metrics: TransportMetrics;
}

export interface ConnectionManagerStatus {
  initialized: boolean;
  routingStrategy: string;
  queueSize: number;
  queueCapacity: number;
  transports: TransportStatus[];
}

// ============================================================================
// Send
// ============================================================================

export interface SendOptions {
  /** Strategy for this call only. Default: the manager's active strategy */
  strategy?: RoutingStrategy;
  /** Transport IDs to leave out of this call. */
  exclude?: Iterable<string>;
}

/** Counts from one pass over the store-and-forward queue. */
export interface RetrySummary {
  attempted: number;
  delivered: number;
  requeued: number;
  expired: number;
}
