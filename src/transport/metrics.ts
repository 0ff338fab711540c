/**
 * Rolling per-transport performance record.
 *
 * Pure data plus a functional update; every recorded send yields a new
 * snapshot.
 *
 * @module
 */

import type { TransportResult } from './result.js';

export interface TransportMetrics {
  /** Mean latency over every send that reported one, in ms. */
  readonly averageLatencyMs: number;
  /** Number of sends that contributed to `averageLatencyMs`. */
  readonly latencySamples: number;
  /** Successes ÷ total sends, 1.0 before the first send. */
  readonly successRate: number;
  readonly totalSent: number;
  readonly totalFailed: number;
  readonly lastSuccessAt: number | null;
  readonly lastFailureAt: number | null;
}

export const INITIAL_TRANSPORT_METRICS: TransportMetrics = Object.freeze({
  averageLatencyMs: 0,
  latencySamples: 0,
  successRate: 1,
  totalSent: 0,
  totalFailed: 0,
  lastSuccessAt: null,
  lastFailureAt: null,
});

/**
 * Fold one send outcome into `metrics`. Queued results are not sends and
 * return `metrics` unchanged.
 */
export function recordTransportOutcome(
  metrics: TransportMetrics,
  result: TransportResult,
  now: number = Date.now(),
): TransportMetrics {
  if (result.outcome === 'queued') return metrics;

  const totalSent = metrics.totalSent + 1;
  const totalFailed = metrics.totalFailed + (result.success ? 0 : 1);

  let { averageLatencyMs, latencySamples } = metrics;
  if (result.outcome === 'delivered' && result.latencyMs !== undefined) {
    latencySamples += 1;
    averageLatencyMs += (result.latencyMs - averageLatencyMs) / latencySamples;
  }

  return {
    averageLatencyMs,
    latencySamples,
    successRate: (totalSent - totalFailed) / totalSent,
    totalSent,
    totalFailed,
    lastSuccessAt: result.success ? now : metrics.lastSuccessAt,
    lastFailureAt: result.success ? metrics.lastFailureAt : now,
  };
}
