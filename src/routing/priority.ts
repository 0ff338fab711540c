/**
 * Default strategy: usable transports in ascending priority order.
 *
 * @module
 */

import { isUsable } from '../transport/types.js';
import type { Transport } from '../transport/types.js';
import { RoutingValidationError } from './errors.js';
import { DEFAULT_REACHABILITY_TIMEOUT_MS, probeReachability } from './probe.js';
import type { RoutingRequest, RoutingStrategy } from './types.js';

export interface PriorityRoutingOptions {
  /** Probe `canReach` and drop unreachable transports. Default: true */
  readonly filterUnreachable?: boolean;
  /** Per-transport probe bound in ms. Default: 2_000 */
  readonly reachabilityTimeoutMs?: number;
}

/** Stable ascending sort by priority. */
export function sortByPriority(transports: readonly Transport[]): Transport[] {
  return [...transports].sort((a, b) => a.priority - b.priority);
}

/**
 * Orders usable transports by priority (lower first).
 *
 * With `filterUnreachable`, every candidate is probed in parallel and only
 * reachable ones are kept. If none answers `true` the full usable set is
 * returned instead, so the caller still gets attempts and their errors; an
 * empty list means there were no usable transports at all.
 */
export class PriorityRoutingStrategy implements RoutingStrategy {
  readonly name = 'priority';
  private readonly filterUnreachable: boolean;
  private readonly reachabilityTimeoutMs: number;

  constructor(options: PriorityRoutingOptions = {}) {
    this.filterUnreachable = options.filterUnreachable ?? true;
    this.reachabilityTimeoutMs = options.reachabilityTimeoutMs ?? DEFAULT_REACHABILITY_TIMEOUT_MS;
    if (!(this.reachabilityTimeoutMs > 0)) {
      throw new RoutingValidationError('reachabilityTimeoutMs', 'must be a positive number');
    }
  }

  async selectTransports(request: RoutingRequest): Promise<Transport[]> {
    const usable = request.availableTransports.filter(isUsable);
    if (!this.filterUnreachable || usable.length === 0) {
      return sortByPriority(usable);
    }

    const reachable = await Promise.all(
      usable.map((t) => probeReachability(t, request.deviceId, this.reachabilityTimeoutMs)),
    );
    const filtered = usable.filter((_, i) => reachable[i]);

    return sortByPriority(filtered.length > 0 ? filtered : usable);
  }
}
