/**
 * Routing strategy contract.
 *
 * @module
 */

import type { TransportMessageKind } from '../transport/message.js';
import type { Transport } from '../transport/types.js';

export interface RoutingRequest {
  /** Target device. */
  readonly deviceId: string;
  readonly kind: TransportMessageKind;
  /** Candidates, in registry order. */
  readonly availableTransports: readonly Transport[];
}

/**
 * Orders and filters candidate transports for one message.
 *
 * Implementations read availability, metrics, reachability and quality;
 * they never mutate transport state.
 */
export interface RoutingStrategy {
  /** Name used in logs. */
  readonly name: string;
  selectTransports(request: RoutingRequest): Promise<Transport[]>;
}
