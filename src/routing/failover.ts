/**
 * Explicit fixed-order strategy with fallback to the rest.
 *
 * @module
 */

import { isUsable } from '../transport/types.js';
import type { Transport } from '../transport/types.js';
import { RoutingValidationError } from './errors.js';
import type { RoutingRequest, RoutingStrategy } from './types.js';

/**
 * Emits the usable transports named in `order` (in that order), then every
 * other usable transport in registry order.
 */
export class FailoverRoutingStrategy implements RoutingStrategy {
  readonly name = 'failover';
  readonly order: readonly string[];

  constructor(order: readonly string[]) {
    if (new Set(order).size !== order.length) {
      throw new RoutingValidationError('order', 'transport IDs must be unique');
    }
    this.order = [...order];
  }

  async selectTransports(request: RoutingRequest): Promise<Transport[]> {
    const usable = request.availableTransports.filter(isUsable);
    const byId = new Map(usable.map((t) => [t.id, t]));

    const preferred: Transport[] = [];
    for (const id of this.order) {
      const transport = byId.get(id);
      if (transport) preferred.push(transport);
    }

    const named = new Set(this.order);
    const rest = usable.filter((t) => !named.has(t.id));
    return [...preferred, ...rest];
  }
}
