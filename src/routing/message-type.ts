/**
 * Per-kind dispatch to delegate strategies.
 *
 * @module
 */

import type { TransportMessageKind } from '../transport/message.js';
import type { Transport } from '../transport/types.js';
import { PriorityRoutingStrategy } from './priority.js';
import type { RoutingRequest, RoutingStrategy } from './types.js';

export type MessageTypeRoutes = Readonly<Partial<Record<TransportMessageKind, RoutingStrategy>>>;

/**
 * Delegates to the strategy mapped for the message kind, or to `fallback`
 * (default: {@link PriorityRoutingStrategy}). Adds no filtering of its own.
 *
 * @example
 * ```typescript
 * const strategy = new MessageTypeRoutingStrategy({
 *   request: new QualityRoutingStrategy(),
 *   'direct-message': new FailoverRoutingStrategy(['relay']),
 * });
 * ```
 */
export class MessageTypeRoutingStrategy implements RoutingStrategy {
  readonly name = 'message-type';
  private readonly routes: MessageTypeRoutes;
  private readonly fallback: RoutingStrategy;

  constructor(routes: MessageTypeRoutes, fallback: RoutingStrategy = new PriorityRoutingStrategy()) {
    this.routes = { ...routes };
    this.fallback = fallback;
  }

  /** Strategy that will handle `kind`. */
  strategyFor(kind: TransportMessageKind): RoutingStrategy {
    return this.routes[kind] ?? this.fallback;
  }

  selectTransports(request: RoutingRequest): Promise<Transport[]> {
    return this.strategyFor(request.kind).selectTransports(request);
  }
}
