/**
 * Transport contract consumed by the router.
 *
 * Concrete channels (local network, short-range radio, relay) live outside
 * this package; they implement {@link Transport}, usually by composing a
 * {@link TransportSupport} for the shared bookkeeping.
 *
 * @module
 */

import type { MessageStream } from './broadcast.js';
import type { DeviceRegistry } from './device-registry.js';
import type { TransportMessage } from './message.js';
import type { TransportMetrics } from './metrics.js';
import type { TransportResult } from './result.js';

/**
 * Suggested priority bands. Lower is preferred.
 */
export const TRANSPORT_PRIORITY = {
  LOCAL_NETWORK: 10,
  SHORT_RANGE_OFFLINE: 20,
  LONG_RANGE_OFFLINE: 25,
  RELAY: 30,
} as const;

export interface TransportSendOptions {
  /** Upper bound for the attempt. Expiry yields a failed result, never a throw. */
  readonly timeoutMs?: number;
}

export interface Transport {
  /** Stable identity, used as the registry key. */
  readonly id: string;
  /** Human-readable name for logs. */
  readonly name: string;
  /** Lower is preferred. See {@link TRANSPORT_PRIORITY}. */
  readonly priority: number;
  /** Whether the channel exists on this platform at all. */
  readonly isAvailable: boolean;
  /** False until initialize() succeeds, and after a failed initialize(). */
  readonly isInitialized: boolean;
  readonly metrics: TransportMetrics;
  readonly devices: DeviceRegistry;
  /** Inbound messages, with `sourceTransportId` set to this transport's ID. */
  readonly incoming: MessageStream<TransportMessage>;

  /** Idempotent. */
  initialize(): Promise<void>;
  /** Idempotent. */
  dispose(): Promise<void>;

  /** Quick, ideally cached check. Callers bound it with their own timeout. */
  canReach(deviceId: string): Promise<boolean>;
  /** 0..100, higher is better. */
  getQuality(deviceId: string): Promise<number>;
  send(message: TransportMessage, options?: TransportSendOptions): Promise<TransportResult>;
  /** Fire-and-forget; no delivery contract. */
  sendAsync(message: TransportMessage): Promise<void>;
}

/** Transports eligible for routing: present on this platform and initialized. */
export function isUsable(transport: Transport): boolean {
  return transport.isAvailable && transport.isInitialized;
}
