/**
 * Shared bookkeeping that concrete transports compose: initialized flag,
 * metrics accumulator, inbound broadcaster, device registry and
 * reachability notifications.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { Broadcaster } from './broadcast.js';
import type { MessageStream } from './broadcast.js';
import { DeviceRegistry, normalizeDeviceId } from './device-registry.js';
import type { DeviceRecord, DeviceRegistration } from './device-registry.js';
import { copyMessage } from './message.js';
import type { TransportMessage } from './message.js';
import { INITIAL_TRANSPORT_METRICS, recordTransportOutcome } from './metrics.js';
import type { TransportMetrics } from './metrics.js';
import type { TransportResult } from './result.js';

export interface DeviceReachabilityEvent {
  readonly transportId: string;
  readonly deviceId: string;
  readonly reachable: boolean;
}

/**
 * @example
 * ```typescript
 * class RelayTransport implements Transport {
 *   readonly id = 'relay';
 *   private readonly support = new TransportSupport('relay', logger);
 *   get isInitialized() { return this.support.isInitialized; }
 *   get metrics() { return this.support.metrics; }
 *   get devices() { return this.support.devices; }
 *   get incoming() { return this.support.incoming; }
 *   // ...
 * }
 * ```
 */
export class TransportSupport {
  readonly transportId: string;
  readonly devices = new DeviceRegistry();

  private _initialized = false;
  private _metrics: TransportMetrics = INITIAL_TRANSPORT_METRICS;
  private inbound: Broadcaster<TransportMessage>;
  private reachability: Broadcaster<DeviceReachabilityEvent>;
  private readonly logger: Logger;

  constructor(transportId: string, logger: Logger = silentLogger) {
    this.transportId = transportId;
    this.logger = logger;
    this.inbound = new Broadcaster(`${transportId}:incoming`, logger);
    this.reachability = new Broadcaster(`${transportId}:reachability`, logger);
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  get isInitialized(): boolean {
    return this._initialized;
  }

  markInitialized(): void {
    this._initialized = true;
  }

  markUninitialized(): void {
    this._initialized = false;
  }

  /**
   * Close both streams and forget devices. Fresh streams replace the closed
   * ones so the transport can be initialized again. Idempotent.
   */
  dispose(): void {
    this._initialized = false;
    this.inbound.close();
    this.reachability.close();
    this.inbound = new Broadcaster(`${this.transportId}:incoming`, this.logger);
    this.reachability = new Broadcaster(`${this.transportId}:reachability`, this.logger);
    this.devices.clear();
  }

  // --------------------------------------------------------------------------
  // Metrics
  // --------------------------------------------------------------------------

  get metrics(): TransportMetrics {
    return this._metrics;
  }

  /** Fold a send outcome into the metrics and hand the result back. */
  recordResult<R extends TransportResult>(result: R): R {
    this._metrics = recordTransportOutcome(this._metrics, result);
    return result;
  }

  // --------------------------------------------------------------------------
  // Inbound
  // --------------------------------------------------------------------------

  get incoming(): MessageStream<TransportMessage> {
    return this.inbound;
  }

  /** Publish an inbound message stamped with this transport's ID. */
  emitIncoming(message: TransportMessage): void {
    this.inbound.publish(copyMessage(message, { sourceTransportId: this.transportId }));
  }

  // --------------------------------------------------------------------------
  // Devices
  // --------------------------------------------------------------------------

  registerDevice(deviceId: string, registration?: DeviceRegistration): DeviceRecord {
    const known = this.devices.has(deviceId);
    const record = this.devices.register(deviceId, registration);
    if (!known) {
      this.logger.debug(`${this.transportId}: registered device ${record.deviceId}`);
      this.reachability.publish({ transportId: this.transportId, deviceId: record.deviceId, reachable: true });
    }
    return record;
  }

  /** Record a reachability change reported by the channel driver. */
  deviceReachabilityChanged(deviceId: string, reachable: boolean): void {
    const key = normalizeDeviceId(deviceId);
    if (!reachable) this.devices.remove(key);
    this.logger.debug(`${this.transportId}: device ${key} ${reachable ? 'reachable' : 'unreachable'}`);
    this.reachability.publish({ transportId: this.transportId, deviceId: key, reachable });
  }

  get reachabilityChanges(): MessageStream<DeviceReachabilityEvent> {
    return this.reachability;
  }
}
