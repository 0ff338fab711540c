/**
 * ConnectionManager: transport-agnostic delivery to remote devices.
 *
 * Holds the transport registry and the active routing strategy, tries the
 * strategy's transports one at a time until one delivers, and falls back to
 * a bounded store-and-forward queue that is retried on a timer. Inbound
 * traffic from every usable transport is merged into one stream; API
 * requests and direct messages are replayed against the local application
 * server before being republished.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { toErrorMessage, withTimeout } from '../utils/async.js';
import { RuntimeErrorCodes } from '../types/errors.js';
import { Broadcaster, mergeStreams } from '../transport/broadcast.js';
import type { MessageStream, StreamSubscription } from '../transport/broadcast.js';
import {
  apiRequestMessage,
  apiResponseMessage,
  copyMessage,
  directMessage,
  isExpired,
  roomMessage,
} from '../transport/message.js';
import type {
  ApiRequestInit,
  DirectMessageInit,
  RoomMessageInit,
  TransportMessage,
} from '../transport/message.js';
import type { TransportMetrics } from '../transport/metrics.js';
import { failedResult, queuedResult } from '../transport/result.js';
import type { TransportResult } from '../transport/result.js';
import { isUsable } from '../transport/types.js';
import type { Transport } from '../transport/types.js';
import { PriorityRoutingStrategy } from '../routing/priority.js';
import { probeReachability } from '../routing/probe.js';
import type { RoutingStrategy } from '../routing/types.js';
import { resolveConnectionSettings } from './config.js';
import type { ConnectionSettings } from './config.js';
import { LocalApiForwarder } from './local-api.js';
import { MessageQueue } from './queue.js';
import type {
  ConnectionManagerConfig,
  ConnectionManagerStatus,
  RetrySummary,
  SendOptions,
} from './types.js';

// ============================================================================
// ConnectionManager
// ============================================================================

/**
 * Routes messages to devices over whichever registered transport can
 * deliver them.
 *
 * One instance is created by the application's composition root and
 * injected wherever messages are sent; tests construct their own.
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager({ localApi: { port: 3456 }, logger });
 * await manager.registerTransport(lanTransport);
 * await manager.registerTransport(relayTransport);
 * await manager.initialize();
 *
 * const result = await manager.apiRequest({ deviceId: 'X1ABCD', method: 'GET', path: '/api/status' });
 * if (result.outcome === 'delivered') console.log(result.transportUsed);
 * ```
 */
export class ConnectionManager {
  // Registry
  private readonly registry = new Map<string, Transport>();
  private strategy: RoutingStrategy;

  // Inbound
  private external: Broadcaster<TransportMessage>;
  private merged: StreamSubscription | null = null;
  private readonly forwarder: LocalApiForwarder | null;

  // Store-and-forward
  private readonly queue: MessageQueue;
  private queueTimer: ReturnType<typeof setInterval> | null = null;
  private retryInFlight: Promise<RetrySummary> | null = null;
  /** Bumped by dispose(); a retry pass from an older generation stops re-queueing. */
  private generation = 0;

  // Config
  private readonly settings: ConnectionSettings;
  private readonly logger: Logger;

  private _initialized = false;

  /** @throws {ConnectionConfigError} when a setting is out of range */
  constructor(config: ConnectionManagerConfig = {}) {
    this.settings = resolveConnectionSettings(config);
    this.logger = config.logger ?? silentLogger;
    this.strategy =
      config.routingStrategy ??
      new PriorityRoutingStrategy({ reachabilityTimeoutMs: this.settings.reachabilityTimeoutMs });
    this.queue = new MessageQueue(this.settings.queue.capacity);
    this.external = new Broadcaster('connection:incoming', this.logger);

    const localApi = this.settings.localApi;
    this.forwarder = localApi
      ? new LocalApiForwarder({
          ...localApi,
          fetchFn: config.localApi?.fetchFn,
          logger: this.logger,
        })
      : null;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  get isInitialized(): boolean {
    return this._initialized;
  }

  /**
   * Initialize every registered transport, start the merged inbound stream
   * and the queue timer. Transports that fail to initialize stay registered
   * and are skipped by routing. Idempotent.
   */
  async initialize(): Promise<void> {
    if (this._initialized) return;
    this.logger.info('ConnectionManager initializing...');

    for (const transport of this.registry.values()) {
      await this.initializeTransport(transport);
    }

    if (this.external.closed) {
      this.external = new Broadcaster('connection:incoming', this.logger);
    }
    this._initialized = true;
    this.rebuildIncoming();
    this.startQueueProcessor();

    this.logger.info(`ConnectionManager initialized with ${this.registry.size} transports`);
  }

  /**
   * Stop the queue timer, dispose every transport and close both streams.
   * A retry pass already running is awaited before the queue is cleared.
   * The manager can be initialized again afterwards.
   */
  async dispose(): Promise<void> {
    if (this.queueTimer !== null) {
      clearInterval(this.queueTimer);
      this.queueTimer = null;
    }
    this.generation++;

    for (const transport of this.registry.values()) {
      try {
        await transport.dispose();
      } catch (err) {
        this.logger.error(`Error disposing transport ${transport.id}: ${toErrorMessage(err)}`);
      }
    }

    this.merged?.unsubscribe();
    this.merged = null;
    this.external.close();

    if (this.retryInFlight) {
      try {
        await this.retryInFlight;
      } catch (err) {
        this.logger.error(`Queue retry failed during dispose: ${toErrorMessage(err)}`);
      }
    }

    this.registry.clear();
    this.queue.clear();
    this._initialized = false;
    this.logger.info('ConnectionManager disposed');
  }

  // --------------------------------------------------------------------------
  // Transport Registry
  // --------------------------------------------------------------------------

  /**
   * Add `transport`, replacing any registered under the same ID.
   *
   * After {@link initialize} the transport is initialized here; the promise
   * settles once that attempt has finished and the merged inbound stream
   * includes it.
   */
  async registerTransport(transport: Transport): Promise<void> {
    const previous = this.registry.get(transport.id);
    if (previous && previous !== transport) {
      this.logger.warn(`Transport ${transport.id} already registered, replacing`);
      await this.unregisterTransport(transport.id);
    }

    this.registry.set(transport.id, transport);
    this.logger.info(
      `Registered transport ${transport.id} (priority: ${transport.priority}, available: ${transport.isAvailable})`,
    );

    if (!this._initialized) return;
    if (!transport.isInitialized) {
      await this.initializeTransport(transport);
    }
    this.rebuildIncoming();
  }

  /** Remove and dispose the transport with `transportId`. Returns false if none was registered. */
  async unregisterTransport(transportId: string): Promise<boolean> {
    const transport = this.registry.get(transportId);
    if (!transport) return false;

    this.registry.delete(transportId);
    if (this._initialized) this.rebuildIncoming();

    try {
      await transport.dispose();
    } catch (err) {
      this.logger.error(`Error disposing transport ${transportId}: ${toErrorMessage(err)}`);
    }
    this.logger.info(`Unregistered transport ${transportId}`);
    return true;
  }

  getTransport(transportId: string): Transport | undefined {
    return this.registry.get(transportId);
  }

  /** Every registered transport, in registration order. */
  get transports(): Transport[] {
    return [...this.registry.values()];
  }

  /** Registered transports that are available and initialized. */
  get availableTransports(): Transport[] {
    return this.transports.filter(isUsable);
  }

  get routingStrategy(): RoutingStrategy {
    return this.strategy;
  }

  setRoutingStrategy(strategy: RoutingStrategy): void {
    this.strategy = strategy;
    this.logger.info(`Routing strategy set to ${strategy.name}`);
  }

  // --------------------------------------------------------------------------
  // Sending
  // --------------------------------------------------------------------------

  /**
   * Deliver `message` over the first transport, in strategy order, that
   * reports success.
   *
   * Never throws. Failed attempts, timeouts and exceptions move on to the
   * next transport. When nothing delivers, the message is queued if it asks
   * for it, otherwise a failed result carrying an `errorCode` is returned.
   */
  async send(message: TransportMessage, options: SendOptions = {}): Promise<TransportResult> {
    if (!this._initialized) {
      return failedResult('ConnectionManager not initialized', {
        errorCode: RuntimeErrorCodes.NOT_INITIALIZED,
      });
    }

    this.logger.debug(`Sending ${message.kind} ${message.id} to ${message.targetDeviceId}`);

    const candidates = await this.selectCandidates(message, options);

    if (candidates.length === 0) {
      if (message.queueIfOffline) return this.enqueue(message);
      return failedResult(`No transport available for ${message.targetDeviceId}`, {
        errorCode: RuntimeErrorCodes.NO_ROUTE,
      });
    }

    let lastTried: string | undefined;
    for (const transport of candidates) {
      lastTried = transport.id;
      const result = await this.attempt(transport, message);
      if (result.success) {
        const latency = result.outcome === 'delivered' ? result.latencyMs : undefined;
        this.logger.debug(`Delivered ${message.id} via ${transport.id} (${latency ?? '?'}ms)`);
        return result;
      }
      this.logger.warn(`Transport ${transport.id} failed for ${message.id}: ${result.error}`);
    }

    if (message.queueIfOffline) return this.enqueue(message);
    return failedResult(`All transports failed for ${message.targetDeviceId}`, {
      transportUsed: lastTried,
      errorCode: RuntimeErrorCodes.ALL_TRANSPORTS_FAILED,
    });
  }

  /** Send an HTTP-style request to a device's API. */
  apiRequest(init: ApiRequestInit, options?: SendOptions): Promise<TransportResult> {
    return this.send(apiRequestMessage(init), options);
  }

  /** Send a signed direct message. */
  sendDM(init: DirectMessageInit): Promise<TransportResult> {
    return this.send(directMessage(init));
  }

  /** Send a signed message to a chat room hosted by a device. */
  sendChat(init: RoomMessageInit): Promise<TransportResult> {
    return this.send(roomMessage(init));
  }

  // --------------------------------------------------------------------------
  // Reachability
  // --------------------------------------------------------------------------

  /** True as soon as any usable transport reports `deviceId` reachable. */
  async isReachable(deviceId: string): Promise<boolean> {
    if (!this._initialized) return false;
    for (const transport of this.availableTransports) {
      if (await probeReachability(transport, deviceId, this.settings.reachabilityTimeoutMs)) {
        return true;
      }
    }
    return false;
  }

  /** IDs of every usable transport that reports `deviceId` reachable. */
  async getAvailableTransports(deviceId: string): Promise<string[]> {
    if (!this._initialized) return [];
    const reachable: string[] = [];
    for (const transport of this.availableTransports) {
      if (await probeReachability(transport, deviceId, this.settings.reachabilityTimeoutMs)) {
        reachable.push(transport.id);
      }
    }
    return reachable;
  }

  // --------------------------------------------------------------------------
  // Inbound
  // --------------------------------------------------------------------------

  /**
   * Every inbound message from every usable transport, including those
   * already handled by local dispatch.
   */
  get incoming(): MessageStream<TransportMessage> {
    return this.external;
  }

  // --------------------------------------------------------------------------
  // Store-and-forward Queue
  // --------------------------------------------------------------------------

  /** Snapshot of queued messages, oldest first. */
  get pendingMessages(): TransportMessage[] {
    return this.queue.toArray();
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  /**
   * Resend every queued message once.
   *
   * Expired entries are dropped. Each retry goes out with `queueIfOffline`
   * off; a message that still fails and has not expired goes back in the
   * queue once. Concurrent calls share one pass.
   */
  retryPending(): Promise<RetrySummary> {
    if (!this.retryInFlight) {
      this.retryInFlight = this.runRetryPass().finally(() => {
        this.retryInFlight = null;
      });
    }
    return this.retryInFlight;
  }

  /** Drop expired entries, then retry the rest. Runs on every queue tick. */
  async processQueue(): Promise<void> {
    if (this.queue.isEmpty) return;

    for (const expired of this.queue.removeExpired()) {
      this.logger.info(`Removing expired message ${expired.id} [${RuntimeErrorCodes.MESSAGE_EXPIRED}]`);
    }
    if (this.queue.isEmpty) return;

    try {
      await this.retryPending();
    } catch (err) {
      this.logger.error(`Queue processing failed: ${toErrorMessage(err)}`);
    }
  }

  // --------------------------------------------------------------------------
  // Status
  // --------------------------------------------------------------------------

  /** Metrics of every registered transport, keyed by transport ID. */
  getAllMetrics(): Record<string, TransportMetrics> {
    const metrics: Record<string, TransportMetrics> = {};
    for (const [id, transport] of this.registry) {
      metrics[id] = transport.metrics;
    }
    return metrics;
  }

  getStatus(): ConnectionManagerStatus {
    return {
      initialized: this._initialized,
      routingStrategy: this.strategy.name,
      queueSize: this.queue.size,
      queueCapacity: this.queue.capacity,
      transports: this.transports.map((t) => ({
        id: t.id,
        name: t.name,
        priority: t.priority,
        available: t.isAvailable,
        initialized: t.isInitialized,
        metrics: t.metrics,
      })),
    };
  }

  /** Write {@link getStatus} to the logger at info level. */
  logStatus(): void {
    const status = this.getStatus();
    this.logger.info('ConnectionManager status:');
    this.logger.info(`  Initialized: ${status.initialized}`);
    this.logger.info(`  Routing strategy: ${status.routingStrategy}`);
    this.logger.info(`  Transports: ${status.transports.length}`);
    for (const t of status.transports) {
      this.logger.info(
        `    - ${t.id}: available=${t.available}, initialized=${t.initialized}, priority=${t.priority}`,
      );
    }
    this.logger.info(`  Queue size: ${status.queueSize}/${status.queueCapacity}`);
  }

  // --------------------------------------------------------------------------
  // Internal: sending
  // --------------------------------------------------------------------------

  private async selectCandidates(message: TransportMessage, options: SendOptions): Promise<Transport[]> {
    const strategy = options.strategy ?? this.strategy;
    let candidates: Transport[];
    try {
      candidates = await strategy.selectTransports({
        deviceId: message.targetDeviceId,
        kind: message.kind,
        availableTransports: this.availableTransports,
      });
    } catch (err) {
      this.logger.error(`Routing strategy ${strategy.name} failed: ${toErrorMessage(err)}`);
      return [];
    }

    if (options.exclude === undefined) return candidates;
    const excluded = new Set(options.exclude);
    return candidates.filter((t) => !excluded.has(t.id));
  }

  /** One bounded send attempt. Converts timeouts and exceptions into failed results. */
  private async attempt(transport: Transport, message: TransportMessage): Promise<TransportResult> {
    const timeoutMs = this.settings.sendTimeoutMs;
    this.logger.debug(`Trying ${transport.id} for ${message.id}...`);
    try {
      return await withTimeout(
        transport.send(message, { timeoutMs }),
        timeoutMs,
        () =>
          failedResult(`${transport.id} timed out after ${timeoutMs}ms`, {
            transportUsed: transport.id,
            errorCode: RuntimeErrorCodes.TRANSPORT_TIMEOUT,
          }),
        (err) => {
          this.logger.debug(`${transport.id} failed after timing out: ${toErrorMessage(err)}`);
        },
      );
    } catch (err) {
      this.logger.error(`Transport ${transport.id} threw for ${message.id}: ${toErrorMessage(err)}`);
      return failedResult(toErrorMessage(err), {
        transportUsed: transport.id,
        errorCode: RuntimeErrorCodes.TRANSPORT_FAILURE,
      });
    }
  }

  // --------------------------------------------------------------------------
  // Internal: queue
  // --------------------------------------------------------------------------

  private enqueue(message: TransportMessage): TransportResult {
    for (const dropped of this.queue.enqueue(message)) {
      this.logger.warn(`Queue full, dropping ${dropped.id} [${RuntimeErrorCodes.QUEUE_FULL}]`);
    }
    this.logger.info(`Queued message ${message.id} (queue size: ${this.queue.size})`);
    return queuedResult();
  }

  private async runRetryPass(): Promise<RetrySummary> {
    const summary: RetrySummary = { attempted: 0, delivered: 0, requeued: 0, expired: 0 };
    if (this.queue.isEmpty) return summary;
    const generation = this.generation;

    const pending = this.queue.drain();
    this.logger.info(`Retrying ${pending.length} queued messages`);

    for (const message of pending) {
      if (isExpired(message)) {
        this.logger.info(`Dropping expired message ${message.id} [${RuntimeErrorCodes.MESSAGE_EXPIRED}]`);
        summary.expired++;
        continue;
      }

      summary.attempted++;
      const result = await this.send(copyMessage(message, { queueIfOffline: false }));
      if (generation !== this.generation) {
        this.logger.debug(`Retry pass stopped by dispose after ${message.id}`);
        return summary;
      }
      if (result.success) {
        summary.delivered++;
      } else if (!isExpired(message)) {
        this.enqueue(message);
        summary.requeued++;
      } else {
        summary.expired++;
      }
    }
    return summary;
  }

  private startQueueProcessor(): void {
    if (this.queueTimer !== null) clearInterval(this.queueTimer);
    this.queueTimer = setInterval(() => {
      void this.processQueue();
    }, this.settings.queue.processIntervalMs);
  }

  // --------------------------------------------------------------------------
  // Internal: inbound
  // --------------------------------------------------------------------------

  private async initializeTransport(transport: Transport): Promise<void> {
    try {
      await transport.initialize();
      this.logger.info(`Initialized transport ${transport.id}`);
    } catch (err) {
      this.logger.error(`Failed to initialize transport ${transport.id}: ${toErrorMessage(err)}`);
    }
  }

  /** Re-subscribe to the inbound streams of the currently usable transports. */
  private rebuildIncoming(): void {
    this.merged?.unsubscribe();
    this.merged = mergeStreams(
      this.availableTransports.map((t) => t.incoming),
      (message) => this.handleIncoming(message),
    );
  }

  private handleIncoming(message: TransportMessage): void {
    this.logger.debug(
      `Received ${message.kind} ${message.id} from ${message.targetDeviceId} via ${message.sourceTransportId ?? '?'}`,
    );
    void this.dispatch(message);
    this.external.publish(message);
  }

  /** Local handling for inbound kinds the application server owns. Never rejects. */
  private async dispatch(message: TransportMessage): Promise<void> {
    try {
      switch (message.kind) {
        case 'request':
          await this.handleApiRequest(message);
          break;
        case 'direct-message':
          await this.handleDirectMessage(message);
          break;
        default:
          // Left to subscribers of `incoming`.
          break;
      }
    } catch (err) {
      this.logger.error(`Dispatch of ${message.kind} ${message.id} failed: ${toErrorMessage(err)}`);
    }
  }

  private async handleApiRequest(message: TransportMessage): Promise<void> {
    if (!this.forwarder) {
      this.logger.debug(`No local API configured, not forwarding request ${message.id}`);
      return;
    }
    if (!this.forwarder.accepts(message.path)) {
      this.logger.info(`Ignoring non-API request: ${message.path ?? '(no path)'}`);
      return;
    }

    const { statusCode, body } = await this.forwarder.forwardRequest(message);
    await this.sendResponse(apiResponseMessage(message.id, message.targetDeviceId, statusCode, body));
  }

  private async handleDirectMessage(message: TransportMessage): Promise<void> {
    if (!this.forwarder) {
      this.logger.debug(`No local API configured, not forwarding direct message ${message.id}`);
      return;
    }
    await this.forwarder.forwardDirectMessage(message);
  }

  /** Best effort: handed to the first transport that can reach the origin, not awaited. Never queued. */
  private async sendResponse(response: TransportMessage): Promise<void> {
    const deviceId = response.targetDeviceId;
    for (const transport of this.availableTransports) {
      if (!(await probeReachability(transport, deviceId, this.settings.reachabilityTimeoutMs))) {
        continue;
      }
      transport.sendAsync(response).then(
        () => this.logger.debug(`Sent API response to ${deviceId} via ${transport.id}`),
        (err: unknown) => this.logger.warn(`Sending response via ${transport.id} failed: ${toErrorMessage(err)}`),
      );
      return;
    }
    this.logger.info(`No transport available to send API response to ${deviceId}`);
  }
}
