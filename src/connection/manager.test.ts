import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConnectionManager } from './manager.js';
import { ConnectionConfigError } from './config.js';
import type { ConnectionManagerConfig } from './types.js';
import { RuntimeErrorCodes } from '../types/errors.js';
import {
  apiRequestMessage,
  createTransportMessage,
  directMessage,
  type ApiResponsePayload,
  type TransportMessage,
} from '../transport/message.js';
import { FailoverRoutingStrategy } from '../routing/failover.js';
import type { RoutingStrategy } from '../routing/types.js';
import type { Logger } from '../utils/logger.js';
import { FakeTransport } from '../../tests/helpers/fake-transport.js';

// ============================================================================
// Helpers
// ============================================================================

function makeLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    setLevel: vi.fn<Logger['setLevel']>(),
  };
}

function createMockFetch(status = 200, body = '{"ok":true}') {
  return vi.fn<typeof fetch>(async () => new Response(body, { status }));
}

function message(overrides: Partial<TransportMessage> = {}): TransportMessage {
  return createTransportMessage({ targetDeviceId: 'X1ABCD', kind: 'sync', ...overrides });
}

const managers: ConnectionManager[] = [];

async function makeManager(
  transports: FakeTransport[] = [],
  config: ConnectionManagerConfig = {},
): Promise<{ manager: ConnectionManager; logger: ReturnType<typeof makeLogger> }> {
  const logger = makeLogger();
  const manager = new ConnectionManager({ logger, ...config });
  managers.push(manager);
  for (const t of transports) await manager.registerTransport(t);
  await manager.initialize();
  return { manager, logger };
}

// ============================================================================
// Tests
// ============================================================================

describe('ConnectionManager', () => {
  afterEach(async () => {
    for (const manager of managers.splice(0)) await manager.dispose();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  // --------------------------------------------------------------------------
  // Configuration
  // --------------------------------------------------------------------------

  describe('configuration', () => {
    it('rejects invalid settings at construction', () => {
      expect(() => new ConnectionManager({ sendTimeoutMs: -1 })).toThrow(ConnectionConfigError);
    });

    it('defaults to the priority strategy', () => {
      expect(new ConnectionManager().routingStrategy.name).toBe('priority');
    });
  });

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  describe('lifecycle', () => {
    it('fails fast before initialize', async () => {
      const manager = new ConnectionManager();
      await manager.registerTransport(new FakeTransport({ id: 'lan' }));

      const result = await manager.send(message());

      expect(result).toEqual({
        outcome: 'failed',
        success: false,
        wasQueued: false,
        error: 'ConnectionManager not initialized',
        errorCode: RuntimeErrorCodes.NOT_INITIALIZED,
      });
    });

    it('initializes registered transports once', async () => {
      const lan = new FakeTransport({ id: 'lan' });
      const { manager } = await makeManager([lan]);

      await manager.initialize();

      expect(manager.isInitialized).toBe(true);
      expect(lan.isInitialized).toBe(true);
      expect(lan.initializeCalls).toBe(1);
    });

    it('keeps a transport that failed to initialize but never routes to it', async () => {
      const broken = new FakeTransport({ id: 'broken', priority: 10, failInitialize: true });
      const relay = new FakeTransport({ id: 'relay', priority: 30 });
      const { manager, logger } = await makeManager([broken, relay]);

      const result = await manager.send(message());

      expect(manager.transports.map((t) => t.id)).toEqual(['broken', 'relay']);
      expect(manager.availableTransports.map((t) => t.id)).toEqual(['relay']);
      expect(result.transportUsed).toBe('relay');
      expect(broken.sent).toHaveLength(0);
      expect(logger.error).toHaveBeenCalledWith('Failed to initialize transport broken: broken init failed');
    });

    it('dispose tears everything down and allows re-initialization', async () => {
      vi.useFakeTimers();
      const lan = new FakeTransport({ id: 'lan', send: { type: 'fail', error: 'down' } });
      const { manager } = await makeManager([lan]);
      await manager.send(message({ queueIfOffline: true }));
      expect(manager.pendingCount).toBe(1);

      await manager.dispose();

      expect(lan.disposeCalls).toBe(1);
      expect(manager.isInitialized).toBe(false);
      expect(manager.transports).toEqual([]);
      expect(manager.pendingCount).toBe(0);
      expect(vi.getTimerCount()).toBe(0);

      const relay = new FakeTransport({ id: 'relay' });
      await manager.registerTransport(relay);
      await manager.initialize();
      const seen: TransportMessage[] = [];
      manager.incoming.subscribe((m) => seen.push(m));
      relay.receive(message({ kind: 'hello' }));

      expect(seen).toHaveLength(1);
    });

    it('dispose waits for a running retry pass and leaves the queue empty', async () => {
      const a = new FakeTransport({ id: 'a', send: { type: 'fail', error: 'offline' } });
      const { manager } = await makeManager([a]);
      await manager.send(message({ id: 'm1', queueIfOffline: true }));
      await manager.send(message({ id: 'm2', queueIfOffline: true }));
      expect(manager.pendingCount).toBe(2);

      const pass = manager.retryPending();
      await manager.dispose();

      expect(manager.pendingCount).toBe(0);
      const summary = await pass;
      expect(summary.requeued).toBe(0);
      expect(manager.pendingCount).toBe(0);
      expect(manager.isInitialized).toBe(false);
    });

    it('logs transport disposal errors without throwing', async () => {
      const lan = new FakeTransport({ id: 'lan' });
      vi.spyOn(lan, 'dispose').mockRejectedValue(new Error('stuck'));
      const { manager, logger } = await makeManager([lan]);

      await expect(manager.dispose()).resolves.toBeUndefined();
      expect(logger.error).toHaveBeenCalledWith('Error disposing transport lan: stuck');
    });
  });

  // --------------------------------------------------------------------------
  // Transport registry
  // --------------------------------------------------------------------------

  describe('transport registry', () => {
    it('initializes and listens to transports registered after initialize', async () => {
      const { manager } = await makeManager();
      const seen: TransportMessage[] = [];
      manager.incoming.subscribe((m) => seen.push(m));

      const late = new FakeTransport({ id: 'late' });
      await manager.registerTransport(late);
      late.receive(message({ kind: 'hello' }));

      expect(late.isInitialized).toBe(true);
      expect(seen.map((m) => m.sourceTransportId)).toEqual(['late']);
    });

    it('unregister disposes the transport and stops listening to it', async () => {
      const lan = new FakeTransport({ id: 'lan' });
      const { manager } = await makeManager([lan]);
      const seen: TransportMessage[] = [];
      manager.incoming.subscribe((m) => seen.push(m));

      expect(await manager.unregisterTransport('lan')).toBe(true);
      lan.receive(message());

      expect(lan.disposeCalls).toBe(1);
      expect(manager.getTransport('lan')).toBeUndefined();
      expect(seen).toHaveLength(0);
      expect(await manager.unregisterTransport('lan')).toBe(false);
    });

    it('replaces a transport registered under the same ID', async () => {
      const first = new FakeTransport({ id: 'lan' });
      const second = new FakeTransport({ id: 'lan' });
      const { manager } = await makeManager([first]);

      await manager.registerTransport(second);

      expect(first.disposeCalls).toBe(1);
      expect(manager.getTransport('lan')).toBe(second);
      expect(manager.transports).toHaveLength(1);
    });

    it('swaps the routing strategy at runtime', async () => {
      const { manager, logger } = await makeManager();
      const strategy = new FailoverRoutingStrategy(['relay']);

      manager.setRoutingStrategy(strategy);

      expect(manager.routingStrategy).toBe(strategy);
      expect(logger.info).toHaveBeenCalledWith('Routing strategy set to failover');
    });
  });

  // --------------------------------------------------------------------------
  // Sending
  // --------------------------------------------------------------------------

  describe('send', () => {
    it('moves to the next transport after a failure and never retries the failed one', async () => {
      const a = new FakeTransport({ id: 'a', priority: 10, send: { type: 'fail', error: 'refused' } });
      const b = new FakeTransport({ id: 'b', priority: 20, send: { type: 'deliver', latencyMs: 12 } });
      const { manager } = await makeManager([a, b]);

      const result = await manager.send(message());

      expect(result.success).toBe(true);
      expect(result.transportUsed).toBe('b');
      expect(a.sent).toHaveLength(1);
      expect(b.sent).toHaveLength(1);
    });

    it('stops at the first success', async () => {
      const a = new FakeTransport({ id: 'a', priority: 10 });
      const b = new FakeTransport({ id: 'b', priority: 20 });
      const { manager } = await makeManager([a, b]);

      const result = await manager.send(message());

      expect(result).toEqual({
        outcome: 'delivered',
        success: true,
        wasQueued: false,
        transportUsed: 'a',
        latencyMs: undefined,
        statusCode: undefined,
      });
      expect(b.sent).toHaveLength(0);
    });

    it('treats a throwing transport as a failure and logs it', async () => {
      const a = new FakeTransport({ id: 'a', priority: 10, send: { type: 'throw', error: 'socket closed' } });
      const b = new FakeTransport({ id: 'b', priority: 20 });
      const { manager, logger } = await makeManager([a, b]);
      const msg = message();

      const result = await manager.send(msg);

      expect(result.transportUsed).toBe('b');
      expect(logger.error).toHaveBeenCalledWith(`Transport a threw for ${msg.id}: socket closed`);
    });

    it('bounds each attempt with the send timeout', async () => {
      vi.useFakeTimers();
      const a = new FakeTransport({ id: 'a', priority: 10, send: { type: 'hang' } });
      const b = new FakeTransport({ id: 'b', priority: 20 });
      const { manager, logger } = await makeManager([a, b], { sendTimeoutMs: 1_000 });
      const msg = message();

      const pending = manager.send(msg);
      await vi.advanceTimersByTimeAsync(1_000);
      const result = await pending;

      expect(result.transportUsed).toBe('b');
      expect(logger.warn).toHaveBeenCalledWith(`Transport a failed for ${msg.id}: a timed out after 1000ms`);
    });

    it('reports all-failed with the last transport tried', async () => {
      const a = new FakeTransport({ id: 'a', priority: 10, send: { type: 'fail', error: 'x' } });
      const b = new FakeTransport({ id: 'b', priority: 20, send: { type: 'fail', error: 'y' } });
      const { manager } = await makeManager([a, b]);

      const result = await manager.send(message());

      expect(result).toEqual({
        outcome: 'failed',
        success: false,
        wasQueued: false,
        error: 'All transports failed for X1ABCD',
        transportUsed: 'b',
        errorCode: RuntimeErrorCodes.ALL_TRANSPORTS_FAILED,
      });
      expect(manager.pendingCount).toBe(0);
    });

    it('queues when every transport fails and the message asks for it', async () => {
      const a = new FakeTransport({ id: 'a', send: { type: 'fail', error: 'x' } });
      const { manager } = await makeManager([a]);
      const msg = message({ queueIfOffline: true });

      const result = await manager.send(msg);

      expect(result).toEqual({ outcome: 'queued', success: true, wasQueued: true, transportUsed: 'queue' });
      expect(manager.pendingMessages).toEqual([msg]);
    });

    it('queues exactly one entry when no transport is available', async () => {
      const { manager } = await makeManager();

      const result = await manager.send(message({ queueIfOffline: true }));

      expect(result.wasQueued).toBe(true);
      expect(manager.pendingCount).toBe(1);
    });

    it('reports no route when nothing is available and queueing is off', async () => {
      const { manager } = await makeManager([new FakeTransport({ id: 'lan', available: false })]);

      const result = await manager.send(message());

      expect(result).toMatchObject({
        outcome: 'failed',
        error: 'No transport available for X1ABCD',
        errorCode: RuntimeErrorCodes.NO_ROUTE,
      });
    });

    it('leaves excluded transports out', async () => {
      const a = new FakeTransport({ id: 'a', priority: 10 });
      const b = new FakeTransport({ id: 'b', priority: 20 });
      const { manager } = await makeManager([a, b]);

      const result = await manager.send(message(), { exclude: ['a'] });

      expect(result.transportUsed).toBe('b');
      expect(a.sent).toHaveLength(0);
    });

    it('reports no route when every candidate is excluded', async () => {
      const { manager } = await makeManager([new FakeTransport({ id: 'a' })]);
      const result = await manager.send(message(), { exclude: new Set(['a']) });
      expect(result).toMatchObject({ errorCode: RuntimeErrorCodes.NO_ROUTE });
    });

    it('honours a per-call strategy override', async () => {
      const a = new FakeTransport({ id: 'a', priority: 10 });
      const b = new FakeTransport({ id: 'b', priority: 20 });
      const { manager } = await makeManager([a, b]);

      const result = await manager.send(message(), { strategy: new FailoverRoutingStrategy(['b']) });

      expect(result.transportUsed).toBe('b');
      expect(manager.routingStrategy.name).toBe('priority');
    });

    it('treats a failing strategy as an empty selection', async () => {
      const broken: RoutingStrategy = {
        name: 'broken',
        selectTransports: async () => Promise.reject(new Error('bad table')),
      };
      const { manager, logger } = await makeManager([new FakeTransport({ id: 'a' })], {
        routingStrategy: broken,
      });

      const result = await manager.send(message());

      expect(result).toMatchObject({ errorCode: RuntimeErrorCodes.NO_ROUTE });
      expect(logger.error).toHaveBeenCalledWith('Routing strategy broken failed: bad table');
    });

    it('builds request, direct and room messages for the convenience senders', async () => {
      const a = new FakeTransport({ id: 'a' });
      const { manager } = await makeManager([a]);

      await manager.apiRequest({ deviceId: 'X1ABCD', method: 'get', path: '/api/status' });
      await manager.sendDM({ deviceId: 'X1ABCD', signedEvent: { id: 'evt-1' }, queueIfOffline: true });
      await manager.sendChat({ deviceId: 'X1ABCD', roomId: 'general', signedEvent: { id: 'evt-2' } });

      expect(a.sent.map((m) => m.kind)).toEqual(['request', 'direct-message', 'room-message']);
      expect(a.sent[0]?.method).toBe('GET');
      expect(a.sent[1]?.queueIfOffline).toBe(true);
      expect(a.sent[2]?.roomId).toBe('general');
    });

    it('passes send options through apiRequest', async () => {
      const a = new FakeTransport({ id: 'a', priority: 10 });
      const b = new FakeTransport({ id: 'b', priority: 20 });
      const { manager } = await makeManager([a, b]);

      const result = await manager.apiRequest(
        { deviceId: 'X1ABCD', method: 'GET', path: '/api/status' },
        { exclude: ['a'] },
      );

      expect(result.transportUsed).toBe('b');
    });
  });

  // --------------------------------------------------------------------------
  // Store-and-forward queue
  // --------------------------------------------------------------------------

  describe('queue', () => {
    it('drops the oldest entry when full', async () => {
      const { manager, logger } = await makeManager([], { queue: { capacity: 2 } });

      await manager.send(message({ id: 'm1', queueIfOffline: true }));
      await manager.send(message({ id: 'm2', queueIfOffline: true }));
      const result = await manager.send(message({ id: 'm3', queueIfOffline: true }));

      expect(result.wasQueued).toBe(true);
      expect(manager.pendingMessages.map((m) => m.id)).toEqual(['m2', 'm3']);
      expect(logger.warn).toHaveBeenCalledWith('Queue full, dropping m1 [QUEUE_FULL]');
    });

    it('retryPending resends with queueing off and clears delivered entries', async () => {
      const a = new FakeTransport({ id: 'a', send: { type: 'fail', error: 'offline' } });
      const { manager } = await makeManager([a]);
      await manager.send(message({ id: 'm1', queueIfOffline: true }));

      a.sendBehavior = { type: 'deliver' };
      const summary = await manager.retryPending();

      expect(summary).toEqual({ attempted: 1, delivered: 1, requeued: 0, expired: 0 });
      expect(manager.pendingCount).toBe(0);
      const retried = a.sent.at(-1);
      expect(retried?.id).toBe('m1');
      expect(retried?.queueIfOffline).toBe(false);
    });

    it('re-queues a message that keeps failing exactly once per pass', async () => {
      const a = new FakeTransport({ id: 'a', send: { type: 'fail', error: 'offline' } });
      const { manager } = await makeManager([a]);
      await manager.send(message({ id: 'm1', queueIfOffline: true }));

      const first = await manager.retryPending();
      const second = await manager.retryPending();

      expect(first).toEqual({ attempted: 1, delivered: 0, requeued: 1, expired: 0 });
      expect(second).toEqual(first);
      expect(manager.pendingMessages.map((m) => m.id)).toEqual(['m1']);
      expect(manager.pendingMessages[0]?.queueIfOffline).toBe(true);
      expect(a.sent).toHaveLength(3);
    });

    it('never resends an expired message', async () => {
      const a = new FakeTransport({ id: 'a', send: { type: 'fail', error: 'offline' } });
      const { manager } = await makeManager([a]);
      await manager.send(
        message({ id: 'old', queueIfOffline: true, createdAt: Date.now() - 10_000, ttlMs: 1_000 }),
      );
      const sentBefore = a.sent.length;

      a.sendBehavior = { type: 'deliver' };
      const summary = await manager.retryPending();

      expect(summary).toEqual({ attempted: 0, delivered: 0, requeued: 0, expired: 1 });
      expect(a.sent).toHaveLength(sentBefore);
      expect(manager.pendingCount).toBe(0);
    });

    it('shares one pass between concurrent retry calls', async () => {
      const a = new FakeTransport({ id: 'a', send: { type: 'fail', error: 'offline' } });
      const { manager } = await makeManager([a]);
      await manager.send(message({ queueIfOffline: true }));

      const first = manager.retryPending();
      const second = manager.retryPending();

      expect(second).toBe(first);
      await first;
      expect(manager.pendingCount).toBe(1);
    });

    it('processQueue removes expired entries before retrying the rest', async () => {
      const a = new FakeTransport({ id: 'a', send: { type: 'fail', error: 'offline' } });
      const { manager, logger } = await makeManager([a]);
      await manager.send(message({ id: 'stale', queueIfOffline: true, createdAt: Date.now() - 5_000, ttlMs: 100 }));
      await manager.send(message({ id: 'live', queueIfOffline: true }));
      const sentBefore = a.sent.length;

      a.sendBehavior = { type: 'deliver' };
      await manager.processQueue();

      expect(a.sent.slice(sentBefore).map((m) => m.id)).toEqual(['live']);
      expect(manager.pendingCount).toBe(0);
      expect(logger.info).toHaveBeenCalledWith('Removing expired message stale [MESSAGE_EXPIRED]');
    });

    it('processes the queue on every tick', async () => {
      vi.useFakeTimers();
      const { manager } = await makeManager([], { queue: { processIntervalMs: 5_000 } });
      const tick = vi.spyOn(manager, 'processQueue');

      await vi.advanceTimersByTimeAsync(4_999);
      expect(tick).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(tick).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(5_000);
      expect(tick).toHaveBeenCalledTimes(2);
    });

    it('defaults the tick to 30 seconds', async () => {
      vi.useFakeTimers();
      const { manager } = await makeManager();
      const tick = vi.spyOn(manager, 'processQueue');

      await vi.advanceTimersByTimeAsync(30_000);

      expect(tick).toHaveBeenCalledTimes(1);
    });
  });

  // --------------------------------------------------------------------------
  // Reachability
  // --------------------------------------------------------------------------

  describe('reachability', () => {
    it('isReachable stops at the first reachable transport', async () => {
      const a = new FakeTransport({ id: 'a', reachable: false });
      const b = new FakeTransport({ id: 'b', reachable: true });
      const c = new FakeTransport({ id: 'c', reachable: true });
      const { manager } = await makeManager([a, b, c]);

      expect(await manager.isReachable('X1ABCD')).toBe(true);
      expect(c.probed).toEqual([]);
    });

    it('getAvailableTransports collects every reachable transport', async () => {
      const a = new FakeTransport({ id: 'a', reachable: false });
      const b = new FakeTransport({ id: 'b', reachable: 'throw' });
      const c = new FakeTransport({ id: 'c', reachable: true });
      const d = new FakeTransport({ id: 'd', reachable: true });
      const { manager } = await makeManager([a, b, c, d]);

      expect(await manager.getAvailableTransports('X1ABCD')).toEqual(['c', 'd']);
    });

    it('bounds each probe at two seconds', async () => {
      vi.useFakeTimers();
      const a = new FakeTransport({ id: 'a', reachable: 'hang' });
      const b = new FakeTransport({ id: 'b', reachable: true });
      const { manager } = await makeManager([a, b]);

      const pending = manager.getAvailableTransports('X1ABCD');
      await vi.advanceTimersByTimeAsync(1_999);
      expect(b.probed).toEqual([]);
      await vi.advanceTimersByTimeAsync(1);

      expect(await pending).toEqual(['b']);
    });

    it('answers negatively before initialize', async () => {
      const manager = new ConnectionManager();
      await manager.registerTransport(new FakeTransport({ id: 'a' }));

      expect(await manager.isReachable('X1ABCD')).toBe(false);
      expect(await manager.getAvailableTransports('X1ABCD')).toEqual([]);
    });
  });

  // --------------------------------------------------------------------------
  // Inbound
  // --------------------------------------------------------------------------

  describe('inbound', () => {
    it('republishes every inbound message from every transport', async () => {
      const lan = new FakeTransport({ id: 'lan' });
      const ble = new FakeTransport({ id: 'ble' });
      const { manager } = await makeManager([lan, ble]);
      const seen: TransportMessage[] = [];
      manager.incoming.subscribe((m) => seen.push(m));

      lan.receive(message({ id: 'one', kind: 'hello' }));
      ble.receive(message({ id: 'two', kind: 'heartbeat' }));

      expect(seen.map((m) => [m.id, m.sourceTransportId])).toEqual([
        ['one', 'lan'],
        ['two', 'ble'],
      ]);
    });

    it('ignores requests outside /api/ but forwards /api/ requests to the local server', async () => {
      const fetchFn = createMockFetch(200, '{"callsign":"X1SELF"}');
      const lan = new FakeTransport({ id: 'lan', reachable: true });
      const { manager, logger } = await makeManager([lan], { localApi: { port: 3456, fetchFn } });
      const seen: TransportMessage[] = [];
      manager.incoming.subscribe((m) => seen.push(m));

      lan.receive(apiRequestMessage({ deviceId: 'X1ABCD', method: 'GET', path: '/status' }));
      expect(logger.info).toHaveBeenCalledWith('Ignoring non-API request: /status');
      expect(fetchFn).not.toHaveBeenCalled();

      const request = apiRequestMessage({ deviceId: 'X1ABCD', method: 'GET', path: '/api/status' });
      lan.receive(request);

      await vi.waitFor(() => expect(lan.sentAsync).toHaveLength(1));
      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(fetchFn.mock.calls[0]?.[0]).toBe('http://localhost:3456/api/status');
      expect(seen).toHaveLength(2);

      const response = lan.sentAsync[0];
      expect(response?.id).toBe(`response-${request.id}`);
      expect(response?.kind).toBe('response');
      expect(response?.targetDeviceId).toBe('X1ABCD');
      const payload: ApiResponsePayload = {
        type: 'api_response',
        id: request.id,
        statusCode: 200,
        body: '{"callsign":"X1SELF"}',
      };
      expect(response?.payload).toBe(JSON.stringify(payload));
    });

    it('sends the response over the first transport that reaches the requester', async () => {
      const fetchFn = createMockFetch(404, 'missing');
      const lan = new FakeTransport({ id: 'lan', reachable: false });
      const relay = new FakeTransport({ id: 'relay', reachable: true });
      const { manager } = await makeManager([lan, relay], { localApi: { port: 3456, fetchFn } });

      lan.receive(apiRequestMessage({ deviceId: 'X1ABCD', method: 'GET', path: '/api/missing' }));

      await vi.waitFor(() => expect(relay.sentAsync).toHaveLength(1));
      expect(lan.sentAsync).toHaveLength(0);
      expect(manager.pendingCount).toBe(0);
    });

    it('does not wait on the response send and logs its failure', async () => {
      const fetchFn = createMockFetch();
      const relay = new FakeTransport({ id: 'relay', reachable: true });
      const sendAsync = vi.spyOn(relay, 'sendAsync').mockRejectedValue(new Error('radio off'));
      const { logger } = await makeManager([relay], { localApi: { port: 3456, fetchFn } });

      relay.receive(apiRequestMessage({ deviceId: 'X1ABCD', method: 'GET', path: '/api/status' }));

      await vi.waitFor(() => expect(logger.warn).toHaveBeenCalledWith('Sending response via relay failed: radio off'));
      expect(sendAsync).toHaveBeenCalledTimes(1);
      expect(logger.info).not.toHaveBeenCalledWith('No transport available to send API response to X1ABCD');
    });

    it('keeps dispatching while an earlier response send hangs', async () => {
      const fetchFn = createMockFetch();
      const relay = new FakeTransport({ id: 'relay', reachable: true });
      const sendAsync = vi.spyOn(relay, 'sendAsync').mockReturnValue(new Promise<void>(() => {}));
      await makeManager([relay], { localApi: { port: 3456, fetchFn } });

      relay.receive(apiRequestMessage({ deviceId: 'X1ABCD', method: 'GET', path: '/api/status' }));
      await vi.waitFor(() => expect(sendAsync).toHaveBeenCalledTimes(1));
      relay.receive(apiRequestMessage({ deviceId: 'X1ABCD', method: 'GET', path: '/api/peers' }));

      await vi.waitFor(() => expect(sendAsync).toHaveBeenCalledTimes(2));
      expect(fetchFn).toHaveBeenCalledTimes(2);
    });

    it('drops the response when no transport reaches the requester', async () => {
      const fetchFn = createMockFetch();
      const lan = new FakeTransport({ id: 'lan', reachable: false });
      const { manager, logger } = await makeManager([lan], { localApi: { port: 3456, fetchFn } });

      lan.receive(apiRequestMessage({ deviceId: 'X1ABCD', method: 'GET', path: '/api/status' }));

      await vi.waitFor(() =>
        expect(logger.info).toHaveBeenCalledWith('No transport available to send API response to X1ABCD'),
      );
      expect(lan.sentAsync).toHaveLength(0);
      expect(manager.pendingCount).toBe(0);
    });

    it('answers with a 500 when the local server cannot be reached', async () => {
      const fetchFn = vi.fn<typeof fetch>(async () => {
        throw new Error('connect ECONNREFUSED');
      });
      const lan = new FakeTransport({ id: 'lan' });
      await makeManager([lan], { localApi: { port: 3456, fetchFn } });

      const request = apiRequestMessage({ deviceId: 'X1ABCD', method: 'POST', path: '/api/items', body: {} });
      lan.receive(request);

      await vi.waitFor(() => expect(lan.sentAsync).toHaveLength(1));
      expect(lan.sentAsync[0]?.payload).toBe(
        JSON.stringify({
          type: 'api_response',
          id: request.id,
          statusCode: 500,
          body: '{"error":"connect ECONNREFUSED"}',
        }),
      );
    });

    it('forwards direct messages to the sender conversation', async () => {
      const fetchFn = createMockFetch(201, '');
      const ble = new FakeTransport({ id: 'ble' });
      await makeManager([ble], { localApi: { port: 3456, fetchFn } });

      ble.receive(directMessage({ deviceId: 'X1ABCD', signedEvent: { id: 'evt-1', sig: 'test-signature' } }));

      await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(1));
      expect(fetchFn.mock.calls[0]?.[0]).toBe('http://localhost:3456/api/chat/X1ABCD/messages');
      expect(fetchFn.mock.calls[0]?.[1]?.body).toBe('{"event":{"id":"evt-1","sig":"test-signature"}}');
    });

    it('leaves other kinds to subscribers', async () => {
      const fetchFn = createMockFetch();
      const lan = new FakeTransport({ id: 'lan' });
      const { manager } = await makeManager([lan], { localApi: { port: 3456, fetchFn } });
      const seen: TransportMessage[] = [];
      manager.incoming.subscribe((m) => seen.push(m));

      lan.receive(message({ kind: 'room-message', roomId: 'general' }));
      await manager.isReachable('X1ABCD');

      expect(seen).toHaveLength(1);
      expect(fetchFn).not.toHaveBeenCalled();
      expect(lan.sentAsync).toHaveLength(0);
    });

    it('does not forward without a local API configured', async () => {
      const lan = new FakeTransport({ id: 'lan' });
      const { manager, logger } = await makeManager([lan]);
      const seen: TransportMessage[] = [];
      manager.incoming.subscribe((m) => seen.push(m));

      const request = apiRequestMessage({ deviceId: 'X1ABCD', method: 'GET', path: '/api/status' });
      lan.receive(request);

      expect(seen).toEqual([{ ...request, sourceTransportId: 'lan' }]);
      expect(logger.debug).toHaveBeenCalledWith(`No local API configured, not forwarding request ${request.id}`);
    });
  });

  // --------------------------------------------------------------------------
  // Status
  // --------------------------------------------------------------------------

  describe('status', () => {
    it('reports transports, strategy and queue', async () => {
      const lan = new FakeTransport({ id: 'lan', name: 'Local network', priority: 10 });
      const idle = new FakeTransport({ id: 'ble', name: 'Bluetooth', priority: 20, available: false });
      const { manager } = await makeManager([lan, idle], { queue: { capacity: 50 } });
      await manager.send(message());

      const status = manager.getStatus();

      expect(status).toMatchObject({
        initialized: true,
        routingStrategy: 'priority',
        queueSize: 0,
        queueCapacity: 50,
      });
      expect(status.transports.map((t) => [t.id, t.name, t.available, t.initialized])).toEqual([
        ['lan', 'Local network', true, true],
        ['ble', 'Bluetooth', false, true],
      ]);
      expect(manager.getAllMetrics()).toEqual({ lan: lan.metrics, ble: idle.metrics });
      expect(manager.getAllMetrics()['lan']?.totalSent).toBe(1);
    });

    it('logStatus writes one line per transport', async () => {
      const { manager, logger } = await makeManager([new FakeTransport({ id: 'lan', priority: 10 })]);
      logger.info.mockClear();

      manager.logStatus();

      expect(logger.info.mock.calls.map((c) => c[0])).toEqual([
        'ConnectionManager status:',
        '  Initialized: true',
        '  Routing strategy: priority',
        '  Transports: 1',
        '    - lan: available=true, initialized=true, priority=10',
        '  Queue size: 0/1000',
      ]);
    });
  });
});
