/**
 * Transfer sessions: short-lived declarations that a burst of traffic to
 * one device is coming, optionally backed by an upgraded persistent
 * connection.
 *
 * The registry is a single injected instance shared by every transport that
 * wants to know whether a session (and its connection) exists for a device.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { MAX_TIMER_DELAY_MS, toErrorMessage } from '../utils/async.js';
import { normalizeDeviceId } from '../transport/device-registry.js';
import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

// ============================================================================
// Error class
// ============================================================================

/** Thrown for invalid session arguments or registry configuration. */
export class TransferSessionError extends RuntimeError {
  constructor(message: string) {
    super(message, RuntimeErrorCodes.TRANSFER_SESSION_ERROR);
    this.name = 'TransferSessionError';
  }
}

// ============================================================================
// Types
// ============================================================================

/** Handle to an upgraded connection opened by an {@link UpgradeConnector}. */
export interface UpgradedConnection {
  /** Address or handle transports use to reuse the connection. */
  readonly address: string;
}

/**
 * Opens and releases upgraded connections. Provided by whichever transport
 * can offer one (e.g. a paired high-throughput radio link).
 */
export interface UpgradeConnector {
  supportsUpgrade(deviceId: string): boolean | Promise<boolean>;
  /** Resolves to `null` when the connection could not be opened. */
  openUpgrade(deviceId: string): Promise<UpgradedConnection | null>;
  releaseUpgrade(connection: UpgradedConnection): Promise<void>;
}

export interface TransferSessionRegistryConfig {
  /** Bursts at or above this size attempt an upgrade. Default: 10 KiB */
  readonly upgradeThresholdBytes?: number;
  /** Session lifetime when start() is not given one. Default: 5 minutes */
  readonly defaultMaxDurationMs?: number;
  readonly connector?: UpgradeConnector;
  readonly logger?: Logger;
}

export interface StartSessionOptions {
  readonly expectedTotalBytes: number;
  readonly maxDurationMs?: number;
}

const DEFAULT_UPGRADE_THRESHOLD_BYTES = 10 * 1024;
const DEFAULT_MAX_DURATION_MS = 5 * 60_000;

// ============================================================================
// TransferSession
// ============================================================================

export class TransferSession {
  readonly deviceId: string;
  readonly expectedTotalBytes: number;
  readonly maxDurationMs: number;
  readonly startedAt: number;

  private _connection: UpgradedConnection | null = null;
  private _ended = false;
  private expiryTimer: ReturnType<typeof setTimeout> | null = null;
  private endPromise: Promise<void> | null = null;
  /** Settles once the upgrade attempt (if any) has finished. */
  ready: Promise<void> = Promise.resolve();

  private readonly onEnd: (session: TransferSession) => Promise<void>;

  /** @internal Created by {@link TransferSessionRegistry.start}. */
  constructor(
    deviceId: string,
    expectedTotalBytes: number,
    maxDurationMs: number,
    onEnd: (session: TransferSession) => Promise<void>,
  ) {
    this.deviceId = deviceId;
    this.expectedTotalBytes = expectedTotalBytes;
    this.maxDurationMs = maxDurationMs;
    this.startedAt = Date.now();
    this.onEnd = onEnd;
  }

  get upgraded(): boolean {
    return this._connection !== null;
  }

  get connection(): UpgradedConnection | null {
    return this._connection;
  }

  get ended(): boolean {
    return this._ended;
  }

  /** Milliseconds left before auto-expiry. */
  remainingMs(now: number = Date.now()): number {
    return Math.max(0, this.startedAt + this.maxDurationMs - now);
  }

  /** End the session and release its connection. Idempotent. */
  end(): Promise<void> {
    if (!this.endPromise) {
      this._ended = true;
      if (this.expiryTimer !== null) {
        clearTimeout(this.expiryTimer);
        this.expiryTimer = null;
      }
      this.endPromise = this.onEnd(this);
    }
    return this.endPromise;
  }

  /** @internal */
  scheduleExpiry(onExpired: () => void): void {
    this.expiryTimer = setTimeout(onExpired, this.maxDurationMs);
  }

  /** @internal */
  attachConnection(connection: UpgradedConnection): void {
    this._connection = connection;
  }

  /** @internal */
  detachConnection(): UpgradedConnection | null {
    const connection = this._connection;
    this._connection = null;
    return connection;
  }
}

// ============================================================================
// TransferSessionRegistry
// ============================================================================

/**
 * At most one active session per device ID.
 *
 * @example
 * ```typescript
 * const sessions = new TransferSessionRegistry({ connector: radioLink });
 * const session = await sessions.start('X1ABCD', { expectedTotalBytes: 200_000 });
 * // ... many small requests; transports consult sessions.getConnection('X1ABCD')
 * await session.end();
 * ```
 */
export class TransferSessionRegistry {
  private readonly sessions = new Map<string, TransferSession>();
  private readonly upgradeThresholdBytes: number;
  private readonly defaultMaxDurationMs: number;
  private readonly connector?: UpgradeConnector;
  private readonly logger: Logger;

  constructor(config: TransferSessionRegistryConfig = {}) {
    this.upgradeThresholdBytes = config.upgradeThresholdBytes ?? DEFAULT_UPGRADE_THRESHOLD_BYTES;
    this.defaultMaxDurationMs = config.defaultMaxDurationMs ?? DEFAULT_MAX_DURATION_MS;
    this.connector = config.connector;
    this.logger = config.logger ?? silentLogger;

    if (!(this.upgradeThresholdBytes >= 0)) {
      throw new TransferSessionError('upgradeThresholdBytes must be a non-negative number');
    }
    if (!(this.defaultMaxDurationMs > 0 && this.defaultMaxDurationMs <= MAX_TIMER_DELAY_MS)) {
      throw new TransferSessionError(`defaultMaxDurationMs must be between 1 and ${MAX_TIMER_DELAY_MS}`);
    }
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Start a session, or return the one already active for `deviceId`.
   *
   * The session is registered before any upgrade attempt is awaited, so
   * concurrent callers for the same device receive the same object.
   */
  async start(deviceId: string, options: StartSessionOptions): Promise<TransferSession> {
    const key = normalizeDeviceId(deviceId);
    const existing = this.sessions.get(key);
    if (existing) {
      await existing.ready;
      return existing;
    }

    const { expectedTotalBytes } = options;
    const maxDurationMs = options.maxDurationMs ?? this.defaultMaxDurationMs;
    if (!Number.isFinite(expectedTotalBytes) || expectedTotalBytes < 0) {
      throw new TransferSessionError('expectedTotalBytes must be a non-negative number');
    }
    if (!Number.isFinite(maxDurationMs) || maxDurationMs <= 0 || maxDurationMs > MAX_TIMER_DELAY_MS) {
      throw new TransferSessionError(`maxDurationMs must be between 1 and ${MAX_TIMER_DELAY_MS}`);
    }

    const session = new TransferSession(key, expectedTotalBytes, maxDurationMs, (s) => this.release(s));
    this.sessions.set(key, session);
    session.scheduleExpiry(() => {
      this.logger.debug(`Transfer session for ${key} expired after ${maxDurationMs}ms`);
      void session.end();
    });
    this.logger.info(`Transfer session started for ${key} (${expectedTotalBytes} bytes expected)`);

    if (expectedTotalBytes >= this.upgradeThresholdBytes && this.connector) {
      session.ready = this.tryUpgrade(session, this.connector);
    }
    await session.ready;
    return session;
  }

  /** End the session for `deviceId`, if any. */
  async end(deviceId: string): Promise<void> {
    await this.sessions.get(normalizeDeviceId(deviceId))?.end();
  }

  /** End every active session. */
  async endAll(): Promise<void> {
    await Promise.all([...this.sessions.values()].map((s) => s.end()));
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  get(deviceId: string): TransferSession | undefined {
    return this.sessions.get(normalizeDeviceId(deviceId));
  }

  hasActiveSession(deviceId: string): boolean {
    return this.sessions.has(normalizeDeviceId(deviceId));
  }

  getExpectedBytes(deviceId: string): number | undefined {
    return this.get(deviceId)?.expectedTotalBytes;
  }

  isUpgraded(deviceId: string): boolean {
    return this.get(deviceId)?.upgraded ?? false;
  }

  getConnection(deviceId: string): UpgradedConnection | null {
    return this.get(deviceId)?.connection ?? null;
  }

  get activeSessions(): TransferSession[] {
    return [...this.sessions.values()];
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private async tryUpgrade(session: TransferSession, connector: UpgradeConnector): Promise<void> {
    try {
      if (!(await connector.supportsUpgrade(session.deviceId))) return;
      const connection = await connector.openUpgrade(session.deviceId);
      if (!connection) {
        this.logger.debug(`Upgrade for ${session.deviceId} unavailable, continuing without`);
        return;
      }
      if (session.ended) {
        // Ended while the connection was opening.
        await connector.releaseUpgrade(connection);
        return;
      }
      session.attachConnection(connection);
      this.logger.info(`Transfer session for ${session.deviceId} upgraded (${connection.address})`);
    } catch (err) {
      this.logger.warn(`Upgrade for ${session.deviceId} failed: ${toErrorMessage(err)}`);
    }
  }

  private async release(session: TransferSession): Promise<void> {
    if (this.sessions.get(session.deviceId) === session) {
      this.sessions.delete(session.deviceId);
    }
    await session.ready;
    const connection = session.detachConnection();
    if (connection && this.connector) {
      try {
        await this.connector.releaseUpgrade(connection);
      } catch (err) {
        this.logger.warn(`Releasing upgrade for ${session.deviceId} failed: ${toErrorMessage(err)}`);
      }
    }
    this.logger.info(`Transfer session ended for ${session.deviceId}`);
  }
}
