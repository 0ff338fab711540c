/**
 * Multi-subscriber broadcast streams and fan-in.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type StreamListener<T> = (value: T) => void;

export interface StreamSubscription {
  unsubscribe(): void;
}

/** Read side of a broadcast stream. Every subscriber receives every value. */
export interface MessageStream<T> {
  subscribe(listener: StreamListener<T>): StreamSubscription;
}

const NOOP_SUBSCRIPTION: StreamSubscription = { unsubscribe: () => {} };

// ============================================================================
// Broadcaster
// ============================================================================

/**
 * Unbuffered broadcast channel. Values published with no listener attached
 * are dropped. A throwing listener is logged and does not stop delivery to
 * the others.
 */
export class Broadcaster<T> implements MessageStream<T> {
  private readonly listeners = new Set<StreamListener<T>>();
  private _closed = false;
  private readonly logger: Logger;
  private readonly label: string;

  constructor(label = 'stream', logger: Logger = silentLogger) {
    this.label = label;
    this.logger = logger;
  }

  get closed(): boolean {
    return this._closed;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  subscribe(listener: StreamListener<T>): StreamSubscription {
    if (this._closed) return NOOP_SUBSCRIPTION;
    this.listeners.add(listener);
    return {
      unsubscribe: () => {
        this.listeners.delete(listener);
      },
    };
  }

  publish(value: T): void {
    if (this._closed) return;
    for (const listener of [...this.listeners]) {
      try {
        listener(value);
      } catch (err) {
        this.logger.error(`Listener on ${this.label} threw:`, err);
      }
    }
  }

  /** Detach every listener. Idempotent. */
  close(): void {
    this._closed = true;
    this.listeners.clear();
  }
}

// ============================================================================
// Fan-in
// ============================================================================

/**
 * Subscribe `listener` to every stream in `streams`. The returned
 * subscription tears down all upstream subscriptions at once.
 */
export function mergeStreams<T>(
  streams: Iterable<MessageStream<T>>,
  listener: StreamListener<T>,
): StreamSubscription {
  const upstream: StreamSubscription[] = [];
  for (const stream of streams) {
    upstream.push(stream.subscribe(listener));
  }
  let active = true;
  return {
    unsubscribe: () => {
      if (!active) return;
      active = false;
      for (const sub of upstream) sub.unsubscribe();
    },
  };
}
