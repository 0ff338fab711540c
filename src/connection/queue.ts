/**
 * Bounded store-and-forward queue.
 *
 * @module
 */

import { isExpired } from '../transport/message.js';
import type { TransportMessage } from '../transport/message.js';

/** Default queue capacity. */
export const DEFAULT_QUEUE_CAPACITY = 1000;

/**
 * FIFO of pending messages, oldest first. Enqueuing at capacity evicts the
 * oldest entry, never the newest.
 */
export class MessageQueue {
  readonly capacity: number;
  private items: TransportMessage[] = [];

  constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Append `message`; returns whatever was evicted to make room. */
  enqueue(message: TransportMessage): TransportMessage[] {
    const evicted: TransportMessage[] = [];
    while (this.items.length >= this.capacity) {
      const dropped = this.items.shift();
      if (dropped === undefined) break;
      evicted.push(dropped);
    }
    this.items.push(message);
    return evicted;
  }

  /** Remove and return expired entries, preserving the order of the rest. */
  removeExpired(now: number = Date.now()): TransportMessage[] {
    const expired: TransportMessage[] = [];
    const kept: TransportMessage[] = [];
    for (const message of this.items) {
      (isExpired(message, now) ? expired : kept).push(message);
    }
    this.items = kept;
    return expired;
  }

  /** Remove and return every entry, oldest first. */
  drain(): TransportMessage[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  toArray(): TransportMessage[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }
}
