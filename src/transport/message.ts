/**
 * Channel-agnostic message envelope exchanged between the ConnectionManager
 * and every transport.
 *
 * Zero dependencies on routing or connection modules; this is the contract
 * between transport implementations and the router.
 *
 * @module
 */

import { randomUUID } from 'node:crypto';

// ============================================================================
// Message Kind
// ============================================================================

/** Message kind discriminator. */
export type TransportMessageKind =
  | 'request'
  | 'response'
  | 'direct-message'
  | 'room-message'
  | 'sync'
  | 'hello'
  | 'heartbeat';

export const TRANSPORT_MESSAGE_KINDS: readonly TransportMessageKind[] = [
  'request',
  'response',
  'direct-message',
  'room-message',
  'sync',
  'hello',
  'heartbeat',
];

/** Pre-signed event blob produced by a signing collaborator. Opaque here. */
export type SignedEvent = Readonly<Record<string, unknown>>;

// ============================================================================
// TransportMessage
// ============================================================================

export interface TransportMessage {
  /** Time-ordered unique ID (see {@link createMessageId}). */
  readonly id: string;
  /**
   * Remote device the message is addressed to. On inbound messages this is
   * the device the message came from.
   */
  readonly targetDeviceId: string;
  readonly kind: TransportMessageKind;
  /** HTTP-style method (request kind). */
  readonly method?: string;
  /** HTTP-style path (request kind). */
  readonly path?: string;
  readonly headers?: Readonly<Record<string, string>>;
  /** Binary, text, or structured payload. Shape depends on kind and is not validated. */
  readonly payload?: unknown;
  readonly signedEvent?: SignedEvent;
  /** Room identifier (room-message kind). */
  readonly roomId?: string;
  /** Queue for later delivery when no transport succeeds. */
  readonly queueIfOffline: boolean;
  /** Time-to-live in ms, measured from `createdAt`. */
  readonly ttlMs?: number;
  /** Unix timestamp in milliseconds. */
  readonly createdAt: number;
  readonly priority: number;
  /** Transport the message arrived on. Set on inbound messages only. */
  readonly sourceTransportId?: string;
}

/** Fields accepted by {@link createTransportMessage}. */
export type TransportMessageInit =
  Pick<TransportMessage, 'targetDeviceId' | 'kind'> &
  Partial<Omit<TransportMessage, 'targetDeviceId' | 'kind'>>;

// ============================================================================
// IDs
// ============================================================================

let idSequence = 0;

/**
 * Generate a message ID of the form `<ms36>-<seq36>-<rand>`.
 *
 * The millisecond timestamp and per-process sequence are zero-padded so IDs
 * created in one process sort lexicographically in creation order.
 */
export function createMessageId(now: number = Date.now()): string {
  idSequence = (idSequence + 1) % 36 ** 4;
  const time = now.toString(36).padStart(9, '0');
  const seq = idSequence.toString(36).padStart(4, '0');
  return `${time}-${seq}-${randomUUID().slice(0, 8)}`;
}

// ============================================================================
// Construction
// ============================================================================

export function createTransportMessage(init: TransportMessageInit): TransportMessage {
  return {
    ...init,
    id: init.id ?? createMessageId(),
    queueIfOffline: init.queueIfOffline ?? false,
    createdAt: init.createdAt ?? Date.now(),
    priority: init.priority ?? 0,
  };
}

/**
 * Copy a message with overrides. The ID is preserved unless `overrides.id`
 * is given.
 */
export function copyMessage(
  message: TransportMessage,
  overrides: Partial<TransportMessage>,
): TransportMessage {
  return { ...message, ...overrides };
}

/** True when the message has a TTL and `createdAt + ttlMs` lies in the past. */
export function isExpired(message: TransportMessage, now: number = Date.now()): boolean {
  if (message.ttlMs === undefined) return false;
  return message.createdAt + message.ttlMs < now;
}

export function isBinaryPayload(payload: unknown): payload is Uint8Array {
  return payload instanceof Uint8Array;
}

// ============================================================================
// Builders
// ============================================================================

export interface ApiRequestInit {
  readonly deviceId: string;
  readonly method: string;
  readonly path: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: unknown;
  readonly queueIfOffline?: boolean;
  readonly ttlMs?: number;
}

export function apiRequestMessage(init: ApiRequestInit): TransportMessage {
  return createTransportMessage({
    targetDeviceId: init.deviceId,
    kind: 'request',
    method: init.method.toUpperCase(),
    path: init.path,
    headers: init.headers,
    payload: init.body,
    queueIfOffline: init.queueIfOffline,
    ttlMs: init.ttlMs,
  });
}

export interface DirectMessageInit {
  readonly deviceId: string;
  readonly signedEvent: SignedEvent;
  readonly queueIfOffline?: boolean;
  readonly ttlMs?: number;
}

export function directMessage(init: DirectMessageInit): TransportMessage {
  return createTransportMessage({
    targetDeviceId: init.deviceId,
    kind: 'direct-message',
    signedEvent: init.signedEvent,
    queueIfOffline: init.queueIfOffline,
    ttlMs: init.ttlMs,
  });
}

export interface RoomMessageInit {
  readonly deviceId: string;
  readonly roomId: string;
  readonly signedEvent: SignedEvent;
  readonly queueIfOffline?: boolean;
  readonly ttlMs?: number;
}

export function roomMessage(init: RoomMessageInit): TransportMessage {
  return createTransportMessage({
    targetDeviceId: init.deviceId,
    kind: 'room-message',
    roomId: init.roomId,
    signedEvent: init.signedEvent,
    queueIfOffline: init.queueIfOffline,
    ttlMs: init.ttlMs,
  });
}

/** JSON body carried by a response-kind message. */
export interface ApiResponsePayload {
  readonly type: 'api_response';
  readonly id: string;
  readonly statusCode: number;
  readonly body: string;
}

/**
 * Build the response sent back to the device that issued `requestId`.
 * The response ID is `response-<requestId>`.
 */
export function apiResponseMessage(
  requestId: string,
  deviceId: string,
  statusCode: number,
  body: string,
): TransportMessage {
  const payload: ApiResponsePayload = { type: 'api_response', id: requestId, statusCode, body };
  return createTransportMessage({
    id: `response-${requestId}`,
    targetDeviceId: deviceId,
    kind: 'response',
    payload: JSON.stringify(payload),
  });
}
