/**
 * Loopback boundary to the local application server.
 *
 * Inbound API requests and direct messages that arrive over any transport
 * are replayed against `http://{host}:{port}` so peer traffic reaches the
 * same HTTP API as relayed traffic. Uses fetch() (Node.js 18+ built-in).
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';
import { RuntimeErrorCodes } from '../types/errors.js';
import { isBinaryPayload } from '../transport/message.js';
import type { TransportMessage } from '../transport/message.js';
import { DEFAULT_API_PREFIX, DEFAULT_LOCAL_API_TIMEOUT_MS } from './config.js';

// ============================================================================
// Types
// ============================================================================

export interface LocalApiForwarderOptions {
  readonly port: number;
  readonly host?: string;
  readonly apiPrefix?: string;
  readonly timeoutMs?: number;
  readonly fetchFn?: typeof fetch;
  readonly logger?: Logger;
}

/** Status and body of a forwarded request, ready to send back to the origin. */
export interface LocalApiResponse {
  readonly statusCode: number;
  readonly body: string;
}

type LoopbackMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

const LOOPBACK_METHODS: readonly LoopbackMethod[] = ['GET', 'POST', 'PUT', 'DELETE'];

/** Methods that carry a request body. */
const BODY_METHODS: ReadonlySet<LoopbackMethod> = new Set<LoopbackMethod>(['POST', 'PUT']);

const DM_ACCEPTED_STATUSES: ReadonlySet<number> = new Set([200, 201]);

// ============================================================================
// Helpers
// ============================================================================

/** Map a method 1:1 onto the loopback set, defaulting to GET. */
export function toLoopbackMethod(method: string | undefined): LoopbackMethod {
  const upper = (method ?? 'GET').toUpperCase();
  return LOOPBACK_METHODS.find((m) => m === upper) ?? 'GET';
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

/** Encode a payload for the loopback body: bytes and strings pass through, anything else becomes JSON. */
export function encodeLoopbackBody(payload: unknown): Uint8Array | string | undefined {
  if (payload === undefined || payload === null) return undefined;
  if (isBinaryPayload(payload) || typeof payload === 'string') return payload;
  return JSON.stringify(payload);
}

// ============================================================================
// LocalApiForwarder
// ============================================================================

export class LocalApiForwarder {
  readonly baseUrl: string;
  readonly apiPrefix: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: LocalApiForwarderOptions) {
    this.baseUrl = `http://${options.host ?? 'localhost'}:${options.port}`;
    this.apiPrefix = options.apiPrefix ?? DEFAULT_API_PREFIX;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LOCAL_API_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /** Whether `path` is inside the forwarded API namespace. */
  accepts(path: string | undefined): path is string {
    return path !== undefined && path.startsWith(this.apiPrefix);
  }

  /**
   * Replay a request-kind message against the local server.
   *
   * Never throws: a failed or timed-out call becomes a 500 whose body is
   * `{"error": "<message>"}`.
   */
  async forwardRequest(message: TransportMessage): Promise<LocalApiResponse> {
    const method = toLoopbackMethod(message.method);
    const path = message.path ?? '/';
    const headers: Record<string, string> = { ...message.headers };
    if (!hasHeader(headers, 'Content-Type')) {
      headers['Content-Type'] = isBinaryPayload(message.payload)
        ? 'application/octet-stream'
        : 'application/json';
    }

    try {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: BODY_METHODS.has(method) ? encodeLoopbackBody(message.payload) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const body = await response.text();
      this.logger.info(`Forwarded request ${method} ${path} -> ${response.status}`);
      return { statusCode: response.status, body };
    } catch (err) {
      const error = toErrorMessage(err);
      this.logger.error(`Forwarding request ${method} ${path} failed [${RuntimeErrorCodes.LOCAL_FORWARD_ERROR}]: ${error}`);
      return { statusCode: 500, body: JSON.stringify({ error }) };
    }
  }

  /**
   * POST a direct message's signed event to the sender's conversation,
   * `/api/chat/{senderId}/messages`. Resolves `true` on HTTP 200 or 201.
   */
  async forwardDirectMessage(message: TransportMessage): Promise<boolean> {
    const senderId = message.targetDeviceId;
    if (!message.signedEvent) {
      this.logger.warn(`Direct message ${message.id} from ${senderId} has no signed event, dropping`);
      return false;
    }

    const path = `/api/chat/${encodeURIComponent(senderId)}/messages`;
    try {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ event: message.signedEvent }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (DM_ACCEPTED_STATUSES.has(response.status)) {
        this.logger.info(`Direct message from ${senderId} delivered to local chat API`);
        return true;
      }
      const body = await response.text();
      this.logger.warn(`Direct message delivery failed: ${response.status} - ${body}`);
      return false;
    } catch (err) {
      this.logger.error(
        `Forwarding direct message from ${senderId} failed [${RuntimeErrorCodes.LOCAL_FORWARD_ERROR}]: ${toErrorMessage(err)}`,
      );
      return false;
    }
  }
}
