/**
 * Outcome of a send attempt.
 *
 * Exactly one of delivered / queued / failed holds. `success` and
 * `wasQueued` are derived flags kept for callers that only branch on them.
 *
 * @module
 */

import type { RuntimeErrorCode } from '../types/errors.js';

/** Pseudo transport ID reported on queued results. */
export const QUEUE_TRANSPORT_ID = 'queue';

export interface DeliveredResult {
  readonly outcome: 'delivered';
  readonly success: true;
  readonly wasQueued: false;
  /** Transport that delivered the message. */
  readonly transportUsed: string;
  readonly statusCode?: number;
  readonly responseData?: unknown;
  readonly latencyMs?: number;
}

export interface QueuedResult {
  readonly outcome: 'queued';
  readonly success: true;
  readonly wasQueued: true;
  readonly transportUsed: typeof QUEUE_TRANSPORT_ID;
}

export interface FailedResult {
  readonly outcome: 'failed';
  readonly success: false;
  readonly wasQueued: false;
  readonly error: string;
  /** Last transport attempted, if any. */
  readonly transportUsed?: string;
  readonly statusCode?: number;
  readonly errorCode?: RuntimeErrorCode;
}

export type TransportResult = DeliveredResult | QueuedResult | FailedResult;

export function deliveredResult(
  transportUsed: string,
  details: Partial<Pick<DeliveredResult, 'statusCode' | 'responseData' | 'latencyMs'>> = {},
): DeliveredResult {
  return { outcome: 'delivered', success: true, wasQueued: false, transportUsed, ...details };
}

export function queuedResult(): QueuedResult {
  return { outcome: 'queued', success: true, wasQueued: true, transportUsed: QUEUE_TRANSPORT_ID };
}

export function failedResult(
  error: string,
  details: Partial<Pick<FailedResult, 'transportUsed' | 'statusCode' | 'errorCode'>> = {},
): FailedResult {
  return { outcome: 'failed', success: false, wasQueued: false, error, ...details };
}
