/**
 * Timeout-bounded, read-only probes shared by strategies and the manager.
 *
 * @module
 */

import { withTimeout } from '../utils/async.js';
import type { Transport } from '../transport/types.js';

/** Default bound for a reachability probe. */
export const DEFAULT_REACHABILITY_TIMEOUT_MS = 2_000;
/** Default bound for a quality probe. */
export const DEFAULT_QUALITY_TIMEOUT_MS = 1_000;
/** Quality assumed when the probe times out or throws. */
export const DEFAULT_QUALITY_SCORE = 50;

/** `canReach` bounded by `timeoutMs`; timeout and exceptions yield `false`. */
export async function probeReachability(
  transport: Transport,
  deviceId: string,
  timeoutMs: number = DEFAULT_REACHABILITY_TIMEOUT_MS,
): Promise<boolean> {
  try {
    return await withTimeout(transport.canReach(deviceId), timeoutMs, () => false);
  } catch {
    return false;
  }
}

/**
 * `getQuality` bounded by `timeoutMs`, clamped to 0..100; timeout and
 * exceptions yield {@link DEFAULT_QUALITY_SCORE}.
 */
export async function probeQuality(
  transport: Transport,
  deviceId: string,
  timeoutMs: number = DEFAULT_QUALITY_TIMEOUT_MS,
): Promise<number> {
  try {
    const score = await withTimeout(
      transport.getQuality(deviceId),
      timeoutMs,
      () => DEFAULT_QUALITY_SCORE,
    );
    if (!Number.isFinite(score)) return DEFAULT_QUALITY_SCORE;
    return Math.min(100, Math.max(0, score));
  } catch {
    return DEFAULT_QUALITY_SCORE;
  }
}
