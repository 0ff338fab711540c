/**
 * Score-based strategy weighing latency, success rate and per-device
 * link quality.
 *
 * @module
 */

import { z } from 'zod';
import { isUsable } from '../transport/types.js';
import type { Transport } from '../transport/types.js';
import { RoutingValidationError } from './errors.js';
import { DEFAULT_QUALITY_TIMEOUT_MS, probeQuality } from './probe.js';
import type { RoutingRequest, RoutingStrategy } from './types.js';

// ============================================================================
// Weights
// ============================================================================

export interface QualityWeights {
  readonly latency: number;
  readonly success: number;
  readonly quality: number;
}

export const DEFAULT_QUALITY_WEIGHTS: QualityWeights = {
  latency: 0.3,
  success: 0.4,
  quality: 0.3,
};

const QualityWeightsSchema = z
  .object({
    latency: z.number().finite().nonnegative(),
    success: z.number().finite().nonnegative(),
    quality: z.number().finite().nonnegative(),
  })
  .refine((w) => w.latency + w.success + w.quality > 0, {
    message: 'weights must not all be zero',
  });

/**
 * Validate weights and scale them to sum to 1.
 *
 * @throws {RoutingValidationError} on negative, non-finite or all-zero weights
 */
export function normalizeQualityWeights(weights: Partial<QualityWeights>): QualityWeights {
  const parsed = QualityWeightsSchema.safeParse({ ...DEFAULT_QUALITY_WEIGHTS, ...weights });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? `weights.${issue.path.join('.')}` : 'weights';
    throw new RoutingValidationError(field, issue?.message ?? 'invalid weights');
  }
  const { latency, success, quality } = parsed.data;
  const total = latency + success + quality;
  return { latency: latency / total, success: success / total, quality: quality / total };
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * `w.latency × (100 − min(avgLatency/10, 100)) + w.success × successRate×100
 * + w.quality × deviceQuality`.
 */
export function computeQualityScore(
  transport: Transport,
  deviceQuality: number,
  weights: QualityWeights,
): number {
  const { averageLatencyMs, successRate } = transport.metrics;
  const latencyScore = 100 - Math.min(averageLatencyMs / 10, 100);
  return (
    weights.latency * latencyScore +
    weights.success * successRate * 100 +
    weights.quality * deviceQuality
  );
}

export interface QualityRoutingOptions {
  readonly weights?: Partial<QualityWeights>;
  /** Per-transport quality probe bound in ms. Default: 1_000 */
  readonly qualityTimeoutMs?: number;
}

/** Orders usable transports by descending weighted score; ties keep input order. */
export class QualityRoutingStrategy implements RoutingStrategy {
  readonly name = 'quality';
  readonly weights: QualityWeights;
  private readonly qualityTimeoutMs: number;

  constructor(options: QualityRoutingOptions = {}) {
    this.weights = normalizeQualityWeights(options.weights ?? {});
    this.qualityTimeoutMs = options.qualityTimeoutMs ?? DEFAULT_QUALITY_TIMEOUT_MS;
    if (!(this.qualityTimeoutMs > 0)) {
      throw new RoutingValidationError('qualityTimeoutMs', 'must be a positive number');
    }
  }

  async selectTransports(request: RoutingRequest): Promise<Transport[]> {
    const usable = request.availableTransports.filter(isUsable);
    const qualities = await Promise.all(
      usable.map((t) => probeQuality(t, request.deviceId, this.qualityTimeoutMs)),
    );

    return usable
      .map((transport, i) => ({ transport, score: computeQualityScore(transport, qualities[i], this.weights) }))
      .sort((a, b) => b.score - a.score)
      .map((entry) => entry.transport);
  }
}
