/**
 * Routing module: pluggable transport selection policies.
 *
 * @module
 */

export type { RoutingRequest, RoutingStrategy } from './types.js';

export { RoutingValidationError } from './errors.js';

export {
  DEFAULT_REACHABILITY_TIMEOUT_MS,
  DEFAULT_QUALITY_TIMEOUT_MS,
  DEFAULT_QUALITY_SCORE,
  probeReachability,
  probeQuality,
} from './probe.js';

export {
  type PriorityRoutingOptions,
  PriorityRoutingStrategy,
  sortByPriority,
} from './priority.js';

export {
  type QualityWeights,
  type QualityRoutingOptions,
  DEFAULT_QUALITY_WEIGHTS,
  QualityRoutingStrategy,
  normalizeQualityWeights,
  computeQualityScore,
} from './quality.js';

export { FailoverRoutingStrategy } from './failover.js';

export { type MessageTypeRoutes, MessageTypeRoutingStrategy } from './message-type.js';
