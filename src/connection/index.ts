/**
 * Connection module: transport registry, send loop, store-and-forward
 * queue and the local API boundary.
 *
 * @module
 */

export type {
  LocalApiConfig,
  QueueConfig,
  ConnectionManagerConfig,
  SendOptions,
  RetrySummary,
  TransportStatus,
  ConnectionManagerStatus,
} from './types.js';

export {
  type ConnectionSettings,
  DEFAULT_SEND_TIMEOUT_MS,
  DEFAULT_QUEUE_PROCESS_INTERVAL_MS,
  DEFAULT_LOCAL_API_TIMEOUT_MS,
  DEFAULT_API_PREFIX,
  ConnectionConfigError,
  resolveConnectionSettings,
} from './config.js';

export { DEFAULT_QUEUE_CAPACITY, MessageQueue } from './queue.js';

export {
  type LocalApiForwarderOptions,
  type LocalApiResponse,
  LocalApiForwarder,
  toLoopbackMethod,
  encodeLoopbackBody,
} from './local-api.js';

export { ConnectionManager } from './manager.js';
