/**
 * Transport module: channel contract and shared value types.
 *
 * @module
 */

export {
  type TransportMessageKind,
  type SignedEvent,
  type TransportMessage,
  type TransportMessageInit,
  type ApiRequestInit,
  type DirectMessageInit,
  type RoomMessageInit,
  type ApiResponsePayload,
  TRANSPORT_MESSAGE_KINDS,
  createMessageId,
  createTransportMessage,
  copyMessage,
  isExpired,
  isBinaryPayload,
  apiRequestMessage,
  directMessage,
  roomMessage,
  apiResponseMessage,
} from './message.js';

export {
  type DeliveredResult,
  type QueuedResult,
  type FailedResult,
  type TransportResult,
  QUEUE_TRANSPORT_ID,
  deliveredResult,
  queuedResult,
  failedResult,
} from './result.js';

export {
  type TransportMetrics,
  INITIAL_TRANSPORT_METRICS,
  recordTransportOutcome,
} from './metrics.js';

export {
  type StreamListener,
  type StreamSubscription,
  type MessageStream,
  Broadcaster,
  mergeStreams,
} from './broadcast.js';

export {
  type DeviceRecord,
  type DeviceRegistration,
  DeviceRegistry,
  normalizeDeviceId,
} from './device-registry.js';

export {
  type Transport,
  type TransportSendOptions,
  TRANSPORT_PRIORITY,
  isUsable,
} from './types.js';

export { type DeviceReachabilityEvent, TransportSupport } from './support.js';
