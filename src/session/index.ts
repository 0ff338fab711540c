/**
 * Session module: transfer sessions and upgraded connections.
 *
 * @module
 */

export {
  type UpgradedConnection,
  type UpgradeConnector,
  type TransferSessionRegistryConfig,
  type StartSessionOptions,
  TransferSession,
  TransferSessionRegistry,
  TransferSessionError,
} from './transfer-session.js';
