/**
 * meshlink-runtime - transport-agnostic message routing between devices
 *
 * Main entry point. Re-exports the transport contract, routing strategies,
 * transfer sessions, the connection manager and shared utilities.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Transport contract and value types
export * from './transport/index.js';

// Routing strategies
export * from './routing/index.js';

// Transfer sessions
export * from './session/index.js';

// Connection manager
export * from './connection/index.js';

// Errors
export * from './types/index.js';

// Utilities
export * from './utils/index.js';
