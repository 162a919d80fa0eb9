/**
 * Transport module index: default registry with all built-in transports.
 *
 * Usage:
 *   import { createDefaultRegistry } from './transports/index.js';
 *   const registry = createDefaultRegistry();
 *
 * The default registry includes:
 *   - net-socket: tcp://, tls://, unix://, unix-abstract://
 *
 * Tests build their own registry from in-process transports:
 *   registry.registerConnector(new InProcessConnector(serverListener));
 *   registry.registerListener(clientListener);
 */

import { TransportRegistry } from '../core/transport-registry.js';
import { createNetSocketConnector, createNetSocketListener } from './net-socket.js';

/**
 * Create a registry pre-loaded with the built-in socket transports.
 */
export function createDefaultRegistry(): TransportRegistry {
  const registry = new TransportRegistry();

  registry.registerConnector(createNetSocketConnector());
  registry.registerListener(createNetSocketListener());

  return registry;
}

// Re-export everything for convenient imports
export { TransportRegistry } from '../core/transport-registry.js';
export { createNetSocketConnector, createNetSocketListener } from './net-socket.js';
export {
  createConnectionPair,
  createInProcessPair,
  InProcessConnection,
  InProcessConnector,
  InProcessListener,
} from './in-process.js';
export type {
  TransportConnection,
  TransportConnector,
  TransportListener,
  ConnectOptions,
  ListenOptions,
  ListenResult,
  ConnectionInfo,
  TlsOptions,
} from '../core/transport-api.js';
