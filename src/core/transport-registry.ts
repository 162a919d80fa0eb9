/**
 * Transport Registry: maps URI schemes to connector/listener implementations.
 *
 * The relay looks up the listener for its listen URI and the connector for
 * its upstream URI here. Tests register in-process transports under the
 * same schemes to run the relay without sockets.
 *
 * Usage:
 *   const registry = createDefaultRegistry();
 *   const listener = await registry.listen('tcp://0.0.0.0:6667');
 *   listener.onConnection(conn => { ... });
 *   const upstream = await registry.connect('tcp://irc.example.com:6667');
 */

import type {
  TransportConnector,
  TransportListener,
  TransportConnection,
  ConnectOptions,
  ListenOptions,
  ListenResult,
} from './transport-api.js';
import type { TransportScheme } from './transport.js';
import { parseRelayUri, resolveAddress, RelayUriError } from './transport.js';

export interface ActiveListener {
  listener: TransportListener;
  result: ListenResult;
}

export class TransportRegistry {
  private connectors = new Map<TransportScheme, TransportConnector>();
  private listeners = new Map<TransportScheme, TransportListener>();

  // ── Registration ─────────────────────────────────────────────

  /**
   * Register a transport connector.
   * A single connector can handle multiple schemes (e.g., tcp + unix).
   */
  registerConnector(connector: TransportConnector): void {
    for (const scheme of connector.schemes) {
      this.connectors.set(scheme, connector);
    }
  }

  /**
   * Register a transport listener.
   * A single listener can handle multiple schemes.
   */
  registerListener(listener: TransportListener): void {
    for (const scheme of listener.schemes) {
      this.listeners.set(scheme, listener);
    }
  }

  // ── High-Level Operations ────────────────────────────────────

  /**
   * Open a connection to the address named by a URI.
   * Throws RelayUriError if the scheme has no registered connector.
   */
  async connect(
    uri: string,
    options?: Partial<ConnectOptions>,
  ): Promise<TransportConnection> {
    const parsed = parseRelayUri(uri);
    const address = resolveAddress(parsed);

    const connector = this.connectors.get(parsed.scheme);
    if (!connector) {
      throw new RelayUriError(
        `No connector registered for scheme "${parsed.scheme}". ` +
        `Available: ${[...this.connectors.keys()].join(', ') || 'none'}`,
      );
    }

    return connector.connect(address, {
      uri: parsed,
      timeoutMs: options?.timeoutMs,
      tls: options?.tls,
    });
  }

  /**
   * Start listening on the address named by a URI.
   * Returns the listener (to attach connection handlers) and its resolved address.
   */
  async listen(
    uri: string,
    options?: Partial<ListenOptions>,
  ): Promise<ActiveListener> {
    const parsed = parseRelayUri(uri);
    const address = resolveAddress(parsed);

    const listener = this.listeners.get(parsed.scheme);
    if (!listener) {
      throw new RelayUriError(
        `No listener registered for scheme "${parsed.scheme}". ` +
        `Available: ${[...this.listeners.keys()].join(', ') || 'none'}`,
      );
    }

    const result = await listener.listen(address, {
      uri: parsed,
      tls: options?.tls,
    });
    return { listener, result };
  }
}
