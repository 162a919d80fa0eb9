/**
 * Transport API: standard interfaces for modular transport implementations.
 *
 * The relay accepts client connections through a TransportListener and
 * opens the upstream leg through a TransportConnector. The transport layer
 * deals in raw bytes exactly as they arrive; line framing and JSON value
 * framing happen above this layer, in the codecs.
 *
 * Architecture:
 *   Client side:   registry.listen(config.listen) → onConnection → TransportConnection
 *   Upstream side: registry.connect(config.upstream) → TransportConnection
 */

import type { TransportScheme, TransportAddress, ParsedRelayUri } from './transport.js';

// ── Connection ───────────────────────────────────────────────────

/**
 * A live bidirectional byte stream.
 */
export interface TransportConnection {
  /**
   * Queue bytes for writing. Returns false when the write buffer is full;
   * the caller should stop reading its source until onDrain fires.
   */
  send(data: Uint8Array): boolean;

  /** Register handler for incoming bytes. */
  onData(handler: (data: Uint8Array) => void): void;

  /** Register handler for connection errors. */
  onError(handler: (error: Error) => void): void;

  /** Register handler for connection close (either side). */
  onClose(handler: () => void): void;

  /** Register handler fired when a full write buffer has emptied. */
  onDrain(handler: () => void): void;

  /** Stop delivering incoming bytes until resume(). */
  pause(): void;

  /** Resume delivering incoming bytes. */
  resume(): void;

  /** Flush pending writes, then close both directions. Idempotent. */
  close(): void;

  /** Whether the connection is currently open. */
  readonly connected: boolean;

  /** Metadata about this connection. */
  readonly info: ConnectionInfo;
}

export interface ConnectionInfo {
  /** The transport scheme used. */
  scheme: TransportScheme;
  /** Human-readable description of the remote endpoint. */
  remoteAddress: string;
}

// ── Connector (upstream side) ────────────────────────────────────

/**
 * Opens a connection to an upstream server. One implementation per
 * transport scheme.
 */
export interface TransportConnector {
  /** Which scheme(s) this connector handles. */
  readonly schemes: TransportScheme[];

  connect(
    address: TransportAddress,
    options: ConnectOptions,
  ): Promise<TransportConnection>;
}

export interface ConnectOptions {
  /** The parsed URI. */
  uri: ParsedRelayUri;
  /** Connection timeout in ms. 0 = no timeout. */
  timeoutMs?: number;
  /** TLS options (for tls://). */
  tls?: TlsOptions;
}

// ── Listener (client side) ───────────────────────────────────────

/**
 * Accepts client connections. One implementation per transport scheme.
 */
export interface TransportListener {
  /** Which scheme(s) this listener handles. */
  readonly schemes: TransportScheme[];

  /**
   * Start listening for connections.
   * Returns the resolved listen address (useful when port 0 is used).
   */
  listen(
    address: TransportAddress,
    options: ListenOptions,
  ): Promise<ListenResult>;

  /** Register handler for new connections. */
  onConnection(handler: (conn: TransportConnection) => void): void;

  /** Register handler for listener errors (e.g., address in use). */
  onError(handler: (error: Error) => void): void;

  /** Stop accepting connections. */
  close(): Promise<void>;
}

export interface ListenOptions {
  /** The parsed URI. */
  uri: ParsedRelayUri;
  /** TLS options (for tls://). */
  tls?: TlsOptions;
}

export interface ListenResult {
  /** The resolved address the listener is bound to. */
  address: string;
  /** A URI clients can connect to. */
  uri: string;
}

// ── TLS ──────────────────────────────────────────────────────────

export interface TlsOptions {
  cert?: string;    // path to certificate file
  key?: string;     // path to private key file
  ca?: string;      // path to CA certificate file
  insecure?: boolean; // skip certificate verification
}
