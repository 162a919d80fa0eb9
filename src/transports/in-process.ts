/**
 * In-process transport: direct memory transfer, no sockets.
 *
 * Used by the tests to run channels, relay pairs and the whole relay
 * server without opening a port. Bytes are delivered synchronously to the
 * peer's handlers, or queued while the peer is paused.
 */

import { TransportFault } from '../core/errors.js';
import type {
  TransportConnection,
  TransportConnector,
  TransportListener,
  ConnectOptions,
  ListenOptions,
  ListenResult,
  ConnectionInfo,
} from '../core/transport-api.js';
import { describeAddress } from '../core/transport.js';
import type { TransportScheme, TransportAddress } from '../core/transport.js';

// ── In-Process Connection Pair ───────────────────────────────────

export class InProcessConnection implements TransportConnection {
  private dataHandlers: Array<(data: Uint8Array) => void> = [];
  private errorHandlers: Array<(error: Error) => void> = [];
  private closeHandlers: Array<() => void> = [];
  private drainHandlers: Array<() => void> = [];
  private _connected = true;
  private paused = false;
  private saturated = false;
  private inbox: Uint8Array[] = [];

  /** The other end of this connection. Set after construction. */
  peer: InProcessConnection | null = null;

  readonly info: ConnectionInfo;

  constructor(scheme: TransportScheme, label: string) {
    this.info = { scheme, remoteAddress: label };
  }

  get connected(): boolean {
    return this._connected;
  }

  send(data: Uint8Array): boolean {
    if (!this._connected) throw new TransportFault('Connection is closed');
    if (!this.peer?._connected) throw new TransportFault('Peer connection is closed');

    // Copy: the sender may reuse its buffer
    this.peer.deliver(data.slice());
    return !this.saturated;
  }

  private deliver(data: Uint8Array): void {
    if (this.paused) {
      this.inbox.push(data);
      return;
    }
    for (const handler of this.dataHandlers) {
      handler(data);
    }
  }

  onData(handler: (data: Uint8Array) => void): void {
    this.dataHandlers.push(handler);
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  onClose(handler: () => void): void {
    this.closeHandlers.push(handler);
  }

  onDrain(handler: () => void): void {
    this.drainHandlers.push(handler);
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    while (!this.paused && this._connected && this.inbox.length > 0) {
      const data = this.inbox.shift();
      if (data) this.deliver(data);
    }
  }

  /** Make send() report a full write buffer until drain() is called. */
  saturate(): void {
    this.saturated = true;
  }

  /** Clear a saturate() and fire drain handlers. */
  drain(): void {
    this.saturated = false;
    for (const handler of this.drainHandlers) {
      handler();
    }
  }

  /** Simulate a socket error on this end. */
  fail(error: Error): void {
    for (const handler of this.errorHandlers) {
      handler(error);
    }
  }

  close(): void {
    if (!this._connected) return;
    this._connected = false;
    for (const handler of this.closeHandlers) {
      handler();
    }
    // Close peer too
    if (this.peer?._connected) {
      this.peer.close();
    }
  }
}

/**
 * Create a connected pair of in-process transport connections.
 *
 * Bytes sent on one end are delivered synchronously to the other.
 */
export function createConnectionPair(
  scheme: TransportScheme = 'tcp',
  labels: [string, string] = ['server (in-process)', 'client (in-process)'],
): [InProcessConnection, InProcessConnection] {
  const a = new InProcessConnection(scheme, labels[0]);
  const b = new InProcessConnection(scheme, labels[1]);
  a.peer = b;
  b.peer = a;
  return [a, b];
}

// ── In-Process Listener ──────────────────────────────────────────

/**
 * In-process listener. accept() creates a connection pair, emits the
 * server side via onConnection and returns the client side.
 */
export class InProcessListener implements TransportListener {
  readonly schemes: TransportScheme[];
  private connectionHandlers: Array<(conn: TransportConnection) => void> = [];
  private errorHandlers: Array<(error: Error) => void> = [];
  private listening = false;
  private boundTo = 'in-process';

  constructor(schemes: TransportScheme[] = ['tcp', 'unix']) {
    this.schemes = schemes;
  }

  async listen(
    address: TransportAddress,
    options: ListenOptions,
  ): Promise<ListenResult> {
    this.listening = true;
    this.boundTo = describeAddress(address);
    return {
      address: this.boundTo,
      uri: options.uri.raw,
    };
  }

  /** Open a connection to this listener. Returns the client side. */
  accept(scheme: TransportScheme = this.schemes[0]): InProcessConnection {
    if (!this.listening) {
      throw new TransportFault(`Connection refused: ${this.boundTo} is not listening`);
    }
    const [clientSide, serverSide] = createConnectionPair(scheme, [this.boundTo, 'client (in-process)']);
    for (const handler of this.connectionHandlers) {
      handler(serverSide);
    }
    return clientSide;
  }

  onConnection(handler: (conn: TransportConnection) => void): void {
    this.connectionHandlers.push(handler);
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  /** Simulate an accept error on this listener. */
  fail(error: Error): void {
    for (const handler of this.errorHandlers) {
      handler(error);
    }
  }

  async close(): Promise<void> {
    this.listening = false;
  }
}

/**
 * In-process connector that pairs with an InProcessListener.
 */
export class InProcessConnector implements TransportConnector {
  readonly schemes: TransportScheme[];

  constructor(private listener: InProcessListener, schemes?: TransportScheme[]) {
    this.schemes = schemes ?? listener.schemes;
  }

  async connect(
    _address: TransportAddress,
    options: ConnectOptions,
  ): Promise<TransportConnection> {
    return this.listener.accept(options.uri.scheme);
  }
}

export function createInProcessPair(schemes?: TransportScheme[]): {
  connector: InProcessConnector;
  listener: InProcessListener;
} {
  const listener = new InProcessListener(schemes);
  const connector = new InProcessConnector(listener);
  return { connector, listener };
}
