/**
 * Net socket transport: handles tcp://, tls://, unix:// and unix-abstract://.
 *
 * All four schemes use Node's `net` module (or `tls` for encrypted connections).
 * The only difference is the connect/listen address format:
 *   - unix://    → { path: '/tmp/sock' }
 *   - unix-abstract:// → { path: '\0name' }
 *   - tcp://     → { host, port }
 *   - tls://     → { host, port } + TLS options
 */

import * as net from 'node:net';
import * as tls from 'node:tls';
import * as fs from 'node:fs';
import { TransportFault } from '../core/errors.js';
import type {
  TransportConnection,
  TransportConnector,
  TransportListener,
  ConnectOptions,
  ListenOptions,
  ListenResult,
  ConnectionInfo,
  TlsOptions,
} from '../core/transport-api.js';
import { describeAddress } from '../core/transport.js';
import type { TransportScheme, TransportAddress } from '../core/transport.js';

// ── Socket Connection ────────────────────────────────────────────

/** How long close() waits for queued writes before destroying the socket. */
const CLOSE_GRACE_MS = 2_000;

/**
 * TransportConnection backed by a Node net.Socket or tls.TLSSocket.
 * Bytes are delivered as they arrive; no framing at this layer.
 */
class SocketConnection implements TransportConnection {
  private dataHandlers: Array<(data: Uint8Array) => void> = [];
  private errorHandlers: Array<(error: Error) => void> = [];
  private closeHandlers: Array<() => void> = [];
  private drainHandlers: Array<() => void> = [];
  private _connected = true;

  readonly info: ConnectionInfo;

  constructor(
    private socket: net.Socket,
    scheme: TransportScheme,
    remoteAddress: string,
  ) {
    this.info = { scheme, remoteAddress };

    socket.on('data', (chunk: Buffer) => {
      for (const handler of this.dataHandlers) {
        handler(chunk);
      }
    });

    socket.on('drain', () => {
      for (const handler of this.drainHandlers) {
        handler();
      }
    });

    socket.on('error', (err: Error) => {
      const fault = new TransportFault(`${this.info.remoteAddress}: ${err.message}`, err);
      for (const handler of this.errorHandlers) {
        handler(fault);
      }
    });

    socket.on('close', () => {
      this._connected = false;
      for (const handler of this.closeHandlers) {
        handler();
      }
    });
  }

  get connected(): boolean {
    return this._connected && !this.socket.destroyed;
  }

  send(data: Uint8Array): boolean {
    if (!this.connected) {
      throw new TransportFault('Connection is closed');
    }
    return this.socket.write(data);
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
    this.socket.pause();
  }

  resume(): void {
    this.socket.resume();
  }

  close(): void {
    if (!this._connected) return;
    this._connected = false;
    // end() flushes queued writes and sends FIN. The socket is destroyed
    // after that, whether or not the peer has ended its own side.
    const socket = this.socket;
    const grace = setTimeout(() => socket.destroy(), CLOSE_GRACE_MS);
    grace.unref();
    socket.end(() => {
      clearTimeout(grace);
      socket.destroy();
    });
  }
}

// ── Connector ────────────────────────────────────────────────────

type NetTarget = { path: string } | { host: string; port: number };

function resolveNetOptions(address: TransportAddress): NetTarget {
  switch (address.type) {
    case 'path':
      return { path: address.path };
    case 'name':
      // Abstract socket: prepend NUL byte
      return { path: `\0${address.name}` };
    case 'host':
      return { host: address.host, port: address.port };
  }
}

function readTlsFiles(options: TlsOptions | undefined): Pick<tls.TlsOptions, 'ca' | 'cert' | 'key'> {
  return {
    ca: options?.ca ? fs.readFileSync(options.ca) : undefined,
    cert: options?.cert ? fs.readFileSync(options.cert) : undefined,
    key: options?.key ? fs.readFileSync(options.key) : undefined,
  };
}

export class NetSocketConnector implements TransportConnector {
  readonly schemes: TransportScheme[] = ['unix', 'unix-abstract', 'tcp', 'tls'];

  async connect(
    address: TransportAddress,
    options: ConnectOptions,
  ): Promise<TransportConnection> {
    const scheme = options.uri.scheme;
    const netOpts = resolveNetOptions(address);

    return new Promise((resolve, reject) => {
      let socket: net.Socket;

      if (scheme === 'tls') {
        socket = tls.connect({
          ...netOpts,
          ...readTlsFiles(options.tls),
          servername: address.type === 'host' ? address.host : undefined,
          rejectUnauthorized: !options.tls?.insecure,
        });
      } else {
        socket = net.createConnection(netOpts);
      }

      const timeout = options.timeoutMs ?? 10_000;
      if (timeout > 0) {
        socket.setTimeout(timeout);
        socket.once('timeout', () => {
          socket.destroy(new Error(`Connection timeout after ${timeout}ms`));
        });
      }

      const onError = (err: Error) => {
        reject(new TransportFault(`Cannot connect to ${describeAddress(address)}: ${err.message}`, err));
      };
      socket.once('error', onError);

      socket.once(scheme === 'tls' ? 'secureConnect' : 'connect', () => {
        socket.setTimeout(0); // clear connect timeout
        socket.removeListener('error', onError);
        resolve(new SocketConnection(socket, scheme, describeAddress(address)));
      });
    });
  }
}

// ── Listener ─────────────────────────────────────────────────────

export class NetSocketListener implements TransportListener {
  readonly schemes: TransportScheme[] = ['unix', 'unix-abstract', 'tcp', 'tls'];

  private server: net.Server | null = null;
  private connectionHandlers: Array<(conn: TransportConnection) => void> = [];
  private errorHandlers: Array<(error: Error) => void> = [];
  private activeScheme: TransportScheme = 'tcp';

  async listen(
    address: TransportAddress,
    options: ListenOptions,
  ): Promise<ListenResult> {
    this.activeScheme = options.uri.scheme;

    const server: net.Server = options.uri.scheme === 'tls'
      ? tls.createServer({
        ...readTlsFiles(options.tls),
        rejectUnauthorized: !options.tls?.insecure,
      })
      : net.createServer();
    this.server = server;

    // Clean up stale Unix socket files
    if (address.type === 'path') {
      fs.rmSync(address.path, { force: true });
    }

    server.on(options.uri.scheme === 'tls' ? 'secureConnection' : 'connection', (socket: net.Socket) => {
      const conn = new SocketConnection(
        socket,
        this.activeScheme,
        socket.remoteAddress
          ? `${socket.remoteAddress}:${socket.remotePort}`
          : describeAddress(address),
      );
      for (const handler of this.connectionHandlers) {
        handler(conn);
      }
    });

    server.on('error', (err: Error) => {
      for (const handler of this.errorHandlers) {
        handler(err);
      }
    });

    const listenOpts = resolveNetOptions(address);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      const done = () => {
        server.removeListener('error', reject);
        resolve();
      };
      if ('path' in listenOpts) {
        server.listen(listenOpts.path, done);
      } else {
        server.listen(listenOpts.port, listenOpts.host, done);
      }
    });

    return {
      address: this.resolvedAddress(address),
      uri: this.resolvedUri(address),
    };
  }

  onConnection(handler: (conn: TransportConnection) => void): void {
    this.connectionHandlers.push(handler);
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  async close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private resolvedAddress(address: TransportAddress): string {
    if (address.type === 'host') {
      const addr = this.server?.address();
      if (addr && typeof addr === 'object') {
        return `${addr.address}:${addr.port}`;
      }
    }
    return describeAddress(address);
  }

  private resolvedUri(address: TransportAddress): string {
    switch (address.type) {
      case 'path':
        return `unix://${address.path}`;
      case 'name':
        return `unix-abstract://${address.name}`;
      case 'host': {
        const resolved = this.server?.address();
        if (resolved && typeof resolved === 'object') {
          const host = resolved.family === 'IPv6'
            ? `[${resolved.address}]`
            : resolved.address;
          return `${this.activeScheme}://${host}:${resolved.port}`;
        }
        return `${this.activeScheme}://${describeAddress(address)}`;
      }
    }
  }
}

/** Create the default net socket connector (handles unix, unix-abstract, tcp, tls). */
export function createNetSocketConnector(): NetSocketConnector {
  return new NetSocketConnector();
}

/** Create the default net socket listener (handles unix, unix-abstract, tcp, tls). */
export function createNetSocketListener(): NetSocketListener {
  return new NetSocketListener();
}
