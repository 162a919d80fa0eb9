/**
 * End-to-end relay tests: a test client talks to the relay's listener, the
 * relay dials a test upstream server. Most run over in-process transports;
 * the last suite uses loopback TCP.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as net from 'node:net';
import { once } from 'node:events';
import { startRelay } from '../../src/relay/server.js';
import type { RelayHandle } from '../../src/relay/server.js';
import type { RelayPair } from '../../src/relay/relay-pair.js';
import { mergeConfigs, validateRelayConfig } from '../../src/core/relay-config.js';
import type { RelayConfig } from '../../src/core/relay-config.js';
import { createLogger, silentLogger } from '../../src/core/logger.js';
import { TransportRegistry } from '../../src/core/transport-registry.js';
import type { TransportConnection } from '../../src/core/transport-api.js';
import { createInProcessPair } from '../../src/transports/in-process.js';
import { createDefaultRegistry } from '../../src/transports/index.js';
import type { InProcessListener } from '../../src/transports/in-process.js';
import type { TraceEvent } from '../../src/trace/types.js';

const enc = new TextEncoder();
const dec = new TextDecoder();

const LISTEN = 'tcp://127.0.0.1:6667';
const UPSTREAM = 'tcp://irc.example.net:6667';

interface Upstream {
  listener: InProcessListener;
  /** Connections the relay opened to the upstream server, in order. */
  connections: TransportConnection[];
}

interface Recorder {
  text: () => string;
}

function record(conn: TransportConnection): Recorder {
  const chunks: string[] = [];
  conn.onData((data) => chunks.push(dec.decode(data)));
  return { text: () => chunks.join('') };
}

function nextPair(relay: RelayHandle): Promise<RelayPair> {
  return new Promise((resolve) => relay.onPair(resolve));
}

function closedPromise(conn: TransportConnection): Promise<void> {
  return new Promise((resolve) => conn.onClose(() => resolve()));
}

describe('relay server', () => {
  let clients: InProcessListener;
  let upstream: Upstream;
  let registry: TransportRegistry;
  let relay: RelayHandle | undefined;

  async function start(overrides: Partial<RelayConfig> = {}, events?: TraceEvent[]): Promise<RelayHandle> {
    const config = validateRelayConfig(mergeConfigs({ listen: LISTEN, upstream: UPSTREAM }, overrides));
    relay = await startRelay(config, {
      registry,
      logger: silentLogger,
      sink: events ? { record: (event) => events.push(event) } : undefined,
    });
    return relay;
  }

  beforeEach(async () => {
    const front = createInProcessPair(['tcp']);
    const back = createInProcessPair(['tcp']);
    clients = front.listener;
    upstream = { listener: back.listener, connections: [] };
    back.listener.onConnection((conn) => upstream.connections.push(conn));

    registry = new TransportRegistry();
    registry.registerListener(front.listener);
    registry.registerConnector(back.connector);

    const upstreamRegistry = new TransportRegistry();
    upstreamRegistry.registerListener(back.listener);
    await upstreamRegistry.listen(UPSTREAM);
  });

  afterEach(async () => {
    await relay?.close();
    relay = undefined;
  });

  it('reports the listen address', async () => {
    const handle = await start();
    expect(handle.address).toBe('127.0.0.1:6667');
    expect(handle.uri).toBe(LISTEN);
    expect(handle.activePairs).toBe(0);
  });

  it('relays both directions and keeps bytes sent before the upstream was ready', async () => {
    const handle = await start();
    const paired = nextPair(handle);

    const client = clients.accept();
    const fromRelay = record(client);
    client.send(enc.encode('NICK alice\r\nUSER alice 0 * :Alice\r\n'));
    await paired;

    expect(upstream.connections).toHaveLength(1);
    const server = upstream.connections[0];
    const atServer = record(server);
    client.send(enc.encode('JOIN #chan\r\n'));
    server.send(enc.encode(':irc.example.net 001 alice :Welcome\r\n'));

    expect(atServer.text()).toBe('JOIN #chan\r\n');
    expect(fromRelay.text()).toBe(':irc.example.net 001 alice :Welcome\r\n');
    expect(handle.activePairs).toBe(1);
  });

  it('forwards the early bytes once the pair is built', async () => {
    const handle = await start();
    const paired = nextPair(handle);
    const serverText: string[] = [];
    upstream.listener.onConnection((conn) => {
      conn.onData((data) => serverText.push(dec.decode(data)));
    });

    const client = clients.accept();
    client.send(enc.encode('NICK alice\r\n'));
    await paired;

    expect(serverText.join('')).toBe('NICK alice\r\n');
  });

  it('announces JSON upstream in eager mode and translates client lines', async () => {
    const handle = await start({ startJson: true });
    const paired = nextPair(handle);
    const serverText: string[] = [];
    upstream.listener.onConnection((conn) => {
      conn.onData((data) => serverText.push(dec.decode(data)));
    });

    const client = clients.accept();
    client.send(enc.encode('PRIVMSG #chan :hi\r\n'));
    await paired;

    expect(serverText.join('')).toBe(
      'STARTJSON\r\n{"tags":{},"source":null,"verb":"privmsg","params":["#chan","hi"]}',
    );
  });

  it('closes the client when the upstream cannot be reached', async () => {
    await upstream.listener.close();
    await start();

    const client = clients.accept();
    await closedPromise(client);
    expect(client.connected).toBe(false);
  });

  it('closes the client when the upstream hangs up', async () => {
    const handle = await start();
    const paired = nextPair(handle);
    const client = clients.accept();
    const pair = await paired;

    upstream.connections[0].close();
    await pair.closed;

    expect(client.connected).toBe(false);
    expect(handle.activePairs).toBe(0);
  });

  it('traces both legs under one connection id', async () => {
    const events: TraceEvent[] = [];
    const handle = await start({}, events);
    const paired = nextPair(handle);
    const client = clients.accept();
    await paired;

    client.send(enc.encode('PING :x\r\n'));

    expect(events.map((e) => [e.connectionId, e.leg, e.direction])).toEqual([
      [1, 'downstream', 'read'],
      [1, 'upstream', 'write'],
    ]);
  });

  it('closes every pair and stops accepting on close()', async () => {
    const handle = await start();
    const paired = nextPair(handle);
    const client = clients.accept();
    await paired;

    await handle.close();
    relay = undefined;

    expect(client.connected).toBe(false);
    expect(upstream.connections[0].connected).toBe(false);
    expect(handle.activePairs).toBe(0);
    expect(() => clients.accept()).toThrow(/not listening/);
  });

  it('logs connection lifecycle', async () => {
    const lines: string[] = [];
    const config = validateRelayConfig(mergeConfigs({ listen: LISTEN, upstream: UPSTREAM }));
    const handle = await startRelay(config, {
      registry,
      logger: createLogger('info', 'relay', (line) => lines.push(line)),
    });
    relay = handle;

    expect(lines[0]).toBe('[relay] info: listening address=127.0.0.1:6667 upstream=tcp://irc.example.net:6667 startJson=false');
  });

  it('logs listener errors and keeps accepting', async () => {
    const lines: string[] = [];
    const config = validateRelayConfig(mergeConfigs({ listen: LISTEN, upstream: UPSTREAM }));
    const handle = await startRelay(config, {
      registry,
      logger: createLogger('error', 'relay', (line) => lines.push(line)),
    });
    relay = handle;
    const paired = nextPair(handle);

    clients.fail(new Error('too many open files'));
    clients.accept();
    await paired;

    expect(lines).toEqual(['[relay] error: listener error reason="too many open files"']);
    expect(handle.activePairs).toBe(1);
  });
});

describe('relay server over TCP', () => {
  let upstreamServer: net.Server;
  let upstreamPort: number;

  beforeEach(async () => {
    upstreamServer = net.createServer((socket) => {
      socket.on('data', () => undefined);
    });
    upstreamServer.listen(0, '127.0.0.1');
    await once(upstreamServer, 'listening');
    const address = upstreamServer.address();
    if (address === null || typeof address === 'string') throw new Error('upstream has no TCP address');
    upstreamPort = address.port;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => upstreamServer.close(() => resolve()));
  });

  it('drops a client that keeps its side open after a malformed line', async () => {
    const config = validateRelayConfig(mergeConfigs({
      listen: 'tcp://127.0.0.1:0',
      upstream: `tcp://127.0.0.1:${upstreamPort}`,
    }));
    const handle = await startRelay(config, { registry: createDefaultRegistry(), logger: silentLogger });
    const paired = nextPair(handle);
    const port = Number(handle.address.slice(handle.address.lastIndexOf(':') + 1));

    const client = net.connect({ host: '127.0.0.1', port, allowHalfOpen: true });
    client.on('data', () => undefined);
    try {
      await once(client, 'connect');
      const pair = await paired;
      const ended = once(client, 'end');

      client.write('@bad\r\n');
      await pair.closed;
      await ended;
      // Resolves only once the server holds no sockets.
      await handle.close();

      expect(handle.activePairs).toBe(0);
    } finally {
      client.destroy();
    }
  });
});
