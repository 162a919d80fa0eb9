/**
 * Relay server: accepts client connections and pairs each with a new
 * upstream connection.
 *
 * Usage:
 *   const relay = await startRelay(config, { registry: createDefaultRegistry() });
 *   ...
 *   await relay.close();
 */

import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { RelayConfig } from '../core/relay-config.js';
import type { TransportConnection } from '../core/transport-api.js';
import type { TransportRegistry } from '../core/transport-registry.js';
import type { DiagnosticSink } from '../trace/types.js';
import { ConnectionChannel } from './channel.js';
import { RelayPair } from './relay-pair.js';

export interface StartRelayOptions {
  registry: TransportRegistry;
  logger?: Logger;
  sink?: DiagnosticSink;
}

export interface RelayHandle {
  /** The resolved listen address. */
  readonly address: string;
  /** A URI clients can connect to. */
  readonly uri: string;
  /** Number of live relayed connections. */
  readonly activePairs: number;
  /** Fires after a client has been paired with an upstream connection. */
  onPair(handler: (pair: RelayPair) => void): void;
  /** Stop accepting, close every pair and wait for them to finish. */
  close(): Promise<void>;
}

export async function startRelay(
  config: RelayConfig & { upstream: string },
  options: StartRelayOptions,
): Promise<RelayHandle> {
  const { registry, sink } = options;
  const logger = options.logger ?? createLogger(config.logLevel);

  const pairs = new Set<RelayPair>();
  const pending = new Set<TransportConnection>();
  const pairHandlers: Array<(pair: RelayPair) => void> = [];
  let nextId = 1;
  let closing = false;

  const { listener, result } = await registry.listen(config.listen, { tls: config.tls });
  logger.info('listening', { address: result.address, upstream: config.upstream, startJson: config.startJson });

  listener.onError((error) => {
    logger.error('listener error', { reason: error.message });
  });

  const accept = async (client: TransportConnection): Promise<void> => {
    const id = nextId++;
    const log = logger.child(String(id));

    if (closing) {
      client.close();
      return;
    }

    // Hold client bytes until the upstream leg exists.
    client.pause();
    pending.add(client);
    log.info('client connected', { from: client.info.remoteAddress });

    let upstreamConn: TransportConnection;
    try {
      upstreamConn = await registry.connect(config.upstream, {
        timeoutMs: config.connectTimeoutMs,
        tls: config.upstreamTls,
      });
    } catch (err) {
      pending.delete(client);
      log.error('upstream connect failed', { reason: err instanceof Error ? err.message : String(err) });
      client.close();
      return;
    }
    pending.delete(client);

    if (closing || !client.connected) {
      log.info('client left before upstream connected');
      upstreamConn.close();
      client.close();
      return;
    }

    const downstream = new ConnectionChannel(client, {
      leg: 'downstream',
      connectionId: id,
      logger,
      sink,
    });
    const upstream = new ConnectionChannel(upstreamConn, {
      leg: 'upstream',
      connectionId: id,
      startJson: config.startJson,
      logger,
      sink,
    });
    const pair = new RelayPair(downstream, upstream, { logger });
    pairs.add(pair);
    pair.closed.then(() => {
      pairs.delete(pair);
      log.info('connection finished');
    }, (err: unknown) => {
      log.error('pair teardown failed', { reason: err instanceof Error ? err.message : String(err) });
    });

    for (const handler of pairHandlers) handler(pair);

    client.resume();
  };

  listener.onConnection((client) => {
    accept(client).catch((err: unknown) => {
      logger.error('failed to relay connection', { reason: err instanceof Error ? err.message : String(err) });
      client.close();
    });
  });

  return {
    address: result.address,
    uri: result.uri,
    get activePairs() {
      return pairs.size;
    },
    onPair(handler) {
      pairHandlers.push(handler);
    },
    async close() {
      closing = true;
      // net.Server.close() resolves only once every socket is gone, so
      // close the pairs before waiting on it.
      const stopped = listener.close();
      for (const client of pending) client.close();
      const finished = [...pairs].map((pair) => pair.closed);
      for (const pair of pairs) pair.close();
      await Promise.all([stopped, ...finished]);
      await sink?.close?.();
      logger.info('stopped');
    },
  };
}
