/**
 * RelayPair: couples the client-facing (downstream) and server-facing
 * (upstream) legs of one relayed connection.
 *
 * Each message decoded on one leg is sent, unmodified and in order, on the
 * other leg, which serializes it in whatever format that leg currently
 * sends. Teardown of either leg tears down both.
 */

import { formatCommand, isCommand } from '../core/message.js';
import type { Message } from '../core/message.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { ConnectionChannel, CloseReason } from './channel.js';

export interface RelayPairOptions {
  logger?: Logger;
}

export class RelayPair {
  /** Resolves once both legs are closed. */
  readonly closed: Promise<void>;

  private readonly logger: Logger;
  private blockedBy = new Set<ConnectionChannel>();

  constructor(
    readonly downstream: ConnectionChannel,
    readonly upstream: ConnectionChannel,
    options: RelayPairOptions = {},
  ) {
    this.logger = (options.logger ?? silentLogger).child(String(downstream.connectionId));

    downstream.setPeer(upstream);
    upstream.setPeer(downstream);

    downstream.onMessage((message) => this.forward(downstream, message));
    upstream.onMessage((message) => this.forward(upstream, message));

    this.closed = Promise.all([
      new Promise<CloseReason>((resolve) => downstream.onClose(resolve)),
      new Promise<CloseReason>((resolve) => upstream.onClose(resolve)),
    ]).then(() => undefined);

    downstream.onClose((reason) => this.cascade(downstream, reason));
    upstream.onClose((reason) => this.cascade(upstream, reason));

    downstream.onBackpressure(() => this.block(downstream));
    upstream.onBackpressure(() => this.block(upstream));
    downstream.onDrain(() => this.unblock(downstream));
    upstream.onDrain(() => this.unblock(upstream));

    // An eager upstream may already be full from its STARTJSON.
    if (downstream.blocked) this.block(downstream);
    if (upstream.blocked) this.block(upstream);
  }

  private forward(source: ConnectionChannel, message: Message): void {
    const target = source.peer;
    if (!target) return;
    target.send(message);

    if (source === this.downstream && isCommand(message, 'quit')) {
      this.logger.info('client quit, closing pair', { command: formatCommand(message.command) });
      this.close();
    }
  }

  /** Target's write buffer is full: stop reading the other leg until it drains. */
  private block(target: ConnectionChannel): void {
    if (target.closed || this.blockedBy.has(target)) return;
    this.blockedBy.add(target);
    const source = target === this.downstream ? this.upstream : this.downstream;
    source.pause();
    this.logger.debug('backpressure, pausing', { leg: source.leg });
  }

  private unblock(target: ConnectionChannel): void {
    if (!this.blockedBy.delete(target)) return;
    const source = target === this.downstream ? this.upstream : this.downstream;
    if (!source.closed) {
      source.resume();
      this.logger.debug('drained, resuming', { leg: source.leg });
    }
  }

  private cascade(channel: ConnectionChannel, reason: CloseReason): void {
    const other = channel === this.downstream ? this.upstream : this.downstream;
    if (other.closed) return;
    this.logger.info('leg closed, closing the other', { leg: channel.leg, reason: reason.type });
    other.close();
  }

  /** Gracefully close both legs. */
  close(): void {
    this.downstream.close();
    this.upstream.close();
  }
}
