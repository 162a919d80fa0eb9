/**
 * ConnectionChannel: one leg of a relayed connection.
 *
 * Owns the transport connection, the active decoder (receive side) and
 * encoder (send side), and the one-way format switch for each direction:
 *
 *   receive: native ──STARTJSON──▶ json
 *   send:    native ──enterJsonSend()──▶ json
 *
 * Receiving STARTJSON switches the receive side, hands the bytes the line
 * decoder had not consumed to a fresh JSON decoder, and reciprocates by
 * switching the send side too. The trigger is consumed here and never
 * reaches onMessage handlers.
 */

import { DecodeError, EncodeError, TransportFault } from '../core/errors.js';
import { createMessage, formatCommand, isCommand } from '../core/message.js';
import type { Message } from '../core/message.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { TransportConnection } from '../core/transport-api.js';
import { JsonDecoder } from '../codec/json-codec.js';
import { createDecoder, createEncoder } from '../codec/index.js';
import type { MessageDecoder, MessageEncoder, WireFormat } from '../codec/types.js';
import type { DiagnosticSink, Leg } from '../trace/types.js';

export const STARTJSON = 'startjson';

export interface ChannelOptions {
  leg: Leg;
  /** Id shared by both legs of a relayed connection, for logs and traces. */
  connectionId?: number;
  /** Announce JSON on the send side immediately (eager mode). */
  startJson?: boolean;
  logger?: Logger;
  sink?: DiagnosticSink;
}

export type CloseReason =
  | { type: 'local' }
  | { type: 'remote' }
  | { type: 'decode'; error: DecodeError }
  | { type: 'encode'; error: EncodeError }
  | { type: 'transport'; error: Error };

export class ConnectionChannel {
  readonly leg: Leg;
  readonly connectionId: number;

  private decoder: MessageDecoder;
  private encoder: MessageEncoder;
  private _peer: ConnectionChannel | null = null;
  private _closed = false;
  private draining = false;
  private writeBlocked = false;
  private closeReason: CloseReason | null = null;

  private messageHandlers: Array<(message: Message) => void> = [];
  private closeHandlers: Array<(reason: CloseReason) => void> = [];
  private drainHandlers: Array<() => void> = [];
  private backpressureHandlers: Array<() => void> = [];

  private readonly logger: Logger;
  private readonly sink: DiagnosticSink | undefined;

  constructor(
    private readonly connection: TransportConnection,
    options: ChannelOptions,
  ) {
    this.leg = options.leg;
    this.connectionId = options.connectionId ?? 0;
    this.logger = (options.logger ?? silentLogger).child(`${this.connectionId}:${this.leg}`);
    this.sink = options.sink;

    this.decoder = createDecoder('native');
    this.encoder = createEncoder('native');

    connection.onData((data) => this.receive(data));
    connection.onDrain(() => {
      this.writeBlocked = false;
      for (const handler of this.drainHandlers) handler();
    });
    connection.onError((error) => {
      this.logger.warn('transport error', { reason: error.message });
      this.shutdown({ type: 'transport', error });
    });
    connection.onClose(() => this.handleTransportClosed());

    if (options.startJson) {
      this.enterJsonSend();
    }
  }

  // ── State ────────────────────────────────────────────────────

  get receiveFormat(): WireFormat {
    return this.decoder.format;
  }

  get sendFormat(): WireFormat {
    return this.encoder.format;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** True from a write the transport could not take until the next drain. */
  get blocked(): boolean {
    return this.writeBlocked;
  }

  get peer(): ConnectionChannel | null {
    return this._peer;
  }

  /** Link the opposite leg. May be set once. */
  setPeer(peer: ConnectionChannel): void {
    if (this._peer && this._peer !== peer) {
      throw new Error(`Channel ${this.leg} already has a peer`);
    }
    this._peer = peer;
  }

  // ── Events ───────────────────────────────────────────────────

  onMessage(handler: (message: Message) => void): void {
    this.messageHandlers.push(handler);
  }

  /** Fires once, after the channel has closed for any reason. */
  onClose(handler: (reason: CloseReason) => void): void {
    if (this._closed && this.closeReason) {
      handler(this.closeReason);
      return;
    }
    this.closeHandlers.push(handler);
  }

  /** Fires when the transport's write buffer has emptied after send() returned false. */
  onDrain(handler: () => void): void {
    this.drainHandlers.push(handler);
  }

  /**
   * Fires when a write fills the transport's buffer, whether it came from
   * send() or from the STARTJSON this channel writes on its own.
   */
  onBackpressure(handler: () => void): void {
    this.backpressureHandlers.push(handler);
  }

  // ── Receive path ─────────────────────────────────────────────

  /**
   * Accept bytes from the transport. Every complete message is decoded
   * and dispatched before this returns. A call made from inside a handler
   * only buffers; the outer call keeps draining.
   */
  receive(data: Uint8Array): void {
    if (this._closed) return;
    this.trace('read', data);
    this.decoder.push(data);

    if (this.draining) return;
    this.draining = true;
    try {
      while (!this._closed) {
        // Re-read this.decoder every time: dispatch() may have swapped it.
        const message = this.decoder.next();
        if (message === null) break;
        this.dispatch(message);
      }
    } catch (err) {
      if (err instanceof DecodeError) {
        this.logger.warn('decode error, closing', { format: this.decoder.format, reason: err.message, input: err.input });
        this.shutdown({ type: 'decode', error: err });
      } else {
        throw err;
      }
    } finally {
      this.draining = false;
    }
  }

  private dispatch(message: Message): void {
    if (isCommand(message, STARTJSON)) {
      if (this.decoder.format === 'json') {
        this.logger.debug('ignoring STARTJSON, already receiving JSON');
        return;
      }
      this.enterJsonReceive();
      return;
    }

    this.logger.debug('received', { command: formatCommand(message.command), args: message.args.length });
    for (const handler of this.messageHandlers) {
      handler(message);
    }
  }

  /**
   * Switch the receive side to JSON. Bytes already buffered by the line
   * decoder move to the new decoder; then the send side follows.
   */
  enterJsonReceive(): void {
    if (this.decoder.format === 'json') return;

    const pending = this.decoder.takePending();
    const next = new JsonDecoder();
    next.push(pending);
    this.decoder = next;
    this.logger.info('receiving JSON', { carried: pending.length });

    this.enterJsonSend();
  }

  // ── Send path ────────────────────────────────────────────────

  /**
   * Switch the send side to JSON. The STARTJSON signal itself goes out in
   * the native format, before the encoder is swapped. Returns false when
   * the transport's buffer is full.
   */
  enterJsonSend(): boolean {
    if (this.encoder.format === 'json') return !this.writeBlocked;

    const accepted = this.write(this.encoder.encode(createMessage({ command: STARTJSON })));
    this.encoder = createEncoder('json');
    this.logger.info('sending JSON');
    return accepted;
  }

  /**
   * Serialize and write one message. Returns false when the transport's
   * buffer is full (wait for onDrain), or when the channel is closed.
   */
  send(message: Message): boolean {
    if (this._closed) return false;

    let bytes: Uint8Array;
    try {
      bytes = this.encoder.encode(message);
    } catch (err) {
      if (err instanceof EncodeError) {
        this.logger.warn('encode error, closing', { format: this.encoder.format, reason: err.message });
        this.shutdown({ type: 'encode', error: err });
        return false;
      }
      throw err;
    }
    return this.write(bytes);
  }

  private write(bytes: Uint8Array): boolean {
    if (this._closed) return false;
    this.trace('write', bytes);
    let accepted: boolean;
    try {
      accepted = this.connection.send(bytes);
    } catch (err) {
      const error = err instanceof Error ? err : new TransportFault(String(err));
      this.logger.warn('write failed', { reason: error.message });
      this.shutdown({ type: 'transport', error });
      return false;
    }
    if (!accepted && !this.writeBlocked) {
      this.writeBlocked = true;
      for (const handler of this.backpressureHandlers) handler();
    }
    return accepted;
  }

  // ── Flow control ─────────────────────────────────────────────

  pause(): void {
    this.connection.pause();
  }

  resume(): void {
    this.connection.resume();
  }

  // ── Teardown ─────────────────────────────────────────────────

  /** Flush pending writes and close. Idempotent. */
  close(): void {
    this.shutdown({ type: 'local' });
  }

  private handleTransportClosed(): void {
    if (this._closed) return;
    try {
      this.decoder.end();
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.logger.warn('stream closed mid-message', { format: this.decoder.format, reason: err.message });
      this.shutdown({ type: 'decode', error: err });
      return;
    }
    this.shutdown({ type: 'remote' });
  }

  private shutdown(reason: CloseReason): void {
    if (this._closed) return;
    this._closed = true;
    this.closeReason = reason;
    this.logger.debug('closed', { reason: reason.type });

    this.connection.close();

    const handlers = this.closeHandlers;
    this.closeHandlers = [];
    for (const handler of handlers) {
      handler(reason);
    }
  }

  private trace(direction: 'read' | 'write', data: Uint8Array): void {
    if (!this.sink) return;
    try {
      this.sink.record({
        connectionId: this.connectionId,
        leg: this.leg,
        direction,
        data,
        at: Date.now(),
      });
    } catch (err) {
      this.logger.warn('trace sink failed', { reason: err instanceof Error ? err.message : String(err) });
    }
  }
}
