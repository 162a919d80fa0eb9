/**
 * Codec interfaces.
 *
 * A decoder is pull-based: push() buffers bytes, next() returns at most one
 * message. The channel drains one message at a time so it can switch
 * formats between two messages and hand the rest of the bytes over via
 * takePending().
 */

import type { Message } from '../core/message.js';

/** The two serializations of the same message stream. */
export type WireFormat = 'native' | 'json';

export interface MessageDecoder {
  readonly format: WireFormat;

  /** Buffer received bytes. Never decodes. */
  push(chunk: Uint8Array): void;

  /**
   * Decode the next complete message, or null when more bytes are needed.
   * Throws DecodeError on malformed input; the offending bytes are consumed.
   */
  next(): Message | null;

  /** Remove and return every byte not yet consumed by next(). */
  takePending(): Uint8Array;

  /** Number of buffered, unconsumed bytes. */
  readonly pendingBytes: number;

  /** Stream closed. Throws DecodeError if a partial message is an error for this format. */
  end(): void;
}

export interface MessageEncoder {
  readonly format: WireFormat;

  /** Serialize one message. Throws EncodeError if it cannot be represented. */
  encode(message: Message): Uint8Array;
}
