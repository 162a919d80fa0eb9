/**
 * JSON wire format.
 *
 *   {"tags": {...}, "source": <string|null>, "verb": <string|int>, "params": [<string>, ...]}
 *
 * Values are concatenable: the decoder accepts objects back-to-back with no
 * separator, or separated by whitespace, and does not rely on newlines.
 * Tag flags (keys without a value) are encoded as `true`.
 */

import { z } from 'zod';
import { DecodeError, excerpt } from '../core/errors.js';
import { normalizeCommand, tagFlag, tagValue } from '../core/message.js';
import type { Message, TagValue } from '../core/message.js';
import { ByteBuffer } from './byte-buffer.js';
import type { MessageDecoder, MessageEncoder } from './types.js';

// ── Schema ───────────────────────────────────────────────────────

export const JsonMessageSchema = z.object({
  tags: z.record(z.union([z.string(), z.literal(true)])).nullish(),
  source: z.string().nullish(),
  verb: z.union([z.string().min(1), z.number().int()]),
  params: z.array(z.string()).nullish(),
});

/** The object shape written on the wire. */
export interface JsonWireMessage {
  tags: Record<string, string | true>;
  source: string | null;
  verb: string | number;
  params: string[];
}

// ── Parse / serialize ────────────────────────────────────────────

/** Convert an already-parsed JSON value into a message. */
export function parseJsonMessage(value: unknown): Message {
  const result = JsonMessageSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DecodeError(`Invalid JSON message${where}: ${issue?.message ?? 'unknown shape'}`);
  }

  const data = result.data;
  const tags = new Map<string, TagValue>();
  for (const [key, raw] of Object.entries(data.tags ?? {})) {
    tags.set(key.toLowerCase(), raw === true ? tagFlag : tagValue(raw));
  }

  const message: Message = {
    tags,
    command: normalizeCommand(data.verb),
    args: data.params ?? [],
  };
  if (data.source !== null && data.source !== undefined) {
    message.sender = data.source;
  }
  return message;
}

export function toJsonWireMessage(message: Message): JsonWireMessage {
  const tags = Object.fromEntries(
    [...message.tags].map(([key, value]): [string, string | true] =>
      [key, value.kind === 'flag' ? true : value.value]),
  );
  return {
    tags,
    source: message.sender ?? null,
    verb: message.command.kind === 'numeric' ? message.command.code : message.command.name,
    params: [...message.args],
  };
}

export function serializeJsonMessage(message: Message): string {
  return JSON.stringify(toJsonWireMessage(message));
}

// ── Incremental decoder ──────────────────────────────────────────

const OPEN_BRACE = 0x7b;   // {
const CLOSE_BRACE = 0x7d;  // }
const OPEN_BRACKET = 0x5b; // [
const CLOSE_BRACKET = 0x5d; // ]
const QUOTE = 0x22;        // "
const BACKSLASH = 0x5c;    // \

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

/**
 * Splits a byte stream into top-level JSON objects.
 *
 * The scanner tracks nesting depth and string/escape state across pushes,
 * resuming where the previous call stopped, so a value split over many
 * chunks is scanned once. Complete values are handed to JSON.parse.
 */
export class JsonDecoder implements MessageDecoder {
  readonly format = 'json' as const;
  private buffer = new ByteBuffer();
  private textDecoder = new TextDecoder('utf-8');

  private inValue = false;
  private scanned = 0;
  private depth = 0;
  private inString = false;
  private escaped = false;

  push(chunk: Uint8Array): void {
    this.buffer.append(chunk);
  }

  next(): Message | null {
    if (!this.inValue) {
      let lead = 0;
      while (lead < this.buffer.length && isWhitespace(this.buffer.at(lead))) lead++;
      this.buffer.skip(lead);
      if (this.buffer.length === 0) return null;

      if (this.buffer.at(0) !== OPEN_BRACE) {
        const rejected = this.textDecoder.decode(this.buffer.takeAll());
        throw new DecodeError('Expected a JSON object', excerpt(rejected));
      }
      this.inValue = true;
      this.scanned = 0;
      this.depth = 0;
    }

    const end = this.scan();
    if (end === -1) return null;

    const text = this.textDecoder.decode(this.buffer.take(end + 1));
    this.resetScan();

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DecodeError(`Malformed JSON value: ${reason}`, excerpt(text));
    }
    return parseJsonMessage(value);
  }

  /** Advance the scanner; returns the offset of the closing brace or -1. */
  private scan(): number {
    const length = this.buffer.length;
    for (let i = this.scanned; i < length; i++) {
      const byte = this.buffer.at(i);

      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (byte === BACKSLASH) {
          this.escaped = true;
        } else if (byte === QUOTE) {
          this.inString = false;
        }
        continue;
      }

      if (byte === QUOTE) {
        this.inString = true;
      } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
        this.depth++;
      } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
        this.depth--;
        if (this.depth === 0) {
          return i;
        }
      }
    }
    this.scanned = length;
    return -1;
  }

  private resetScan(): void {
    this.inValue = false;
    this.scanned = 0;
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
  }

  takePending(): Uint8Array {
    this.resetScan();
    return this.buffer.takeAll();
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  end(): void {
    const rest = this.takePending();
    if (rest.some((byte) => !isWhitespace(byte))) {
      throw new DecodeError(
        'Stream ended inside a JSON value',
        excerpt(this.textDecoder.decode(rest)),
      );
    }
  }
}

// ── Encoder ──────────────────────────────────────────────────────

export class JsonEncoder implements MessageEncoder {
  readonly format = 'json' as const;
  private textEncoder = new TextEncoder();

  encode(message: Message): Uint8Array {
    return this.textEncoder.encode(serializeJsonMessage(message));
  }
}
