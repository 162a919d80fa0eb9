/**
 * Native wire format: CR LF terminated lines.
 *
 *   [@tag1=val1;tag2 ][:sender ]COMMAND[ param1 ...][ :last param with spaces]\r\n
 *
 * parseLine/serializeLine work on one line of text. LineDecoder frames an
 * arbitrary byte stream into lines and hands back one message at a time,
 * so a caller can stop between messages and take the unconsumed bytes.
 */

import { DecodeError, EncodeError, excerpt } from '../core/errors.js';
import { normalizeCommand, tagFlag, tagValue } from '../core/message.js';
import type { Message, TagValue } from '../core/message.js';
import { ByteBuffer } from './byte-buffer.js';
import type { MessageDecoder, MessageEncoder } from './types.js';

const LF = 0x0a;
const CR = 0x0d;
const CTCP_PREFIX = 'ctcp_';
const FORBIDDEN = /[\r\n\0]/;

// ── Parse ────────────────────────────────────────────────────────

/** Parse one line (with or without its terminator) into a message. */
export function parseLine(raw: string): Message {
  let line = raw;
  if (line.endsWith('\n')) line = line.slice(0, -1);
  if (line.endsWith('\r')) line = line.slice(0, -1);

  const tags = new Map<string, TagValue>();
  let sender: string | undefined;

  // 1. Tag block
  if (line.startsWith('@')) {
    const space = line.indexOf(' ');
    if (space === -1) {
      throw new DecodeError('Tag block is not followed by a command', excerpt(raw));
    }
    for (const segment of line.slice(1, space).split(';')) {
      if (segment === '') continue;
      const eq = segment.indexOf('=');
      if (eq === -1) {
        tags.set(segment.toLowerCase(), tagFlag);
      } else {
        tags.set(segment.slice(0, eq).toLowerCase(), tagValue(segment.slice(eq + 1)));
      }
    }
    line = line.slice(space + 1);
  }

  // 2. Sender
  if (line.startsWith(':')) {
    const match = /^:(\S*) +/.exec(line);
    if (!match) {
      throw new DecodeError('Sender is not followed by a command', excerpt(raw));
    }
    if (match[1] !== '') {
      sender = match[1];
    }
    line = line.slice(match[0].length);
  }

  // 3. Command and params
  const split = line.indexOf(' :');
  const head = split === -1 ? line : line.slice(0, split);
  const tokens = head.split(' ').filter((token) => token !== '');

  const command = tokens.shift();
  if (command === undefined) {
    throw new DecodeError('Line has no command', excerpt(raw));
  }

  const args = tokens;
  let trailing = false;
  if (split !== -1) {
    args.push(line.slice(split + 2));
    trailing = true;
  }

  const message: Message = { tags, command: normalizeCommand(command), args };
  if (sender !== undefined) message.sender = sender;
  if (trailing) message.trailing = true;
  return message;
}

// ── Serialize ────────────────────────────────────────────────────

/** Render a message as one native line, CR LF included. */
export function serializeLine(message: Message): string {
  let out = '';

  if (message.tags.size > 0) {
    const parts: string[] = [];
    for (const [key, value] of message.tags) {
      if (key === '' || /[\s;=]/.test(key) || FORBIDDEN.test(key)) {
        throw new EncodeError(`Tag key ${JSON.stringify(key)} cannot be serialized`);
      }
      if (value.kind === 'flag') {
        parts.push(key);
      } else {
        if (/[\s;]/.test(value.value) || FORBIDDEN.test(value.value)) {
          throw new EncodeError(`Tag ${key} has a value that cannot be serialized`);
        }
        parts.push(`${key}=${value.value}`);
      }
    }
    out += `@${parts.join(';')} `;
  }

  if (message.sender) {
    if (/\s/.test(message.sender) || FORBIDDEN.test(message.sender)) {
      throw new EncodeError(`Sender ${JSON.stringify(message.sender)} cannot be serialized`);
    }
    out += `:${message.sender} `;
  }

  out += renderCommand(message);

  const args = message.args;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (FORBIDDEN.test(arg)) {
      throw new EncodeError(`Argument ${i} contains a line terminator or NUL`);
    }
    const last = i === args.length - 1;
    if (last) {
      const needsColon = message.trailing === true ||
        arg === '' || arg.includes(' ') || arg.startsWith(':');
      out += needsColon ? ` :${arg}` : ` ${arg}`;
    } else {
      if (arg === '' || arg.includes(' ') || arg.startsWith(':')) {
        throw new EncodeError(`Argument ${i} is not the last one and cannot be empty, contain a space or start with ':'`);
      }
      out += ` ${arg}`;
    }
  }

  return `${out}\r\n`;
}

function renderCommand(message: Message): string {
  const command = message.command;
  if (command.kind === 'numeric') {
    if (!Number.isInteger(command.code) || command.code < 1 || command.code > 999) {
      throw new EncodeError(`Numeric command ${command.code} is outside 1..999`);
    }
    return String(command.code).padStart(3, '0');
  }

  const name = command.name.startsWith(CTCP_PREFIX)
    ? command.name.slice(CTCP_PREFIX.length)
    : command.name;
  if (name === '' || /\s/.test(name) || FORBIDDEN.test(name) || name.startsWith(':') || name.startsWith('@')) {
    throw new EncodeError(`Command ${JSON.stringify(command.name)} cannot be serialized`);
  }
  return name.toUpperCase();
}

// ── Incremental decoder ──────────────────────────────────────────

/**
 * Frames a byte stream into lines. Bytes are kept undecoded until a full
 * line is available, so a multi-byte character split across chunks is
 * never mangled and takePending() returns the exact bytes received.
 */
export class LineDecoder implements MessageDecoder {
  readonly format = 'native' as const;
  private buffer = new ByteBuffer();
  private textDecoder = new TextDecoder('utf-8');

  push(chunk: Uint8Array): void {
    this.buffer.append(chunk);
  }

  next(): Message | null {
    for (;;) {
      const end = this.buffer.indexOf(LF);
      if (end === -1) return null;

      let bytes = this.buffer.take(end + 1).subarray(0, end);
      if (bytes.length > 0 && bytes[bytes.length - 1] === CR) {
        bytes = bytes.subarray(0, bytes.length - 1);
      }

      // Blank lines carry no message.
      if (bytes.length === 0) continue;

      return parseLine(this.textDecoder.decode(bytes));
    }
  }

  takePending(): Uint8Array {
    return this.buffer.takeAll();
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  end(): void {
    // An unterminated fragment at close is not a message; drop it.
    this.buffer.takeAll();
  }
}

// ── Encoder ──────────────────────────────────────────────────────

export class LineEncoder implements MessageEncoder {
  readonly format = 'native' as const;
  private textEncoder = new TextEncoder();

  encode(message: Message): Uint8Array {
    return this.textEncoder.encode(serializeLine(message));
  }
}
