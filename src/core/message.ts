/**
 * Format-agnostic message model.
 *
 * A Message is what both wire codecs parse into and serialize from. The
 * native line codec and the JSON codec agree on this shape, which is what
 * lets a relay decode with one and encode with the other.
 */

import { MessageError } from './errors.js';

// ── Tags ─────────────────────────────────────────────────────────

/**
 * A tag is either a key with a string value (possibly empty) or a bare
 * key with no value at all. The two are distinct on the wire: `@a=` vs `@a`.
 */
export type TagValue =
  | { kind: 'value'; value: string }
  | { kind: 'flag' };

export const tagFlag: TagValue = Object.freeze({ kind: 'flag' });

export function tagValue(value: string): TagValue {
  return { kind: 'value', value };
}

// ── Command ──────────────────────────────────────────────────────

/** Numeric reply code in [1, 999], or a lowercase command token. */
export type Command =
  | { kind: 'numeric'; code: number }
  | { kind: 'token'; name: string };

const MIN_NUMERIC = 1;
const MAX_NUMERIC = 999;
const DIGITS = /^[0-9]+$/;

/**
 * Normalize a raw command.
 *
 * Strings made only of digits whose value is in [1, 999] become numeric
 * (`"001"` → 1). Everything else is lowercased and kept as a token, which
 * includes out-of-range numerics such as `"1000"`.
 */
export function normalizeCommand(raw: string | number): Command {
  if (typeof raw === 'number') {
    if (!Number.isInteger(raw)) {
      throw new MessageError(`Command must be an integer or a token, got ${raw}`);
    }
    return normalizeCommand(String(raw));
  }

  if (raw === '') {
    throw new MessageError('Command must not be empty');
  }

  if (DIGITS.test(raw)) {
    const code = parseInt(raw, 10);
    if (code >= MIN_NUMERIC && code <= MAX_NUMERIC) {
      return { kind: 'numeric', code };
    }
  }

  return { kind: 'token', name: raw.toLowerCase() };
}

/** Render a command the way it reads in logs: `001`, `privmsg`. */
export function formatCommand(command: Command): string {
  return command.kind === 'numeric'
    ? String(command.code).padStart(3, '0')
    : command.name;
}

export function commandsEqual(a: Command, b: Command): boolean {
  if (a.kind === 'numeric') return b.kind === 'numeric' && a.code === b.code;
  return b.kind === 'token' && a.name === b.name;
}

// ── Message ──────────────────────────────────────────────────────

export interface Message {
  /** Keys are lowercase. */
  tags: Map<string, TagValue>;
  /** Absent and empty string are different states. */
  sender?: string;
  command: Command;
  /** Only the last element may contain a space on the native wire. */
  args: string[];
  /**
   * Set when the last argument arrived in the ` :trailing` position of a
   * native line, so that re-serializing reproduces the same bytes. A
   * rendering hint only.
   */
  trailing?: boolean;
}

export interface MessageInit {
  tags?: Map<string, TagValue> | Record<string, TagValue>;
  sender?: string;
  command: Command | string | number;
  args?: string[];
  trailing?: boolean;
}

export function createMessage(init: MessageInit): Message {
  const message: Message = {
    tags: normalizeTags(init.tags),
    command: typeof init.command === 'object' ? init.command : normalizeCommand(init.command),
    args: init.args ? [...init.args] : [],
  };
  if (init.sender !== undefined) message.sender = init.sender;
  if (init.trailing) message.trailing = true;
  return message;
}

/**
 * Build a message from a flat list of values.
 *
 * A leading value that starts with `:` is the sender (marker stripped),
 * the next value is the command, the rest are arguments:
 *
 *   messageFromValues([':irc.example.com', '001', 'nick', 'Welcome'])
 */
export function messageFromValues(
  values: string[],
  tags?: Map<string, TagValue> | Record<string, TagValue>,
): Message {
  const rest = [...values];
  let sender: string | undefined;

  if (rest.length > 0 && rest[0].startsWith(':')) {
    sender = rest.shift()?.slice(1);
  }

  const command = rest.shift();
  if (command === undefined) {
    throw new MessageError('Message values must include a command');
  }

  return createMessage({ tags, sender, command, args: rest });
}

function normalizeTags(
  tags: Map<string, TagValue> | Record<string, TagValue> | undefined,
): Map<string, TagValue> {
  const result = new Map<string, TagValue>();
  if (!tags) return result;
  const entries = tags instanceof Map ? tags.entries() : Object.entries(tags);
  for (const [key, value] of entries) {
    result.set(key.toLowerCase(), value);
  }
  return result;
}

/** True when the message's command is the given token (case-insensitive). */
export function isCommand(message: Message, name: string): boolean {
  return message.command.kind === 'token' && message.command.name === name.toLowerCase();
}
