/**
 * Unit tests for the native line format: parse, serialize and stream framing.
 */

import { describe, it, expect } from 'vitest';
import { LineDecoder, LineEncoder, parseLine, serializeLine } from '../../src/codec/line-codec.js';
import { decodeAll } from '../../src/codec/index.js';
import { createMessage, tagFlag, tagValue } from '../../src/core/message.js';
import type { Message } from '../../src/core/message.js';
import { DecodeError, EncodeError } from '../../src/core/errors.js';

const enc = new TextEncoder();
const dec = new TextDecoder();

describe('parseLine', () => {
  it('parses sender, numeric command and trailing argument', () => {
    const message = parseLine(':irc.example.com 001 nick :Welcome\r\n');
    expect(message.sender).toBe('irc.example.com');
    expect(message.command).toEqual({ kind: 'numeric', code: 1 });
    expect(message.args).toEqual(['nick', 'Welcome']);
    expect(message.tags.size).toBe(0);
  });

  it('parses tags with values and flags', () => {
    const message = parseLine('@Time=12:00;bot;empty= :nick!user@host PRIVMSG #chan :hello world');
    expect(message.tags.get('time')).toEqual(tagValue('12:00'));
    expect(message.tags.get('bot')).toEqual(tagFlag);
    expect(message.tags.get('empty')).toEqual(tagValue(''));
    expect(message.sender).toBe('nick!user@host');
    expect(message.command).toEqual({ kind: 'token', name: 'privmsg' });
    expect(message.args).toEqual(['#chan', 'hello world']);
  });

  it('parses a bare command', () => {
    const message = parseLine('PING');
    expect(message.command).toEqual({ kind: 'token', name: 'ping' });
    expect(message.args).toEqual([]);
    expect(message.sender).toBeUndefined();
  });

  it('collapses repeated spaces between middle arguments', () => {
    expect(parseLine('MODE  #chan   +o  alice').args).toEqual(['#chan', '+o', 'alice']);
  });

  it('keeps an empty trailing argument', () => {
    expect(parseLine('TOPIC #chan :').args).toEqual(['#chan', '']);
  });

  it('keeps colons inside the trailing argument', () => {
    expect(parseLine('PRIVMSG #chan :a :b').args).toEqual(['#chan', 'a :b']);
  });

  it('keeps a one-character sender and drops an empty one', () => {
    expect(parseLine(':x QUIT').sender).toBe('x');
    const message = parseLine(': QUIT');
    expect(message.sender).toBeUndefined();
    expect(message.command).toEqual({ kind: 'token', name: 'quit' });
  });

  it('rejects a line with no command', () => {
    expect(() => parseLine('')).toThrow(DecodeError);
    expect(() => parseLine(':irc.example.com ')).toThrow(DecodeError);
  });

  it('rejects a sender or tag block with nothing after it', () => {
    expect(() => parseLine(':irc.example.com')).toThrow(DecodeError);
    expect(() => parseLine('@a=b')).toThrow(DecodeError);
  });
});

/** The fields both codecs must carry through a round trip. */
function fieldsOf(message: Message) {
  return {
    tags: [...message.tags],
    sender: message.sender,
    command: message.command,
    args: message.args,
  };
}

const LINE_ROUND_TRIPS: Array<[string, Message]> = [
  ['no sender, token command', createMessage({ command: 'ping', args: ['irc.example.net'] })],
  ['sender and numeric command', createMessage({ sender: 'irc.example.net', command: 1, args: ['alice', 'Welcome to the network'] })],
  ['three-digit numeric', createMessage({ command: 433, args: ['*', 'alice', 'Nickname is already in use'] })],
  ['flag and empty-valued tags', createMessage({
    tags: { bot: tagFlag, msgid: tagValue(''), time: tagValue('12:00') },
    sender: 'nick!user@host',
    command: 'privmsg',
    args: ['#chan', 'hi'],
  })],
  ['empty last argument', createMessage({ command: 'topic', args: ['#chan', ''] })],
  ['last argument starting with a colon', createMessage({ command: 'privmsg', args: ['#chan', ':)'] })],
  ['no arguments', createMessage({ command: 'quit' })],
];

describe('line round trip', () => {
  it.each(LINE_ROUND_TRIPS)('%s', (_name, message) => {
    expect(fieldsOf(parseLine(serializeLine(message)))).toEqual(fieldsOf(message));
  });
});

describe('serializeLine', () => {
  it('reproduces a parsed welcome line byte for byte', () => {
    const line = ':irc.example.com 001 nick :Welcome\r\n';
    expect(serializeLine(parseLine(line))).toBe(line);
  });

  it('reproduces tags and sender', () => {
    const line = '@time=12:00;bot :nick!user@host PRIVMSG #chan :hello world\r\n';
    expect(serializeLine(parseLine(line))).toBe(line);
  });

  it('prefixes the last argument only when it needs it', () => {
    expect(serializeLine(createMessage({ command: 'privmsg', args: ['#chan', 'hi'] })))
      .toBe('PRIVMSG #chan hi\r\n');
    expect(serializeLine(createMessage({ command: 'privmsg', args: ['#chan', 'hello world'] })))
      .toBe('PRIVMSG #chan :hello world\r\n');
    expect(serializeLine(createMessage({ command: 'topic', args: ['#chan', ''] })))
      .toBe('TOPIC #chan :\r\n');
    expect(serializeLine(createMessage({ command: 'privmsg', args: ['#chan', ':)'] })))
      .toBe('PRIVMSG #chan ::)\r\n');
  });

  it('pads numerics to three digits', () => {
    expect(serializeLine(createMessage({ command: 5, args: ['nick', 'CHANTYPES=#'] })))
      .toBe('005 nick CHANTYPES=#\r\n');
  });

  it('strips the ctcp_ prefix from tokens', () => {
    expect(serializeLine(createMessage({ command: 'ctcp_version' }))).toBe('VERSION\r\n');
  });

  it('omits an empty sender', () => {
    expect(serializeLine(createMessage({ command: 'ping', sender: '', args: ['x'] })))
      .toBe('PING x\r\n');
  });

  it('writes STARTJSON without arguments', () => {
    expect(serializeLine(createMessage({ command: 'startjson' }))).toBe('STARTJSON\r\n');
  });

  it('rejects a middle argument containing a space', () => {
    const message = createMessage({ command: 'privmsg', args: ['#a b', 'hi'] });
    expect(() => serializeLine(message)).toThrow(EncodeError);
  });

  it('rejects line terminators in arguments', () => {
    const message = createMessage({ command: 'privmsg', args: ['#chan', 'hi\r\nQUIT'] });
    expect(() => serializeLine(message)).toThrow(EncodeError);
  });

  it('rejects a tag value with a space', () => {
    const message = createMessage({ command: 'ping', tags: { k: tagValue('a b') } });
    expect(() => serializeLine(message)).toThrow(EncodeError);
  });
});

describe('LineDecoder', () => {
  it('holds a partial line until its terminator arrives', () => {
    const decoder = new LineDecoder();
    decoder.push(enc.encode('PING :a\r\nPI'));

    expect(decoder.next()?.args).toEqual(['a']);
    expect(decoder.next()).toBeNull();
    expect(decoder.pendingBytes).toBe(2);

    decoder.push(enc.encode('NG :b\r\n'));
    expect(decoder.next()?.args).toEqual(['b']);
    expect(decoder.pendingBytes).toBe(0);
  });

  it('accepts bare LF and skips blank lines', () => {
    const messages = decodeAll(new LineDecoder(), enc.encode('\r\n\nNICK alice\nUSER a 0 * :A\r\n'));
    expect(messages.map((m) => m.args)).toEqual([['alice'], ['a', '0', '*', 'A']]);
  });

  it('returns unconsumed bytes untouched from takePending', () => {
    const decoder = new LineDecoder();
    decoder.push(enc.encode('QUIT\r\n{"verb":"x"}'));
    expect(decoder.next()?.command).toEqual({ kind: 'token', name: 'quit' });
    expect(dec.decode(decoder.takePending())).toBe('{"verb":"x"}');
    expect(decoder.pendingBytes).toBe(0);
  });

  it('decodes a multi-byte character split across chunks', () => {
    const bytes = enc.encode('PRIVMSG #c :café\r\n');
    const cut = bytes.length - 3; // inside the two-byte é
    const decoder = new LineDecoder();
    decoder.push(bytes.subarray(0, cut));
    expect(decoder.next()).toBeNull();
    decoder.push(bytes.subarray(cut));
    expect(decoder.next()?.args).toEqual(['#c', 'café']);
  });

  it('drops an unterminated fragment at end of stream', () => {
    const decoder = new LineDecoder();
    decoder.push(enc.encode('PART #c'));
    expect(() => decoder.end()).not.toThrow();
    expect(decoder.pendingBytes).toBe(0);
  });

  it('yields the same messages however the stream is split', () => {
    const stream = enc.encode('@a=1 :srv 001 me :Hi there\r\nJOIN #x\r\n:me!u@h PRIVMSG #x :ok\r\n');
    const whole = decodeAll(new LineDecoder(), stream);
    expect(whole).toHaveLength(3);

    for (let cut = 1; cut < stream.length; cut++) {
      const decoder = new LineDecoder();
      const parts = [
        ...decodeAll(decoder, stream.subarray(0, cut)),
        ...decodeAll(decoder, stream.subarray(cut)),
      ];
      expect(parts).toEqual(whole);
    }
  });
});

describe('LineEncoder', () => {
  it('encodes to UTF-8 bytes', () => {
    const bytes = new LineEncoder().encode(createMessage({ command: 'privmsg', args: ['#c', 'café ok'] }));
    expect(dec.decode(bytes)).toBe('PRIVMSG #c :café ok\r\n');
  });
});
