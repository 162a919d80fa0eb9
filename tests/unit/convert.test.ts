import { describe, it, expect } from 'vitest';
import { convertStream } from '../../src/cli/convert.js';
import { DecodeError } from '../../src/core/errors.js';

const enc = new TextEncoder();
const dec = new TextDecoder();

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield enc.encode(part);
}

function collector(): { write: (chunk: Uint8Array) => void; text: () => string } {
  const out: string[] = [];
  return { write: (chunk) => out.push(dec.decode(chunk)), text: () => out.join('') };
}

describe('convertStream', () => {
  it('converts native lines to newline-separated JSON', async () => {
    const out = collector();
    const result = await convertStream(chunks('PRIVMSG #chan :hi\r\nJO', 'IN #a\r\n'), out.write, 'native', 'json');

    expect(result.messages).toBe(2);
    expect(out.text()).toBe(
      '{"tags":{},"source":null,"verb":"privmsg","params":["#chan","hi"]}\n'
      + '{"tags":{},"source":null,"verb":"join","params":["#a"]}\n',
    );
  });

  it('converts JSON to native lines', async () => {
    const out = collector();
    await convertStream(
      chunks('{"verb":"privmsg","params":["#chan","hello world"]}\n{"verb":1,"source":"srv","params":["me","Welcome"]}'),
      out.write,
      'json',
      'native',
    );
    expect(out.text()).toBe('PRIVMSG #chan :hello world\r\n:srv 001 me Welcome\r\n');
  });

  it('normalizes native input written back as native', async () => {
    const out = collector();
    await convertStream(chunks('privmsg #chan :hi\n\n'), out.write, 'native', 'native');
    expect(out.text()).toBe('PRIVMSG #chan :hi\r\n');
  });

  it('writes the messages before a malformed one, then fails', async () => {
    const out = collector();
    await expect(
      convertStream(chunks('{"verb":"ping"}', 'not json'), out.write, 'json', 'native'),
    ).rejects.toThrow(DecodeError);
    expect(out.text()).toBe('PING\r\n');
  });

  it('fails on input that ends inside a JSON value', async () => {
    const out = collector();
    await expect(convertStream(chunks('{"verb":'), out.write, 'json', 'native')).rejects.toThrow(/ended inside/);
  });
});
