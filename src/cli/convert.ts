/**
 * Stream conversion between the two wire formats.
 *
 *   printf 'PRIVMSG #chan :hi\r\n' | ircjson-relay convert rfc1459 json
 *   {"tags":{},"source":null,"verb":"privmsg","params":["#chan","hi"]}
 *
 * JSON output gets one value per line so it reads well on a terminal;
 * the JSON decoder does not need the newlines.
 */

import { createDecoder, createEncoder } from '../codec/index.js';
import type { WireFormat } from '../codec/types.js';

const NEWLINE = new Uint8Array([0x0a]);

export interface ConvertResult {
  messages: number;
}

/**
 * Decode `input` in format `from` and write every message in format `to`.
 * Throws DecodeError on malformed input and EncodeError on a message the
 * output format cannot carry; messages before the fault are already written.
 */
export async function convertStream(
  input: AsyncIterable<Uint8Array>,
  write: (chunk: Uint8Array) => void,
  from: WireFormat,
  to: WireFormat,
): Promise<ConvertResult> {
  const decoder = createDecoder(from);
  const encoder = createEncoder(to);
  let messages = 0;

  for await (const chunk of input) {
    decoder.push(chunk);
    for (let message = decoder.next(); message !== null; message = decoder.next()) {
      write(encoder.encode(message));
      if (to === 'json') write(NEWLINE);
      messages++;
    }
  }
  decoder.end();

  return { messages };
}
