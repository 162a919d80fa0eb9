/**
 * Codec module index.
 *
 * Usage:
 *   const decoder = createDecoder('native');
 *   for (const message of decodeAll(decoder, bytes)) { ... }
 */

import { JsonDecoder, JsonEncoder } from './json-codec.js';
import { LineDecoder, LineEncoder } from './line-codec.js';
import type { MessageDecoder, MessageEncoder, WireFormat } from './types.js';
import type { Message } from '../core/message.js';

export function createDecoder(format: WireFormat): MessageDecoder {
  switch (format) {
    case 'native': return new LineDecoder();
    case 'json': return new JsonDecoder();
  }
}

export function createEncoder(format: WireFormat): MessageEncoder {
  switch (format) {
    case 'native': return new LineEncoder();
    case 'json': return new JsonEncoder();
  }
}

/** Push a chunk and drain every complete message from it. */
export function decodeAll(decoder: MessageDecoder, chunk: Uint8Array): Message[] {
  decoder.push(chunk);
  const messages: Message[] = [];
  for (let message = decoder.next(); message !== null; message = decoder.next()) {
    messages.push(message);
  }
  return messages;
}

/**
 * Map a format name from the command line. `rfc1459` is accepted as the
 * historical name of the native format.
 */
export function parseWireFormat(name: string): WireFormat | undefined {
  switch (name.toLowerCase()) {
    case 'native':
    case 'rfc1459':
    case 'irc':
      return 'native';
    case 'json':
      return 'json';
    default:
      return undefined;
  }
}

export { parseLine, serializeLine, LineDecoder, LineEncoder } from './line-codec.js';
export {
  parseJsonMessage,
  serializeJsonMessage,
  toJsonWireMessage,
  JsonDecoder,
  JsonEncoder,
  JsonMessageSchema,
} from './json-codec.js';
export type { JsonWireMessage } from './json-codec.js';
export type { MessageDecoder, MessageEncoder, WireFormat } from './types.js';
