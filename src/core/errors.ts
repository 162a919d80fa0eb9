/**
 * Error types shared by the codecs, channels and transports.
 *
 * Each failure class maps to one teardown policy in the relay:
 *   DecodeError    → close the connection that sent the bytes
 *   EncodeError    → close the connection instead of writing the message
 *   TransportFault → tear down the affected pair
 */

/** Malformed native line, or malformed/unterminated JSON value. */
export class DecodeError extends Error {
  constructor(
    message: string,
    /** The offending input, truncated for logging. */
    readonly input?: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

/** A message that the active serializer cannot represent. */
export class EncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodeError';
  }
}

/** Socket-level error or reset on an underlying connection. */
export class TransportFault extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'TransportFault';
  }
}

/** Invalid message construction (e.g. an empty command). */
export class MessageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MessageError';
  }
}

/** Invalid relay configuration, from a file, the environment or argv. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Truncate an input fragment for inclusion in an error or log line. */
export function excerpt(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
