/**
 * Trace capture files.
 *
 * A capture is a 5-byte header followed by length-prefixed CBOR records:
 *
 * ┌──────────┬─────────┬─────────────┬──────────────┬─────────────┬──────────────┬───
 * │ magic    │ version │ length      │ CBOR record  │ length      │ CBOR record  │ …
 * │ "IJTR"   │ 1 byte  │ 4 bytes LE  │ variable     │ 4 bytes LE  │ variable     │
 * └──────────┴─────────┴─────────────┴──────────────┴─────────────┴──────────────┴───
 *
 * Each record is a CBOR map {id, leg, dir, at, data} with `data` as a CBOR
 * byte string, so the bytes are preserved exactly, including invalid UTF-8.
 */

import { createWriteStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import type { WriteStream } from 'node:fs';
import { encode, decode } from 'cborg';
import { z } from 'zod';
import { DecodeError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { DiagnosticSink, TraceEvent } from './types.js';

export const CAPTURE_MAGIC = new Uint8Array([0x49, 0x4a, 0x54, 0x52]); // "IJTR"
export const CAPTURE_VERSION = 1;
const HEADER_SIZE = CAPTURE_MAGIC.length + 1;
const LENGTH_SIZE = 4;

const CaptureRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  leg: z.enum(['downstream', 'upstream']),
  dir: z.enum(['read', 'write']),
  at: z.number(),
  data: z.instanceof(Uint8Array),
});

// ── Encoding ─────────────────────────────────────────────────────

export function encodeCaptureHeader(): Uint8Array {
  const header = new Uint8Array(HEADER_SIZE);
  header.set(CAPTURE_MAGIC, 0);
  header[CAPTURE_MAGIC.length] = CAPTURE_VERSION;
  return header;
}

/** Encode one event as a length-prefixed CBOR record. */
export function encodeCaptureRecord(event: TraceEvent): Uint8Array {
  const payload = encode({
    id: event.connectionId,
    leg: event.leg,
    dir: event.direction,
    at: event.at,
    data: event.data,
  });
  const frame = new Uint8Array(LENGTH_SIZE + payload.length);
  new DataView(frame.buffer).setUint32(0, payload.length, true);
  frame.set(payload, LENGTH_SIZE);
  return frame;
}

// ── Decoding ─────────────────────────────────────────────────────

/**
 * Stream reader for capture bytes. Handles partial reads; the header is
 * checked once, before the first record.
 */
export class CaptureReader {
  private buffer: Uint8Array = new Uint8Array(0);
  private headerSeen = false;

  /** Feed bytes into the reader. Returns any complete records. */
  feed(data: Uint8Array): TraceEvent[] {
    const combined = new Uint8Array(this.buffer.length + data.length);
    combined.set(this.buffer, 0);
    combined.set(data, this.buffer.length);
    this.buffer = combined;

    if (!this.headerSeen) {
      if (this.buffer.length < HEADER_SIZE) return [];
      for (let i = 0; i < CAPTURE_MAGIC.length; i++) {
        if (this.buffer[i] !== CAPTURE_MAGIC[i]) {
          throw new DecodeError('Not a trace capture (bad magic)');
        }
      }
      const version = this.buffer[CAPTURE_MAGIC.length];
      if (version !== CAPTURE_VERSION) {
        throw new DecodeError(`Unsupported capture version ${version}`);
      }
      this.buffer = this.buffer.slice(HEADER_SIZE);
      this.headerSeen = true;
    }

    const events: TraceEvent[] = [];
    while (this.buffer.length >= LENGTH_SIZE) {
      const view = new DataView(this.buffer.buffer, this.buffer.byteOffset, this.buffer.byteLength);
      const length = view.getUint32(0, true);
      const total = LENGTH_SIZE + length;
      if (this.buffer.length < total) break; // need more data

      events.push(decodeRecord(this.buffer.slice(LENGTH_SIZE, total)));
      this.buffer = this.buffer.slice(total);
    }
    return events;
  }

  /** How many bytes are buffered but not yet forming a complete record. */
  get pendingBytes(): number {
    return this.buffer.length;
  }
}

function decodeRecord(payload: Uint8Array): TraceEvent {
  let raw: unknown;
  try {
    raw = decode(payload);
  } catch (err) {
    throw new DecodeError(`Malformed capture record: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = CaptureRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError(`Malformed capture record: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }
  const record = parsed.data;
  return {
    connectionId: record.id,
    leg: record.leg,
    direction: record.dir,
    at: record.at,
    data: record.data,
  };
}

export async function readCaptureFile(path: string): Promise<TraceEvent[]> {
  const reader = new CaptureReader();
  const events = reader.feed(await readFile(path));
  if (reader.pendingBytes > 0) {
    throw new DecodeError(`Capture ${path} ends with a truncated record`);
  }
  return events;
}

// ── Sink ─────────────────────────────────────────────────────────

/**
 * A sink that appends every event to a capture file. Write failures are
 * logged once and the sink stops recording; the relay keeps running.
 */
export function createCaptureSink(path: string, logger: Logger): DiagnosticSink {
  let stream: WriteStream | null = createWriteStream(path, { flags: 'w' });
  stream.on('error', (err) => {
    logger.warn('trace capture disabled', { path, reason: err.message });
    stream = null;
  });
  stream.write(encodeCaptureHeader());

  return {
    record(event) {
      stream?.write(encodeCaptureRecord(event));
    },
    async close() {
      const current = stream;
      stream = null;
      if (!current) return;
      await new Promise<void>((resolve) => current.end(() => resolve()));
    },
  };
}
