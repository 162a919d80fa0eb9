/**
 * Diagnostic trace events: the raw bytes read and written on each leg of
 * each relayed connection. Sinks observe traffic only; nothing they do
 * feeds back into the relay.
 */

/** downstream = client-facing leg, upstream = server-facing leg. */
export type Leg = 'downstream' | 'upstream';

export type TraceDirection = 'read' | 'write';

export interface TraceEvent {
  /** Sequential id of the relayed connection (one per accepted client). */
  connectionId: number;
  leg: Leg;
  direction: TraceDirection;
  data: Uint8Array;
  /** Epoch milliseconds. */
  at: number;
}

export interface DiagnosticSink {
  record(event: TraceEvent): void;
  /** Flush and release resources. */
  close?(): Promise<void>;
}
