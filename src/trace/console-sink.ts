import type { DiagnosticSink, TraceEvent } from './types.js';

const textDecoder = new TextDecoder('utf-8');

/**
 * Format a trace event as one line:
 *
 *   [3] C >> "NICK alice\r\n"
 *
 * C is the client (downstream) leg, S the server (upstream) leg. `>>` is
 * bytes read by the relay, `<<` bytes written.
 */
export function formatTraceEvent(event: TraceEvent): string {
  const side = event.leg === 'downstream' ? 'C' : 'S';
  const arrow = event.direction === 'read' ? '>>' : '<<';
  return `[${event.connectionId}] ${side} ${arrow} ${JSON.stringify(textDecoder.decode(event.data))}`;
}

export function createConsoleSink(
  write: (line: string) => void = (line) => console.error(line),
): DiagnosticSink {
  return {
    record(event) {
      write(formatTraceEvent(event));
    },
  };
}
