import type { Logger } from '../core/logger.js';
import type { TraceSetting } from '../core/relay-config.js';
import { createCaptureSink } from './capture.js';
import { createConsoleSink } from './console-sink.js';
import type { DiagnosticSink } from './types.js';

/** Build the sink a trace setting asks for, or undefined for 'off'. */
export function createSink(setting: TraceSetting, logger: Logger): DiagnosticSink | undefined {
  if (setting === 'off') return undefined;
  if (setting === 'console') return createConsoleSink();
  return createCaptureSink(setting.capture, logger);
}

export { createConsoleSink, formatTraceEvent } from './console-sink.js';
export {
  CaptureReader,
  createCaptureSink,
  encodeCaptureHeader,
  encodeCaptureRecord,
  readCaptureFile,
} from './capture.js';
export type { DiagnosticSink, Leg, TraceDirection, TraceEvent } from './types.js';
