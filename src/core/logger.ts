/**
 * Leveled logger writing one line per entry to stderr.
 *
 *   [relay] info: listening address=0.0.0.0:6667
 *   [relay:3] warn: decode error, closing leg=downstream reason="Line has no command"
 *
 * stdout is left alone so the convert command can stream its output there.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export type LogFields = Record<string, string | number | boolean | undefined>;

export interface Logger {
  readonly level: LogLevel;
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  /** A logger with the same level and output, scoped `parent:scope`. */
  child(scope: string): Logger;
}

export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => console.error(line);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(
  level: LogLevel = 'info',
  scope = 'relay',
  write: LogWriter = stderrWriter,
): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields) => {
    if (RANK[at] > RANK[level]) return;
    write(`[${scope}] ${at}: ${message}${formatFields(fields)}`);
  };

  return {
    level,
    error: (message, fields) => emit('error', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    info: (message, fields) => emit('info', message, fields),
    debug: (message, fields) => emit('debug', message, fields),
    child: (child) => createLogger(level, `${scope}:${child}`, write),
  };
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  let out = '';
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    out += /[\s"=]/.test(text) || text === '' ? ` ${key}=${JSON.stringify(text)}` : ` ${key}=${text}`;
  }
  return out;
}

/** A logger that discards everything. */
export const silentLogger: Logger = createLogger('silent');
