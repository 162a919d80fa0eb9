/**
 * Relay configuration model.
 *
 * Unified configuration for the relay, with merging from multiple
 * sources: defaults → config file → env vars → CLI args.
 *
 * The relay reads this at startup to know:
 *   - Where to accept client connections
 *   - Which upstream server to relay to
 *   - Whether to announce JSON to upstream immediately
 *   - Where to send traffic traces
 *   - TLS settings for either side
 */

import { access, readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isLogLevel, LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import { parseRelayUri, resolveAddress } from './transport.js';
import type { TlsOptions } from './transport-api.js';

// ── Configuration Schema ─────────────────────────────────────────

/** off, a line per chunk on stderr, or a CBOR capture file. */
export type TraceSetting = 'off' | 'console' | { capture: string };

export interface RelayConfig {
  /**
   * URI to accept client connections on.
   *
   * Examples:
   *   "tcp://127.0.0.1:6667"
   *   "unix:///run/ircjson/relay.sock"
   */
  listen: string;

  /** URI of the upstream server. Required to run. */
  upstream?: string;

  /** Send STARTJSON to upstream as soon as the connection opens. */
  startJson: boolean;

  trace: TraceSetting;

  logLevel: LogLevel;

  /** Upstream connect timeout in ms. 0 = no timeout. */
  connectTimeoutMs: number;

  /** TLS configuration for a tls:// listener. */
  tls?: TlsOptions;

  /** TLS configuration for a tls:// upstream. */
  upstreamTls?: TlsOptions;
}

// ── Defaults ─────────────────────────────────────────────────────

export const DEFAULT_CONFIG: RelayConfig = {
  listen: 'tcp://127.0.0.1:6667',
  startJson: false,
  trace: 'off',
  logLevel: 'info',
  connectTimeoutMs: 10_000,
};

// ── Config Merging ───────────────────────────────────────────────

/**
 * Merge configuration from multiple sources, later sources overriding
 * earlier ones. TLS objects are merged field by field.
 */
export function mergeConfigs(...sources: Partial<RelayConfig>[]): RelayConfig {
  let result: RelayConfig = structuredClone(DEFAULT_CONFIG);

  for (const source of sources) {
    result = mergeTwo(result, source);
  }

  return result;
}

function mergeTwo(base: RelayConfig, override: Partial<RelayConfig>): RelayConfig {
  const result = { ...base };

  if (override.listen !== undefined) result.listen = override.listen;
  if (override.upstream !== undefined) result.upstream = override.upstream;
  if (override.startJson !== undefined) result.startJson = override.startJson;
  if (override.trace !== undefined) result.trace = override.trace;
  if (override.logLevel !== undefined) result.logLevel = override.logLevel;
  if (override.connectTimeoutMs !== undefined) result.connectTimeoutMs = override.connectTimeoutMs;

  if (override.tls !== undefined) {
    result.tls = { ...result.tls, ...override.tls };
  }
  if (override.upstreamTls !== undefined) {
    result.upstreamTls = { ...result.upstreamTls, ...override.upstreamTls };
  }

  return result;
}

// ── CLI Argument Parsing ─────────────────────────────────────────

/**
 * Parse CLI arguments into a partial RelayConfig.
 *
 * Recognized flags:
 *   --listen <uri>              Client-facing address
 *   --upstream <uri>            Upstream server address
 *   --start-json                Announce JSON to upstream immediately
 *   --trace                     Print traffic to stderr
 *   --capture <path>            Record traffic to a capture file
 *   --log-level <level>         silent | error | warn | info | debug
 *   --connect-timeout <ms>      Upstream connect timeout
 *   --tls-cert/--tls-key/--tls-ca <path>   Listener TLS files
 *   --upstream-tls-ca <path>    CA for a tls:// upstream
 *   --upstream-tls-insecure     Skip upstream certificate verification
 *   --config <path>             Config file path
 *
 * Anything else is returned in `positional`.
 */
export interface ParsedCli {
  config: Partial<RelayConfig>;
  configFilePath?: string;
  help: boolean;
  positional: string[];
}

export function parseRelayArgs(argv: string[]): ParsedCli {
  const config: Partial<RelayConfig> = {};
  const positional: string[] = [];
  let configFilePath: string | undefined;
  let help = false;

  const value = (i: number, flag: string): string => {
    const next = argv[i];
    if (next === undefined || next.startsWith('--')) {
      throw new ConfigError(`${flag} needs a value`);
    }
    return next;
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    switch (arg) {
      case '--listen':
        config.listen = value(++i, arg);
        break;
      case '--upstream':
        config.upstream = value(++i, arg);
        break;
      case '--start-json':
        config.startJson = true;
        break;
      case '--trace':
        config.trace = 'console';
        break;
      case '--capture':
        config.trace = { capture: value(++i, arg) };
        break;
      case '--log-level':
        config.logLevel = parseLogLevel(value(++i, arg));
        break;
      case '--connect-timeout':
        config.connectTimeoutMs = parseNonNegativeInt(value(++i, arg), arg);
        break;
      case '--tls-cert':
        config.tls = { ...config.tls, cert: value(++i, arg) };
        break;
      case '--tls-key':
        config.tls = { ...config.tls, key: value(++i, arg) };
        break;
      case '--tls-ca':
        config.tls = { ...config.tls, ca: value(++i, arg) };
        break;
      case '--upstream-tls-ca':
        config.upstreamTls = { ...config.upstreamTls, ca: value(++i, arg) };
        break;
      case '--upstream-tls-insecure':
        config.upstreamTls = { ...config.upstreamTls, insecure: true };
        break;
      case '--config':
        configFilePath = value(++i, arg);
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new ConfigError(`Unknown option ${arg}`);
        }
        positional.push(arg);
        break;
    }

    i++;
  }

  return { config, configFilePath, help, positional };
}

function parseLogLevel(raw: string): LogLevel {
  if (!isLogLevel(raw)) {
    throw new ConfigError(`Invalid log level "${raw}", expected one of ${LOG_LEVELS.join(', ')}`);
  }
  return raw;
}

function parseNonNegativeInt(raw: string, what: string): number {
  if (!/^[0-9]+$/.test(raw)) {
    throw new ConfigError(`${what} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

// ── Environment ──────────────────────────────────────────────────

/**
 * Read configuration from IRCJSON_* environment variables:
 *   IRCJSON_LISTEN, IRCJSON_UPSTREAM, IRCJSON_START_JSON (1/true/yes),
 *   IRCJSON_LOG_LEVEL, IRCJSON_TRACE (off | console | path to a capture file)
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<RelayConfig> {
  const config: Partial<RelayConfig> = {};

  const listen = env['IRCJSON_LISTEN'];
  if (listen) config.listen = listen;

  const upstream = env['IRCJSON_UPSTREAM'];
  if (upstream) config.upstream = upstream;

  const startJson = env['IRCJSON_START_JSON'];
  if (startJson) config.startJson = ['1', 'true', 'yes'].includes(startJson.toLowerCase());

  const logLevel = env['IRCJSON_LOG_LEVEL'];
  if (logLevel) config.logLevel = parseLogLevel(logLevel);

  const trace = env['IRCJSON_TRACE'];
  if (trace) {
    config.trace = trace === 'off' || trace === 'console' ? trace : { capture: trace };
  }

  return config;
}

// ── Config File Loading ──────────────────────────────────────────

const TlsSchema = z.object({
  cert: z.string().optional(),
  key: z.string().optional(),
  ca: z.string().optional(),
  insecure: z.boolean().optional(),
}).strict();

const RelayConfigFileSchema = z.object({
  listen: z.string().optional(),
  upstream: z.string().optional(),
  startJson: z.boolean().optional(),
  trace: z.union([
    z.literal('off'),
    z.literal('console'),
    z.object({ capture: z.string() }).strict(),
  ]).optional(),
  logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
  connectTimeoutMs: z.number().int().nonnegative().optional(),
  tls: TlsSchema.optional(),
  upstreamTls: TlsSchema.optional(),
}).strict();

/**
 * Load a partial RelayConfig from a JSON config file.
 * Throws ConfigError when the file cannot be read or is not a valid config.
 */
export async function loadConfigFile(path: string): Promise<Partial<RelayConfig>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = RelayConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    throw new ConfigError(`${path}${where}: ${issue?.message ?? 'invalid config'}`);
  }
  return parsed.data;
}

/**
 * Search for a config file in standard locations.
 *
 * Checks (in order):
 *   1. IRCJSON_CONFIG env var
 *   2. ./ircjson.config.json (current directory)
 *   3. $XDG_CONFIG_HOME/ircjson/config.json
 *
 * Returns the path of the first file found, or undefined.
 */
export async function findConfigFile(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<string | undefined> {
  const candidates: string[] = [];

  const envPath = env['IRCJSON_CONFIG'];
  if (envPath) candidates.push(envPath);

  candidates.push(join(cwd, 'ircjson.config.json'));

  const xdgConfig = env['XDG_CONFIG_HOME'] || join(homedir(), '.config');
  candidates.push(join(xdgConfig, 'ircjson', 'config.json'));

  for (const candidate of candidates) {
    try {
      await access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }

  return undefined;
}

// ── Full Resolution ──────────────────────────────────────────────

/**
 * Resolve the complete configuration from all sources.
 *
 * Merges: defaults → config file → env vars → CLI args
 */
export async function resolveRelayConfig(
  cli: ParsedCli,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RelayConfig> {
  const configPath = cli.configFilePath ?? await findConfigFile(env);
  const fileConfig = configPath ? await loadConfigFile(configPath) : {};

  return mergeConfigs(fileConfig, readEnvConfig(env), cli.config);
}

/**
 * Check that a configuration can run: an upstream is set and both URIs
 * parse. Throws ConfigError or RelayUriError.
 */
export function validateRelayConfig(config: RelayConfig): RelayConfig & { upstream: string } {
  const upstream = config.upstream;
  if (!upstream) {
    throw new ConfigError('No upstream configured (use --upstream or IRCJSON_UPSTREAM)');
  }
  resolveAddress(parseRelayUri(config.listen));
  resolveAddress(parseRelayUri(upstream));
  return { ...config, upstream };
}
