/**
 * Command dispatch for the ircjson-relay CLI.
 *
 * Usage:
 *   ircjson-relay simple <listen-host> <listen-port> <connect-host> <connect-port>
 *   ircjson-relay startjson <listen-host> <listen-port> <connect-host> <connect-port>
 *   ircjson-relay relay --listen tcp://0.0.0.0:6667 --upstream tls://irc.example.net:6697
 *   ircjson-relay convert rfc1459 json < session.txt
 *   ircjson-relay inspect relay.capture
 *
 * Everything process-specific comes in through CliIO so tests can drive it.
 */

import { ConfigError, DecodeError, EncodeError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import {
  parseRelayArgs,
  resolveRelayConfig,
  validateRelayConfig,
} from '../core/relay-config.js';
import type { ParsedCli } from '../core/relay-config.js';
import type { TransportRegistry } from '../core/transport-registry.js';
import { RelayUriError, tcpUri } from '../core/transport.js';
import { parseWireFormat } from '../codec/index.js';
import { startRelay } from '../relay/server.js';
import type { RelayHandle } from '../relay/server.js';
import { createSink, formatTraceEvent, readCaptureFile } from '../trace/index.js';
import { convertStream } from './convert.js';

export interface CliIO {
  stdin: AsyncIterable<Uint8Array>;
  stdout: (chunk: Uint8Array | string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  /** Resolves when the process is asked to stop (SIGINT, SIGTERM). */
  waitForStop: () => Promise<void>;
  createRegistry: () => TransportRegistry;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const HELP = `
ircjson-relay: IRC relay with a STARTJSON switch to JSON framing

Usage:
  ircjson-relay simple <listen-host> <listen-port> <connect-host> <connect-port> [options]
  ircjson-relay startjson <listen-host> <listen-port> <connect-host> <connect-port> [options]
  ircjson-relay relay [options]
  ircjson-relay convert <from> <to>        Read stdin, write stdout (formats: rfc1459, json)
  ircjson-relay inspect <capture-file>     Print a trace capture
  ircjson-relay help

Options:
  --listen <uri>              Client-facing address (tcp://, tls://, unix://, unix-abstract://)
  --upstream <uri>            Upstream server address
  --start-json                Send STARTJSON to upstream on connect
  --trace                     Print relayed bytes to stderr
  --capture <path>            Record relayed bytes to a capture file
  --log-level <level>         silent | error | warn | info | debug
  --connect-timeout <ms>      Upstream connect timeout (0 = none)
  --tls-cert/--tls-key/--tls-ca <path>   Certificates for a tls:// listener
  --upstream-tls-ca <path>    CA for a tls:// upstream
  --upstream-tls-insecure     Do not verify the upstream certificate
  --config <path>             Config file (default: ./ircjson.config.json)

Environment:
  IRCJSON_LISTEN, IRCJSON_UPSTREAM, IRCJSON_START_JSON, IRCJSON_LOG_LEVEL,
  IRCJSON_TRACE, IRCJSON_CONFIG
`;

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case undefined:
      case 'help':
      case '--help':
      case '-h':
        io.stdout(HELP);
        return EXIT_OK;

      case 'simple':
      case 'startjson':
        return await runPositional(command === 'startjson', rest, io);

      case 'relay':
        return await runConfigured(rest, io);

      case 'convert':
        return await runConvert(rest, io);

      case 'inspect':
        return await runInspect(rest, io);

      default:
        io.stderr(`Unknown command "${command}". Run "ircjson-relay help".`);
        return EXIT_USAGE;
    }
  } catch (err) {
    if (err instanceof ConfigError || err instanceof RelayUriError) {
      io.stderr(`error: ${err.message}`);
      return EXIT_USAGE;
    }
    if (err instanceof DecodeError || err instanceof EncodeError) {
      io.stderr(`error: ${err.message}`);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

// ── Relay ────────────────────────────────────────────────────────

async function runPositional(startJson: boolean, args: string[], io: CliIO): Promise<number> {
  const cli = parseRelayArgs(args);
  if (cli.help) {
    io.stdout(HELP);
    return EXIT_OK;
  }
  const [listenHost, listenPort, connectHost, connectPort, ...extra] = cli.positional;
  if (connectPort === undefined || listenHost === undefined || listenPort === undefined
    || connectHost === undefined || extra.length > 0) {
    throw new ConfigError('Expected <listen-host> <listen-port> <connect-host> <connect-port>');
  }

  cli.config = {
    ...cli.config,
    listen: tcpUri(listenHost, listenPort),
    upstream: tcpUri(connectHost, connectPort),
    startJson: startJson || cli.config.startJson,
  };
  return serve(cli, io);
}

async function runConfigured(args: string[], io: CliIO): Promise<number> {
  const cli = parseRelayArgs(args);
  if (cli.help) {
    io.stdout(HELP);
    return EXIT_OK;
  }
  if (cli.positional.length > 0) {
    throw new ConfigError(`Unexpected argument "${cli.positional[0]}"`);
  }
  return serve(cli, io);
}

async function serve(cli: ParsedCli, io: CliIO): Promise<number> {
  const config = validateRelayConfig(await resolveRelayConfig(cli, io.env));
  const logger = createLogger(config.logLevel, 'relay', io.stderr);
  const sink = createSink(config.trace, logger);

  let relay: RelayHandle;
  try {
    relay = await startRelay(config, {
      registry: io.createRegistry(),
      logger,
      sink,
    });
  } catch (err) {
    await sink?.close?.();
    throw err;
  }

  await io.waitForStop();
  logger.info('shutting down', { active: relay.activePairs });
  await relay.close();
  return EXIT_OK;
}

// ── Offline tools ────────────────────────────────────────────────

async function runConvert(args: string[], io: CliIO): Promise<number> {
  const [fromName, toName, ...extra] = args;
  if (fromName === undefined || toName === undefined || extra.length > 0) {
    throw new ConfigError('Expected convert <from> <to>');
  }
  const from = parseWireFormat(fromName);
  const to = parseWireFormat(toName);
  if (!from) throw new ConfigError(`Unknown format "${fromName}"`);
  if (!to) throw new ConfigError(`Unknown format "${toName}"`);

  await convertStream(io.stdin, io.stdout, from, to);
  return EXIT_OK;
}

async function runInspect(args: string[], io: CliIO): Promise<number> {
  const [path, ...extra] = args;
  if (path === undefined || extra.length > 0) {
    throw new ConfigError('Expected inspect <capture-file>');
  }
  for (const event of await readCaptureFile(path)) {
    io.stdout(`${formatTraceEvent(event)}\n`);
  }
  return EXIT_OK;
}
