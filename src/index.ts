/**
 * ircjson-relay library entry point.
 *
 *   import { startRelay, createDefaultRegistry, validateRelayConfig, mergeConfigs } from 'ircjson-relay';
 *
 *   const relay = await startRelay(
 *     validateRelayConfig(mergeConfigs({ upstream: 'tcp://irc.example.net:6667' })),
 *     { registry: createDefaultRegistry() },
 *   );
 */

// Message model
export {
  commandsEqual,
  createMessage,
  formatCommand,
  isCommand,
  messageFromValues,
  normalizeCommand,
  tagFlag,
  tagValue,
} from './core/message.js';
export type { Command, Message, MessageInit, TagValue } from './core/message.js';

// Errors
export {
  ConfigError,
  DecodeError,
  EncodeError,
  MessageError,
  TransportFault,
} from './core/errors.js';

// Logging and configuration
export { createLogger, silentLogger } from './core/logger.js';
export type { Logger, LogLevel, LogFields } from './core/logger.js';
export {
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfigFile,
  mergeConfigs,
  parseRelayArgs,
  readEnvConfig,
  resolveRelayConfig,
  validateRelayConfig,
} from './core/relay-config.js';
export type { ParsedCli, RelayConfig, TraceSetting } from './core/relay-config.js';

// Codecs
export * from './codec/index.js';

// Transports
export { parseRelayUri, resolveAddress, RelayUriError, tcpUri } from './core/transport.js';
export type { ParsedRelayUri, TransportAddress, TransportScheme } from './core/transport.js';
export * from './transports/index.js';

// Relay
export { ConnectionChannel, STARTJSON } from './relay/channel.js';
export type { ChannelOptions, CloseReason } from './relay/channel.js';
export { RelayPair } from './relay/relay-pair.js';
export { startRelay } from './relay/server.js';
export type { RelayHandle, StartRelayOptions } from './relay/server.js';

// Diagnostics
export * from './trace/index.js';
export { convertStream } from './cli/convert.js';
