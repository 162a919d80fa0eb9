/**
 * Unit tests for relay address URI parsing.
 */

import { describe, it, expect } from 'vitest';
import {
  describeAddress,
  parseRelayUri,
  RelayUriError,
  resolveAddress,
  tcpUri,
} from '../../src/core/transport.js';
import type { TransportAddress } from '../../src/core/transport.js';

describe('parseRelayUri', () => {
  it('parses tcp:// with host:port', () => {
    const parsed = parseRelayUri('tcp://localhost:6667');
    expect(parsed.scheme).toBe('tcp');
    expect(parsed.authority).toBe('localhost:6667');
    expect(parsed.path).toBe('');
  });

  it('parses tcp:// with IPv6', () => {
    const parsed = parseRelayUri('tcp://[::1]:6667');
    expect(parsed.authority).toBe('[::1]:6667');
  });

  it('parses tls:// with host:port', () => {
    const parsed = parseRelayUri('tls://irc.example.net:6697');
    expect(parsed.scheme).toBe('tls');
    expect(parsed.authority).toBe('irc.example.net:6697');
  });

  it('rejects query parameters', () => {
    expect(() => parseRelayUri('tls://irc.example.net:6697?insecure')).toThrow(
      'Query parameters are not supported in "tls://irc.example.net:6697?insecure"',
    );
  });

  it('parses unix:// with a percent-encoded path', () => {
    const parsed = parseRelayUri('unix:///tmp/my%20relay.sock');
    expect(parsed.scheme).toBe('unix');
    expect(parsed.path).toBe('/tmp/my relay.sock');
  });

  it('parses unix-abstract:// with a name', () => {
    const parsed = parseRelayUri('unix-abstract://ircjson-relay');
    expect(parsed.scheme).toBe('unix-abstract');
    expect(parsed.authority).toBe('ircjson-relay');
  });

  it('trims surrounding whitespace and keeps the raw form', () => {
    expect(parseRelayUri('  tcp://a:1 ').raw).toBe('tcp://a:1');
  });

  it('rejects a missing scheme', () => {
    expect(() => parseRelayUri('localhost:6667')).toThrow(RelayUriError);
  });

  it('rejects an unknown scheme', () => {
    expect(() => parseRelayUri('ws://localhost:6667')).toThrow(/Unknown address scheme/);
  });
});

describe('resolveAddress', () => {
  it('resolves host and port', () => {
    expect(resolveAddress(parseRelayUri('tcp://127.0.0.1:6667')))
      .toEqual({ type: 'host', host: '127.0.0.1', port: 6667 });
  });

  it('strips IPv6 brackets', () => {
    expect(resolveAddress(parseRelayUri('tls://[::1]:6697')))
      .toEqual({ type: 'host', host: '::1', port: 6697 });
  });

  it('resolves unix paths, including the authority fallback', () => {
    expect(resolveAddress(parseRelayUri('unix:///run/relay.sock')))
      .toEqual({ type: 'path', path: '/run/relay.sock' });
    expect(resolveAddress(parseRelayUri('unix://relay.sock')))
      .toEqual({ type: 'path', path: '/relay.sock' });
  });

  it('resolves abstract socket names', () => {
    expect(resolveAddress(parseRelayUri('unix-abstract://relay')))
      .toEqual({ type: 'name', name: 'relay' });
  });

  it('rejects a missing or invalid port', () => {
    expect(() => resolveAddress(parseRelayUri('tcp://localhost'))).toThrow(RelayUriError);
    expect(() => resolveAddress(parseRelayUri('tcp://localhost:http'))).toThrow(/Invalid port/);
    expect(() => resolveAddress(parseRelayUri('tcp://localhost:70000'))).toThrow(/Invalid port/);
  });

  it('rejects an empty unix path', () => {
    expect(() => resolveAddress(parseRelayUri('unix://'))).toThrow(/Missing socket path/);
  });
});

describe('tcpUri / describeAddress', () => {
  it('brackets IPv6 hosts', () => {
    expect(tcpUri('::1', 6667)).toBe('tcp://[::1]:6667');
    expect(tcpUri('localhost', '6667')).toBe('tcp://localhost:6667');
  });

  it('describes each address type', () => {
    const cases: Array<[TransportAddress, string]> = [
      [{ type: 'host', host: '0.0.0.0', port: 6667 }, '0.0.0.0:6667'],
      [{ type: 'path', path: '/run/relay.sock' }, '/run/relay.sock'],
      [{ type: 'name', name: 'relay' }, '@relay'],
    ];
    for (const [address, text] of cases) {
      expect(describeAddress(address)).toBe(text);
    }
  });
});
