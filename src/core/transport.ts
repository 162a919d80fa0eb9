/**
 * Relay address URIs.
 *
 * Both the listen side and the upstream side of the relay are named by a
 * URI whose scheme selects the transport:
 *
 *   tcp://host:port           plain TCP
 *   tls://host:port           TCP + TLS
 *   unix:///path/to/socket    Unix domain socket
 *   unix-abstract://name      Linux abstract socket
 */

// ── Transport Schemes ────────────────────────────────────────────

export type TransportScheme =
  | 'tcp'
  | 'tls'
  | 'unix'
  | 'unix-abstract';

const ALL_SCHEMES: ReadonlySet<string> = new Set<TransportScheme>(['tcp', 'tls', 'unix', 'unix-abstract']);

function isTransportScheme(value: string): value is TransportScheme {
  return ALL_SCHEMES.has(value);
}

/**
 * Parsed transport address: varies by scheme.
 */
export type TransportAddress =
  | { type: 'path'; path: string }               // unix
  | { type: 'name'; name: string }               // unix-abstract
  | { type: 'host'; host: string; port: number }; // tcp, tls

// ── Parsed URI ───────────────────────────────────────────────────

export interface ParsedRelayUri {
  scheme: TransportScheme;
  authority: string;
  path: string;
  raw: string;
}

// ── Parser ───────────────────────────────────────────────────────

/**
 * Parse a relay address URI into its components.
 * Throws RelayUriError on a missing or unrecognized scheme.
 */
export function parseRelayUri(uri: string): ParsedRelayUri {
  const raw = uri.trim();

  const schemeEnd = raw.indexOf('://');
  if (schemeEnd === -1) {
    throw new RelayUriError(`Invalid address URI: missing scheme in "${raw}"`);
  }

  const scheme = raw.substring(0, schemeEnd);
  if (!isTransportScheme(scheme)) {
    throw new RelayUriError(`Unknown address scheme: "${scheme}"`);
  }

  const rest = raw.substring(schemeEnd + 3);
  if (rest.includes('?')) {
    // TLS and timeout settings come from the config, not the URI.
    throw new RelayUriError(`Query parameters are not supported in "${raw}"`);
  }

  let authority: string;
  let path = '';
  const slashIdx = rest.indexOf('/');
  if (slashIdx === -1) {
    authority = rest;
  } else {
    authority = rest.substring(0, slashIdx);
    path = rest.substring(slashIdx);
  }

  return { scheme, authority, path: decodeURIComponent(path), raw };
}

// ── Address Resolution ───────────────────────────────────────────

export function resolveAddress(parsed: ParsedRelayUri): TransportAddress {
  switch (parsed.scheme) {
    case 'unix': {
      // unix:///path/to/socket or unix://path (authority as path fallback)
      const path = parsed.path || (parsed.authority ? `/${parsed.authority}` : '');
      if (!path) {
        throw new RelayUriError(`Missing socket path in "${parsed.raw}"`);
      }
      return { type: 'path', path };
    }

    case 'unix-abstract': {
      const name = parsed.authority || parsed.path;
      if (!name) {
        throw new RelayUriError(`Missing socket name in "${parsed.raw}"`);
      }
      return { type: 'name', name };
    }

    case 'tcp':
    case 'tls':
      return parseHostPort(parsed);
  }
}

function parseHostPort(parsed: ParsedRelayUri): TransportAddress {
  const authority = parsed.authority;
  if (!authority) {
    throw new RelayUriError(`Missing host:port in "${parsed.raw}"`);
  }

  // IPv6: [::1]:port
  let host: string;
  let portStr: string;
  if (authority.startsWith('[')) {
    const bracketEnd = authority.indexOf(']');
    if (bracketEnd === -1) {
      throw new RelayUriError(`Malformed IPv6 address in "${parsed.raw}"`);
    }
    host = authority.substring(1, bracketEnd);
    portStr = authority.substring(bracketEnd + 2); // skip ]:
  } else {
    const lastColon = authority.lastIndexOf(':');
    if (lastColon === -1) {
      throw new RelayUriError(`Missing port in "${parsed.raw}"`);
    }
    host = authority.substring(0, lastColon);
    portStr = authority.substring(lastColon + 1);
  }

  const port = /^[0-9]+$/.test(portStr) ? parseInt(portStr, 10) : NaN;
  if (isNaN(port) || port > 65535) {
    throw new RelayUriError(`Invalid port "${portStr}" in "${parsed.raw}"`);
  }

  return { type: 'host', host, port };
}

/** Build a tcp:// URI from a host and port, bracketing IPv6 hosts. */
export function tcpUri(host: string, port: number | string): string {
  const h = host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
  return `tcp://${h}:${port}`;
}

export function describeAddress(address: TransportAddress): string {
  switch (address.type) {
    case 'path': return address.path;
    case 'name': return `@${address.name}`;
    case 'host': return `${address.host}:${address.port}`;
  }
}

// ── Error ────────────────────────────────────────────────────────

export class RelayUriError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RelayUriError';
  }
}
