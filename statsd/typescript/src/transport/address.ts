/**
 * Collector address parsing
 */

import { ConfigurationError } from '../errors';

/**
 * Host and port of a collector
 */
export interface CollectorAddress {
  host: string;
  port: number;
}

/**
 * Parse `host:port`, or `[ipv6]:port`, into its parts
 *
 * @throws ConfigurationError if the address is malformed
 */
export function parseAddress(address: string): CollectorAddress {
  const trimmed = address.trim();
  let host: string;
  let portText: string;

  if (trimmed.startsWith('[')) {
    const close = trimmed.indexOf(']');
    if (close === -1 || trimmed[close + 1] !== ':') {
      throw ConfigurationError.invalidAddress(address, 'expected [host]:port');
    }
    host = trimmed.substring(1, close);
    portText = trimmed.substring(close + 2);
  } else {
    const colon = trimmed.lastIndexOf(':');
    if (colon === -1) {
      throw ConfigurationError.invalidAddress(address, 'missing port');
    }
    host = trimmed.substring(0, colon);
    portText = trimmed.substring(colon + 1);
    if (host.includes(':')) {
      throw ConfigurationError.invalidAddress(address, 'IPv6 hosts must be bracketed');
    }
  }

  if (!host) {
    throw ConfigurationError.invalidAddress(address, 'missing host');
  }

  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw ConfigurationError.invalidAddress(
      address,
      'port must be an integer between 1 and 65535'
    );
  }

  return { host, port };
}
