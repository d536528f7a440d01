/**
 * Host and host:port parsing shared by the resolver and dialer
 */
import { isIPv6 } from 'node:net';

import { ProbeError } from './errors';

export interface HostPort {
  host: string;
  port: string | null;
}

function invalid(address: string, reason: string): ProbeError {
  return new ProbeError('INVALID_ADDRESS', `address ${address}: ${reason}`);
}

/**
 * Split `host`, `host:port`, `[ipv6]`, `[ipv6]:port` or a bare IPv6 literal
 * into its host and optional port
 */
export function splitHostPort(address: string): HostPort {
  if (address.startsWith('[')) {
    const close = address.indexOf(']');
    if (close < 0) throw invalid(address, 'missing \']\' in address');

    const host = address.slice(1, close);
    const rest = address.slice(close + 1);
    if (host.length === 0) throw invalid(address, 'missing host in address');
    if (host.includes('[') || host.includes(']')) throw invalid(address, 'unexpected \'[\' in address');
    if (rest.length === 0) return { host, port: null };
    if (!rest.startsWith(':')) throw invalid(address, 'missing port in address');

    const port = rest.slice(1);
    if (port.includes(':')) throw invalid(address, 'too many colons in address');
    return { host, port };
  }

  if (address.includes(']')) throw invalid(address, 'unexpected \']\' in address');

  const colons = address.split(':').length - 1;
  if (colons === 0) {
    if (address.length === 0) throw invalid(address, 'missing host in address');
    return { host: address, port: null };
  }

  if (colons > 1) {
    if (isIPv6(address)) return { host: address, port: null };
    throw invalid(address, 'too many colons in address');
  }

  const separator = address.indexOf(':');
  const host = address.slice(0, separator);
  if (host.length === 0) throw invalid(address, 'missing host in address');
  return { host, port: address.slice(separator + 1) };
}

/**
 * Parse a dial target, which must carry a numeric port
 */
export function parseDialAddress(address: string): { host: string; port: number } {
  const { host, port } = splitHostPort(address);
  if (port === null || port.length === 0) {
    throw invalid(address, 'missing port in address');
  }
  if (!/^\d+$/.test(port)) {
    throw invalid(address, `invalid port "${port}"`);
  }

  const portNumber = Number.parseInt(port, 10);
  if (portNumber < 1 || portNumber > 65535) {
    throw invalid(address, `invalid port "${port}"`);
  }

  return { host, port: portNumber };
}
