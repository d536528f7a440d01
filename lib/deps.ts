/**
 * Collaborator interfaces for the probes, with their default implementations
 */

import { lookup } from 'node:dns/promises';
import { connect as netConnect, isIP, type Socket } from 'node:net';
import { connect as tlsConnect, type ConnectionOptions, type TLSSocket } from 'node:tls';
import type { Readable } from 'node:stream';
import got, { type Response } from 'got';

import { config, type Network } from './config';
import { parseDialAddress, splitHostPort } from './host';

// ============================================================================
// HTTP Client Interface
// ============================================================================

export interface HttpResponse {
  statusCode: number;
  body: Readable;
}

export interface HttpClient {
  /**
   * Resolves once response headers arrive. The caller owns `body` and must
   * destroy it when done.
   */
  get(url: string): Promise<HttpResponse>;
}

export class GotHttpClient implements HttpClient {
  constructor(private readonly timeoutMs: number) {}

  get(url: string): Promise<HttpResponse> {
    const stream = got.stream(url, {
      timeout: { request: this.timeoutMs },
      retry: { limit: 0 },
      throwHttpErrors: false,
    });

    return new Promise((resolve, reject) => {
      // left attached: a body can sit unread while the next request runs
      stream.once('error', reject);
      stream.once('response', (response: Response) => {
        const { statusCode } = response;
        if (statusCode < 200 || statusCode >= 300) {
          stream.destroy();
          reject(new Error(`HTTP ${String(statusCode)} from ${url}`));
          return;
        }
        resolve({ statusCode, body: stream });
      });
    });
  }
}

// ============================================================================
// Resolver Interface
// ============================================================================

export interface Resolver {
  lookupHost(host: string): Promise<Array<string>>;
}

export class SystemResolver implements Resolver {
  async lookupHost(host: string): Promise<Array<string>> {
    const entries = await lookup(host, { all: true, verbatim: true });
    return entries.map(entry => entry.address);
  }
}

// ============================================================================
// Dialer Interface
// ============================================================================

export interface Dialer {
  dial(network: Network, address: string): Promise<Socket>;
  dialTls(network: Network, address: string, options: ConnectionOptions): Promise<TLSSocket>;
}

function familyOf(network: Network): number {
  if (network === 'tcp4') return 4;
  if (network === 'tcp6') return 6;
  return 0;
}

export class NetDialer implements Dialer {
  constructor(private readonly timeoutMs: number) {}

  dial(network: Network, address: string): Promise<Socket> {
    let target: { host: string; port: number };
    try {
      target = parseDialAddress(address);
    } catch (error) {
      return Promise.reject(error);
    }

    return new Promise((resolve, reject) => {
      const socket = netConnect({
        host: target.host,
        port: target.port,
        family: familyOf(network),
        timeout: this.timeoutMs,
      });

      const onError = (error: Error) => {
        socket.destroy();
        reject(error);
      };

      // left attached after connect
      socket.on('error', onError);
      socket.once('timeout', () => {
        socket.destroy(new Error(`dial ${network} ${address}: i/o timeout`));
      });
      socket.once('connect', () => {
        socket.setTimeout(0);
        resolve(socket);
      });
    });
  }

  /**
   * The timeout covers the TCP connect and the handshake together
   */
  async dialTls(network: Network, address: string, options: ConnectionOptions): Promise<TLSSocket> {
    const deadline = Date.now() + this.timeoutMs;
    const socket = await this.dial(network, address);

    return await new Promise<TLSSocket>((resolve, reject) => {
      const tlsSocket = tlsConnect({ ...options, socket });
      const timer = setTimeout(() => {
        tlsSocket.destroy(new Error(`dial ${network} ${address}: i/o timeout`));
      }, Math.max(deadline - Date.now(), 1));

      const onError = (error: Error) => {
        clearTimeout(timer);
        tlsSocket.destroy();
        socket.destroy();
        reject(error);
      };

      tlsSocket.on('error', onError);
      tlsSocket.once('secureConnect', () => {
        clearTimeout(timer);
        resolve(tlsSocket);
      });
    });
  }
}

// ============================================================================
// TLS Configuration
// ============================================================================

export type TlsConfigFactory = (host: string) => ConnectionOptions;

/**
 * Verify the certificate against the host, sending it as SNI unless it is an
 * IP literal
 */
export const defaultTlsConfig: TlsConfigFactory = (host) => {
  const { host: name } = splitHostPort(host);
  return isIP(name) === 0 ? { host: name, servername: name } : { host: name };
};

// ============================================================================
// Default Instances
// ============================================================================

export const defaultHttpClient = new GotHttpClient(config.httpTimeoutMs);
export const defaultResolver = new SystemResolver();
export const defaultDialer = new NetDialer(config.dialTimeoutMs);
