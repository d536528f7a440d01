/**
 * TCP and TLS dial probes
 */

import type { Network } from '../config';
import type { Dialer, TlsConfigFactory } from '../deps';
import { toError } from '../errors';
import { failed, passed, type Probe } from './types';

export function createTcpDialProbe(dialer: Dialer, network: Network): Probe {
  return {
    description: 'Host accepts TCP connection',
    async run(host) {
      try {
        const socket = await dialer.dial(network, host);
        socket.destroy();
        return passed();
      } catch (error) {
        return failed(toError(error));
      }
    },
  };
}

export function createTlsDialProbe(dialer: Dialer, network: Network, tlsConfig: TlsConfigFactory): Probe {
  return {
    description: 'Host can perform TLS handshake',
    async run(host) {
      try {
        const socket = await dialer.dialTls(network, host, tlsConfig(host));
        socket.destroy();
        return passed();
      } catch (error) {
        return failed(toError(error));
      }
    },
  };
}
