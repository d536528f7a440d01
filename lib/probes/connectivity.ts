import { config, type Network } from '../config';
import { getDefaultRangeCache, type RangeSource } from '../cloudflare/ranges';
import {
  defaultDialer,
  defaultResolver,
  defaultTlsConfig,
  type Dialer,
  type Resolver,
  type TlsConfigFactory,
} from '../deps';
import { createCloudFlareProbe } from './cloudflare';
import { createTcpDialProbe, createTlsDialProbe } from './dial';
import { createDnsLookupProbe } from './dns';
import type { ProbeFamily } from './types';

export interface ConnectivityDeps {
  resolver: Resolver;
  dialer: Dialer;
  network: Network;
  tlsConfig: TlsConfigFactory;
  ranges: RangeSource;
}

/**
 * Probes for basic connectivity: DNS, CloudFlare membership, TCP and TLS
 */
export function createConnectivityFamily(deps: ConnectivityDeps): ProbeFamily {
  const dnsLookup = createDnsLookupProbe(deps.resolver);

  return {
    description: 'Scans for basic connectivity with the host through DNS and TCP/TLS dials',
    probes: {
      DNSLookup: dnsLookup,
      CloudFlareStatus: createCloudFlareProbe(deps.ranges, dnsLookup),
      TCPDial: createTcpDialProbe(deps.dialer, deps.network),
      TLSDial: createTlsDialProbe(deps.dialer, deps.network, deps.tlsConfig),
    },
  };
}

export const connectivity = createConnectivityFamily({
  resolver: defaultResolver,
  dialer: defaultDialer,
  network: config.network,
  tlsConfig: defaultTlsConfig,
  ranges: {
    getRanges: () => getDefaultRangeCache().getRanges(),
  },
});

export const families: Readonly<Record<string, ProbeFamily>> = {
  Connectivity: connectivity,
};
