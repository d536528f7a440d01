/**
 * Barrel export for all probe-related modules
 */

export {
  Grade,
  passed,
  failed,
  type AddressList,
  type RangeMembership,
  type ProbeOutput,
  type ProbeResult,
  type Probe,
  type ProbeFamily,
} from './types';

export { createDnsLookupProbe, lookupAddresses } from './dns';
export { createCloudFlareProbe } from './cloudflare';
export { createTcpDialProbe, createTlsDialProbe } from './dial';
export {
  createConnectivityFamily,
  connectivity,
  families,
  type ConnectivityDeps,
} from './connectivity';
