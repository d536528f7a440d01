/**
 * DNS resolution probe
 */

import type { Resolver } from '../deps';
import { ProbeError, toError } from '../errors';
import { splitHostPort } from '../host';
import { failed, passed, type AddressList, type Probe } from './types';

/**
 * Resolve a host, with any port stripped, to at least one address
 */
export async function lookupAddresses(resolver: Resolver, address: string): Promise<AddressList> {
  const { host } = splitHostPort(address);
  const addrs = await resolver.lookupHost(host);
  if (addrs.length === 0) {
    throw new ProbeError('NO_ADDRESSES', 'no addresses found for host');
  }
  return addrs;
}

export function createDnsLookupProbe(resolver: Resolver): Probe<AddressList> {
  return {
    description: 'Host can be resolved through DNS',
    async run(host) {
      try {
        return passed(await lookupAddresses(resolver, host));
      } catch (error) {
        return failed(toError(error));
      }
    },
  };
}
