/**
 * Probe for hosts served from CloudFlare's published IP ranges
 */

import { inRanges, type CidrRange, type RangeSource } from '../cloudflare/ranges';
import { toError } from '../errors';
import { Grade, failed, type AddressList, type Probe, type RangeMembership } from './types';

export function createCloudFlareProbe(ranges: RangeSource, dnsLookup: Probe<AddressList>): Probe<RangeMembership> {
  return {
    description: 'Host is on CloudFlare',
    async run(host) {
      let networks: ReadonlyArray<CidrRange>;
      try {
        networks = await ranges.getRanges();
      } catch (error) {
        // without ranges the check is inconclusive, not negative
        return failed(toError(error), Grade.Skipped);
      }

      const lookup = await dnsLookup.run(host);
      if (lookup.error !== null) {
        return failed(lookup.error);
      }

      // no early exit on the first miss: the output lists every address
      const membership: RangeMembership = {};
      let grade: Grade = Grade.Good;
      for (const addr of lookup.output ?? []) {
        const onCloudFlare = inRanges(addr, networks);
        membership[addr] = onCloudFlare;
        if (!onCloudFlare) {
          grade = Grade.Bad;
        }
      }

      return { grade, output: membership, error: null };
    },
  };
}
