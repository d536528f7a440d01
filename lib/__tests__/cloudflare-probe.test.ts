import { describe, it, expect, beforeEach } from 'vitest';

import { RangeCache } from '../cloudflare/ranges';
import { createCloudFlareProbe } from '../probes/cloudflare';
import { createDnsLookupProbe } from '../probes/dns';
import { Grade } from '../probes/types';
import { MockHttpClient, MockResolver, fixtures } from './mocks';

describe('CloudFlare Membership Probe', () => {
  let http: MockHttpClient;
  let resolver: MockResolver;
  let cache: RangeCache;

  beforeEach(() => {
    http = new MockHttpClient();
    resolver = new MockResolver();
    cache = new RangeCache(http, { ipv4Url: fixtures.ipv4Url, ipv6Url: fixtures.ipv6Url });
    http.setBody(fixtures.ipv4Url, fixtures.ipv4Ranges);
    http.setBody(fixtures.ipv6Url, fixtures.ipv6Ranges);
  });

  function probe() {
    return createCloudFlareProbe(cache, createDnsLookupProbe(resolver));
  }

  it('should grade Good when every address is inside a range', async () => {
    resolver.setAddresses('cdn.test', ['1.1.1.1', '104.16.132.229', '2606:4700::6810:84e5']);

    const result = await probe().run('cdn.test:443');

    expect(result).toEqual({
      grade: Grade.Good,
      output: { '1.1.1.1': true, '104.16.132.229': true, '2606:4700::6810:84e5': true },
      error: null,
    });
  });

  it('should grade Bad and report every address when one is outside the ranges', async () => {
    resolver.setAddresses('mixed.test', ['1.1.1.1', '8.8.8.8']);

    const result = await probe().run('mixed.test');

    expect(result.grade).toBe(Grade.Bad);
    expect(result.output).toEqual({ '1.1.1.1': true, '8.8.8.8': false });
    expect(result.error).toBeNull();
  });

  it('should keep checking addresses after the first miss', async () => {
    resolver.setAddresses('mixed.test', ['8.8.8.8', '2001:db8::1', '1.1.1.1']);

    const result = await probe().run('mixed.test');

    expect(result.output).toEqual({ '8.8.8.8': false, '2001:db8::1': false, '1.1.1.1': true });
  });

  it('should skip when the ranges cannot be downloaded', async () => {
    http.setError(fixtures.ipv4Url, new Error('connect ETIMEDOUT'));
    resolver.setAddresses('cdn.test', ['1.1.1.1']);

    const result = await probe().run('cdn.test');

    expect(result.grade).toBe(Grade.Skipped);
    expect(result.output).toBeNull();
    expect(result.error).toMatchObject({
      code: 'RANGE_FETCH',
      message: "couldn't download CloudFlare IP ranges: connect ETIMEDOUT",
    });
    expect(resolver.lookups).toHaveLength(0);
  });

  it('should skip with the same error on every call after a failure', async () => {
    http.setError(fixtures.ipv4Url, new Error('connect ETIMEDOUT'));
    resolver.setAddresses('cdn.test', ['1.1.1.1']);
    const cloudflare = probe();

    const results = await Promise.all([cloudflare.run('cdn.test'), cloudflare.run('cdn.test')]);
    const later = await cloudflare.run('cdn.test');

    for (const result of [...results, later]) {
      expect(result.grade).toBe(Grade.Skipped);
      expect(result.error).toBe(later.error);
    }
    expect(http.calls).toEqual([fixtures.ipv4Url]);
  });

  it('should download the ranges once across concurrent runs', async () => {
    resolver.setAddresses('cdn.test', ['1.1.1.1']);
    const release = http.hold();
    const cloudflare = probe();

    const pending = Array.from({ length: 8 }, () => cloudflare.run('cdn.test'));
    release();
    const results = await Promise.all(pending);

    expect(results.every(result => result.grade === Grade.Good)).toBe(true);
    expect(http.callsTo(fixtures.ipv4Url)).toBe(1);
    expect(http.callsTo(fixtures.ipv6Url)).toBe(1);
  });

  it('should pass a DNS failure through unchanged', async () => {
    const failure = new Error('getaddrinfo ENOTFOUND gone.test');
    resolver.setError('gone.test', failure);

    const result = await probe().run('gone.test');

    expect(result.grade).toBe(Grade.Bad);
    expect(result.output).toBeNull();
    expect(result.error).toBe(failure);
  });
});
