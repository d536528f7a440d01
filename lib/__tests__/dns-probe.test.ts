import { describe, it, expect, beforeEach } from 'vitest';

import { ProbeError } from '../errors';
import { createDnsLookupProbe } from '../probes/dns';
import { Grade } from '../probes/types';
import { MockResolver } from './mocks';

describe('DNS Lookup Probe', () => {
  let resolver: MockResolver;

  beforeEach(() => {
    resolver = new MockResolver();
  });

  it('should return every resolved address in resolver order', async () => {
    resolver.setAddresses('example.test', ['2001:db8::10', '192.0.2.10']);
    const probe = createDnsLookupProbe(resolver);

    const result = await probe.run('example.test');

    expect(result).toEqual({ grade: Grade.Good, output: ['2001:db8::10', '192.0.2.10'], error: null });
  });

  it('should strip the port before resolving', async () => {
    resolver.setAddresses('example.test', ['192.0.2.10']);
    const probe = createDnsLookupProbe(resolver);

    const result = await probe.run('example.test:443');

    expect(result.grade).toBe(Grade.Good);
    expect(resolver.lookups).toEqual(['example.test']);
  });

  it('should strip the port from a bracketed IPv6 address', async () => {
    resolver.setAddresses('2001:db8::10', ['2001:db8::10']);
    const probe = createDnsLookupProbe(resolver);

    const result = await probe.run('[2001:db8::10]:443');

    expect(result.output).toEqual(['2001:db8::10']);
    expect(resolver.lookups).toEqual(['2001:db8::10']);
  });

  it('should reject a malformed address before any lookup', async () => {
    const probe = createDnsLookupProbe(resolver);

    const result = await probe.run('host:::bad');

    expect(result.grade).toBe(Grade.Bad);
    expect(result.output).toBeNull();
    expect(result.error).toBeInstanceOf(ProbeError);
    expect(result.error).toMatchObject({ code: 'INVALID_ADDRESS' });
    expect(resolver.lookups).toHaveLength(0);
  });

  it('should return the resolver error unchanged', async () => {
    const failure = new Error('getaddrinfo ENOTFOUND missing.test');
    resolver.setError('missing.test', failure);
    const probe = createDnsLookupProbe(resolver);

    const result = await probe.run('missing.test:443');

    expect(result.grade).toBe(Grade.Bad);
    expect(result.error).toBe(failure);
  });

  it('should fail when the resolver returns no addresses', async () => {
    resolver.setAddresses('empty.test', []);
    const probe = createDnsLookupProbe(resolver);

    const result = await probe.run('empty.test');

    expect(result.grade).toBe(Grade.Bad);
    expect(result.error).toMatchObject({ code: 'NO_ADDRESSES', message: 'no addresses found for host' });
  });
});
