/**
 * CloudFlare published IP ranges: parsing, membership and the process-wide cache
 */
import { isIP, isIPv4 } from 'node:net';
import { StringDecoder } from 'node:string_decoder';
import type { Readable } from 'node:stream';
import IPCIDR from 'ip-cidr';

import { config } from '../config';
import { defaultHttpClient, type HttpClient, type HttpResponse } from '../deps';
import { ProbeError, errorMessage } from '../errors';
import { componentLogger } from '../logger';

const rangeLogger = componentLogger('cloudflare-ranges');

export interface CidrRange {
  cidr: string;
  family: 4 | 6;
  network: IPCIDR;
}

export interface RangeSource {
  getRanges(): Promise<ReadonlyArray<CidrRange>>;
}

export interface RangeDocuments {
  ipv4Url: string;
  ipv6Url: string;
}

export type RangeCachePhase = 'uninitialized' | 'loading' | 'populated' | 'failed';

type RangeCacheState =
  | { phase: 'uninitialized' }
  | { phase: 'loading'; pending: Promise<ReadonlyArray<CidrRange>> }
  | { phase: 'populated'; ranges: ReadonlyArray<CidrRange> }
  | { phase: 'failed'; error: ProbeError };

/**
 * Parse one `address/prefix` line, returning null when it is not a CIDR
 */
export function parseCidr(text: string): CidrRange | null {
  const match = /^([^/\s]+)\/(\d{1,3})$/.exec(text);
  if (match?.[1] === undefined || match[2] === undefined) return null;

  const family = isIP(match[1]);
  const bits = Number.parseInt(match[2], 10);
  if (family === 4 && bits <= 32) return toRange(text, 4);
  if (family === 6 && bits <= 128) return toRange(text, 6);
  return null;
}

function toRange(cidr: string, family: 4 | 6): CidrRange | null {
  try {
    return { cidr, family, network: new IPCIDR(cidr) };
  } catch {
    return null;
  }
}

/**
 * IPv4-mapped IPv6 addresses are matched as IPv4
 */
function normalizeAddress(address: string): { address: string; family: number } {
  const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(address);
  if (mapped?.[1] !== undefined && isIPv4(mapped[1])) {
    return { address: mapped[1], family: 4 };
  }
  return { address, family: isIP(address) };
}

/**
 * True when the address falls inside any range; stops at the first match
 */
export function inRanges(address: string, ranges: ReadonlyArray<CidrRange>): boolean {
  const target = normalizeAddress(address);
  if (target.family === 0) return false;

  for (const range of ranges) {
    if (range.family === target.family && range.network.contains(target.address)) {
      return true;
    }
  }
  return false;
}

function chunkText(chunk: unknown, decoder: StringDecoder): string {
  if (typeof chunk === 'string') return chunk;
  if (Buffer.isBuffer(chunk)) return decoder.write(chunk);
  return String(chunk);
}

/**
 * Lines of each body in turn, with a line break between bodies
 */
async function* readLines(bodies: ReadonlyArray<Readable>): AsyncGenerator<string> {
  for (const body of bodies) {
    const decoder = new StringDecoder('utf8');
    let pending = '';

    try {
      for await (const chunk of body) {
        pending += chunkText(chunk, decoder);
        const lines = pending.split('\n');
        pending = lines.pop() ?? '';
        yield* lines;
      }
    } catch (error) {
      throw new ProbeError('RANGE_READ', `couldn't read CloudFlare IP ranges: ${errorMessage(error)}`, { cause: error });
    }

    pending += decoder.end();
    yield pending;
  }
}

/**
 * Downloads the published ranges once and remembers the outcome, success or
 * failure, for the life of the instance. Concurrent first callers share one
 * download.
 */
export class RangeCache implements RangeSource {
  private state: RangeCacheState = { phase: 'uninitialized' };

  constructor(
    private readonly http: HttpClient,
    private readonly documents: RangeDocuments
  ) {}

  get phase(): RangeCachePhase {
    return this.state.phase;
  }

  getRanges(): Promise<ReadonlyArray<CidrRange>> {
    switch (this.state.phase) {
      case 'failed':
        return Promise.reject(this.state.error);
      case 'populated':
        return Promise.resolve(this.state.ranges);
      case 'loading':
        return this.state.pending;
      case 'uninitialized': {
        const pending = this.load().then(
          (ranges) => {
            this.state = { phase: 'populated', ranges };
            rangeLogger.info({ ranges: ranges.length }, 'Loaded CloudFlare IP ranges');
            return ranges;
          },
          (error: unknown) => {
            const failure = error instanceof ProbeError
              ? error
              : new ProbeError('RANGE_FETCH', `couldn't download CloudFlare IP ranges: ${errorMessage(error)}`, { cause: error });
            this.state = { phase: 'failed', error: failure };
            rangeLogger.warn({ err: failure, code: failure.code }, 'CloudFlare IP ranges unavailable');
            throw failure;
          }
        );
        this.state = { phase: 'loading', pending };
        return pending;
      }
    }
  }

  private async load(): Promise<ReadonlyArray<CidrRange>> {
    const responses: Array<HttpResponse> = [];

    try {
      for (const url of [this.documents.ipv4Url, this.documents.ipv6Url]) {
        try {
          responses.push(await this.http.get(url));
        } catch (error) {
          throw new ProbeError('RANGE_FETCH', `couldn't download CloudFlare IP ranges: ${errorMessage(error)}`, { cause: error });
        }
      }

      const ranges: Array<CidrRange> = [];
      for await (const rawLine of readLines(responses.map(response => response.body))) {
        const line = rawLine.trim();
        if (line.length === 0) continue;

        const range = parseCidr(line);
        if (range === null) {
          throw new ProbeError('RANGE_PARSE', `couldn't parse CIDR range: invalid CIDR address: ${line}`);
        }
        ranges.push(range);
      }
      return ranges;
    } finally {
      for (const response of responses) {
        response.body.destroy();
      }
    }
  }
}

let defaultRangeCache: RangeCache | null = null;

/**
 * Process-wide cache backed by the default HTTP client
 */
export function getDefaultRangeCache(): RangeCache {
  defaultRangeCache ??= new RangeCache(defaultHttpClient, {
    ipv4Url: config.cloudflareIpv4Url,
    ipv6Url: config.cloudflareIpv6Url,
  });
  return defaultRangeCache;
}
