export type Network = 'tcp' | 'tcp4' | 'tcp6';

export interface ProbeConfig {
  port: number;
  network: Network;
  dialTimeoutMs: number;
  httpTimeoutMs: number;
  cloudflareIpv4Url: string;
  cloudflareIpv6Url: string;
}

const DEFAULT_PORT = 3000;
const DEFAULT_TIMEOUT_MS = 10_000;
const NETWORKS: ReadonlyArray<Network> = ['tcp', 'tcp4', 'tcp6'];

export const DEFAULT_CLOUDFLARE_IPV4_URL = 'https://www.cloudflare.com/ips-v4';
export const DEFAULT_CLOUDFLARE_IPV6_URL = 'https://www.cloudflare.com/ips-v6';

function resolvePositiveInt(envValue: string | undefined, fallback: number): number {
  if (envValue === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(envValue, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function resolveNetwork(envValue: string | undefined): Network {
  const value = (envValue ?? '').toLowerCase();
  return NETWORKS.find(network => network === value) ?? 'tcp';
}

function resolveUrl(envValue: string | undefined, fallback: string): string {
  return envValue !== undefined && envValue.trim().length > 0 ? envValue.trim() : fallback;
}

/**
 * Read probe settings from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProbeConfig {
  return {
    port: resolvePositiveInt(env['PORT'], DEFAULT_PORT),
    network: resolveNetwork(env['DIAL_NETWORK']),
    dialTimeoutMs: resolvePositiveInt(env['DIAL_TIMEOUT_MS'], DEFAULT_TIMEOUT_MS),
    httpTimeoutMs: resolvePositiveInt(env['HTTP_TIMEOUT_MS'], DEFAULT_TIMEOUT_MS),
    cloudflareIpv4Url: resolveUrl(env['CLOUDFLARE_IPV4_URL'], DEFAULT_CLOUDFLARE_IPV4_URL),
    cloudflareIpv6Url: resolveUrl(env['CLOUDFLARE_IPV6_URL'], DEFAULT_CLOUDFLARE_IPV6_URL),
  };
}

export const config = loadConfig();
