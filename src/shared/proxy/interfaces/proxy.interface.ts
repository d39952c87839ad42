export type ProxyTier = 'paid' | 'free';

export type ProxyProtocol = 'http' | 'https' | 'socks5' | 'trojan';

export interface ProxyCredentials {
  username?: string;
  password?: string;
}

/**
 * Immutable identity of one proxy endpoint, created when the catalog loads.
 */
export interface ProxyEndpoint {
  readonly name: string;
  readonly address: string;
  readonly port: number;
  readonly protocol: ProxyProtocol;
  readonly tls: boolean;
  readonly credentials?: Readonly<ProxyCredentials>;
  readonly region: string;
  readonly tier: ProxyTier;
  /** Lower number = higher precedence. */
  readonly priority: number;
  /** Local HTTP entry of the client that speaks a non-HTTP protocol. */
  readonly bridgeUrl?: string;
}

export type Egress =
  | { readonly kind: 'direct' }
  | { readonly kind: 'proxy'; readonly endpoint: ProxyEndpoint };

export const DIRECT_EGRESS: Egress = Object.freeze({ kind: 'direct' });

export function endpointKey(endpoint: ProxyEndpoint): string {
  return `${endpoint.address}:${endpoint.port}`;
}

export function describeEgress(egress: Egress): string {
  return egress.kind === 'direct'
    ? 'direct'
    : `${egress.endpoint.name} [${endpointKey(egress.endpoint)}]`;
}

export interface ProxyHealthState {
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  /** Epoch ms; null when not cooling down. */
  cooldownUntil: number | null;
  lastCheckedAt: number | null;
  totalAttempts: number;
  totalSuccesses: number;
}

export interface SitePreference {
  useProxy: boolean;
  preferredTier?: ProxyTier;
  /** Falls back to the pool's `fallbackToDirect` when absent. */
  allowDirect?: boolean;
}

export interface ProxyPoolPolicy {
  enabled: boolean;
  rotationEnabled: boolean;
  checkIntervalMinutes: number;
  /** Most same-strategy attempts made through proxies. */
  maxRetries: number;
  /** Attempt timeout for proxied egress. */
  timeoutSeconds: number;
  fallbackToDirect: boolean;
  defaultSite: SitePreference;
  /** Hostname or `*.suffix` wildcard → preference. */
  sites: Record<string, SitePreference>;
}

export interface ProxyCatalog {
  policy: ProxyPoolPolicy;
  endpoints: ProxyEndpoint[];
}

/** Narrows the endpoints one selection may use. */
export interface EgressConstraints {
  /** Only endpoints speaking one of these protocols. */
  protocols?: readonly ProxyProtocol[];
}

/**
 * Rotation counter key of one selection group: the tier filter in force,
 * the priority served and any protocol restriction.
 */
export function rotationGroupKey(
  tier: ProxyTier | undefined,
  priority: number,
  protocols?: readonly ProxyProtocol[],
): string {
  const key = `${tier ?? 'any'}:${priority}`;
  return protocols ? `${key}:${protocols.join('+')}` : key;
}

/**
 * On-disk record of rotation and health, read at startup and rewritten
 * after every pool mutation.
 */
export interface PersistedProxyState {
  version: 2;
  /** Next index per selection group. */
  rotation: Record<string, number>;
  lastUpdated: string;
  endpoints: Record<string, ProxyHealthState>;
}

export interface EndpointStats extends ProxyHealthState {
  name: string;
  key: string;
  tier: ProxyTier;
  coolingDown: boolean;
}

export interface ProxyPoolStats {
  total: number;
  available: number;
  coolingDown: number;
  rotation: Record<string, number>;
  endpoints: EndpointStats[];
}
