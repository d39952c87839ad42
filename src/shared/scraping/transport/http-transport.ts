import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { Dispatcher, ProxyAgent, request } from 'undici';
import { errorMessage } from '@/shared/lib/util';
import {
  Egress,
  ProxyEndpoint,
  endpointKey,
} from '@/shared/proxy/interfaces/proxy.interface';
import {
  NetworkTransport,
  RawOutcome,
  TransportFailure,
  TransportFailureCode,
  TransportRequest,
} from '../interfaces/transport.interface';
import { DIRECT_DISPATCHER } from '../scraping.constants';

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
];

const ERROR_CODES: Record<string, TransportFailureCode> = {
  UND_ERR_HEADERS_TIMEOUT: 'timeout',
  UND_ERR_BODY_TIMEOUT: 'timeout',
  UND_ERR_CONNECT_TIMEOUT: 'timeout',
  ETIMEDOUT: 'timeout',
  UND_ERR_SOCKET: 'connection-reset',
  ECONNRESET: 'connection-reset',
  EPIPE: 'connection-reset',
  ECONNREFUSED: 'connection-refused',
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  UND_ERR_ABORTED: 'aborted',
  ABORT_ERR: 'aborted',
};

function codeOf(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

/**
 * Transport failure for an error thrown by undici or the socket layer.
 */
export function mapTransportError(error: unknown): TransportFailure {
  const message = errorMessage(error);

  if (error instanceof Error && error.name === 'AbortError') {
    return { kind: 'failure', code: 'aborted', message };
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return { kind: 'failure', code: 'timeout', message };
  }

  const cause = error instanceof Error ? error.cause : undefined;
  for (const candidate of [codeOf(error), codeOf(cause)]) {
    if (candidate && ERROR_CODES[candidate]) {
      return { kind: 'failure', code: ERROR_CODES[candidate], message };
    }
  }

  return { kind: 'failure', code: 'unknown', message };
}

/**
 * Proxy URI for an endpoint. Non-HTTP protocols go through their local
 * bridge.
 */
export function proxyUriFor(endpoint: ProxyEndpoint): string {
  if (endpoint.protocol === 'http' || endpoint.protocol === 'https') {
    return `${endpoint.protocol}://${endpoint.address}:${endpoint.port}`;
  }
  if (!endpoint.bridgeUrl) {
    throw new Error(
      `Proxy ${endpoint.name} uses ${endpoint.protocol} and has no bridge`,
    );
  }
  return endpoint.bridgeUrl;
}

export function proxyToken(endpoint: ProxyEndpoint): string | undefined {
  const isHttp = endpoint.protocol === 'http' || endpoint.protocol === 'https';
  const { username, password } = endpoint.credentials ?? {};
  if (!isHttp || !username) {
    return undefined;
  }
  const encoded = Buffer.from(`${username}:${password ?? ''}`).toString(
    'base64',
  );
  return `Basic ${encoded}`;
}

function flattenHeaders(
  headers: Record<string, string | string[] | undefined>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      result[name.toLowerCase()] = Array.isArray(value)
        ? value.join(', ')
        : value;
    }
  }
  return result;
}

@Injectable()
export class HttpTransport implements NetworkTransport, OnModuleDestroy {
  private readonly logger = new Logger(HttpTransport.name);
  private readonly agents = new Map<string, ProxyAgent>();

  constructor(
    @Optional()
    @Inject(DIRECT_DISPATCHER)
    private readonly directDispatcher?: Dispatcher,
  ) {}

  async onModuleDestroy(): Promise<void> {
    await Promise.all([...this.agents.values()].map((agent) => agent.close()));
    this.agents.clear();
  }

  /**
   * One request. `timeoutMs` bounds the whole exchange, headers and body
   * together; undici's own timeouts only bound the gaps between chunks.
   */
  async send(transportRequest: TransportRequest): Promise<RawOutcome> {
    const { url, egress, timeoutMs, signal } = transportRequest;
    const startTime = Date.now();
    const deadline = AbortSignal.timeout(timeoutMs);
    const combined = signal ? AbortSignal.any([signal, deadline]) : deadline;

    let dispatcher: Dispatcher | undefined;
    try {
      dispatcher = this.dispatcherFor(egress);
    } catch (error) {
      return { kind: 'failure', code: 'unknown', message: errorMessage(error) };
    }

    try {
      const response = await request(url, {
        method: transportRequest.method ?? 'GET',
        headers: {
          'User-Agent': USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)],
          Accept:
            'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
          'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
          ...transportRequest.headers,
        },
        body: transportRequest.body,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        signal: combined,
        dispatcher,
      });

      const body = await response.body.text();
      const headers = flattenHeaders(response.headers);

      this.logger.debug(
        `${response.statusCode} ${url} via ${egress.kind === 'direct' ? 'direct' : egress.endpoint.name} in ${Date.now() - startTime}ms`,
      );

      return {
        kind: 'response',
        status: response.statusCode,
        headers,
        body,
        contentType: headers['content-type'] ?? '',
        url,
      };
    } catch (error) {
      const failure: TransportFailure =
        deadline.aborted && !signal?.aborted
          ? {
              kind: 'failure',
              code: 'timeout',
              message: `No complete response within ${timeoutMs}ms`,
            }
          : mapTransportError(error);
      this.logger.debug(`Request to ${url} failed (${failure.code}): ${failure.message}`);
      return failure;
    }
  }

  private dispatcherFor(egress: Egress): Dispatcher | undefined {
    if (egress.kind === 'direct') {
      return this.directDispatcher;
    }

    const key = endpointKey(egress.endpoint);
    let agent = this.agents.get(key);
    if (!agent) {
      agent = new ProxyAgent({
        uri: proxyUriFor(egress.endpoint),
        token: proxyToken(egress.endpoint),
      });
      this.agents.set(key, agent);
    }
    return agent;
  }
}
