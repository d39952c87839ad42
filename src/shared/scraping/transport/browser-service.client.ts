import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool } from 'undici';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { errorMessage } from '@/shared/lib/util';
import {
  ProxyProtocol,
  describeEgress,
} from '@/shared/proxy/interfaces/proxy.interface';
import {
  BrowserAutomationClient,
  BrowserRenderRequest,
  RawOutcome,
} from '../interfaces/transport.interface';
import { mapTransportError, proxyUriFor } from './http-transport';

export const BROWSER_PROXY_PROTOCOLS: readonly ProxyProtocol[] = [
  'http',
  'https',
];

interface BrowserServiceReply {
  status: number;
  html: string;
  contentType?: string;
  headers?: Record<string, string>;
}

function isBrowserServiceReply(value: unknown): value is BrowserServiceReply {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const reply: Record<string, unknown> = { ...value };
  return typeof reply.status === 'number' && typeof reply.html === 'string';
}

/**
 * Client of the remote browser-automation service. The service loads the
 * page in a real browser through the given proxy and returns the rendered
 * document.
 */
@Injectable()
export class BrowserServiceClient
  implements BrowserAutomationClient, OnModuleDestroy
{
  private readonly logger = new Logger(BrowserServiceClient.name);
  private readonly client: Pool;
  private readonly apiKey: string;

  constructor(@Inject(CRAWLER_SETTINGS) settings: CrawlerSettings) {
    this.apiKey = settings.browserService.apiKey;

    this.client = new Pool(settings.browserService.url, {
      connections: 10,
      pipelining: 0,
      keepAliveTimeout: 10000,
      keepAliveMaxTimeout: 10000,
    });
  }

  get configured(): boolean {
    return this.apiKey.length > 0;
  }

  async onModuleDestroy() {
    await this.client.close();
  }

  async render(renderRequest: BrowserRenderRequest): Promise<RawOutcome> {
    const { url, egress, timeoutMs, signal } = renderRequest;

    // Local bridges are unreachable from the remote browser
    let proxy: string | null = null;
    if (egress.kind === 'proxy') {
      const { endpoint } = egress;
      if (!BROWSER_PROXY_PROTOCOLS.includes(endpoint.protocol)) {
        return {
          kind: 'failure',
          code: 'unknown',
          message: `Proxy ${endpoint.name} uses ${endpoint.protocol}; the browser service takes HTTP proxies only`,
        };
      }
      proxy = proxyUriFor(endpoint);
    }

    this.logger.log(
      `Requesting browser render from service: ${url} via ${describeEgress(egress)}`,
    );

    try {
      const { statusCode, body } = await this.client.request({
        path: '/browser/scrape',
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-API-Key': this.apiKey,
        },
        body: JSON.stringify({ url, proxy, timeoutMs }),
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        signal,
      });

      const text = await body.text();

      if (statusCode >= 400) {
        return {
          kind: 'failure',
          code: 'unknown',
          message: `Browser service answered HTTP ${statusCode}`,
        };
      }

      let reply: unknown;
      try {
        reply = JSON.parse(text);
      } catch (error) {
        return {
          kind: 'failure',
          code: 'unknown',
          message: `Browser service reply is not JSON: ${errorMessage(error)}`,
        };
      }

      if (!isBrowserServiceReply(reply)) {
        return {
          kind: 'failure',
          code: 'unknown',
          message: 'Browser service reply has no status or html',
        };
      }

      const headers: Record<string, string> = {};
      for (const [name, value] of Object.entries(reply.headers ?? {})) {
        headers[name.toLowerCase()] = value;
      }

      return {
        kind: 'response',
        status: reply.status,
        headers,
        body: reply.html,
        contentType: reply.contentType ?? 'text/html',
        url,
      };
    } catch (error) {
      const failure = mapTransportError(error);
      this.logger.error(`Browser render failed for ${url}: ${failure.message}`);
      return failure;
    }
  }
}
