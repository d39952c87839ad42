import { Inject, Injectable } from '@nestjs/common';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { ConfigurationError } from '@/shared/errors/crawl.errors';
import {
  Egress,
  ProxyProtocol,
} from '@/shared/proxy/interfaces/proxy.interface';
import { EntityRequest } from '../interfaces/acquisition.interface';
import { AttemptContext, StrategyName } from '../interfaces/strategy.interface';
import {
  BrowserAutomationClient,
  RawOutcome,
} from '../interfaces/transport.interface';
import { BROWSER_AUTOMATION_CLIENT } from '../scraping.constants';
import { SourceCatalogService } from '../services/source-catalog.service';
import { BROWSER_PROXY_PROTOCOLS } from '../transport/browser-service.client';
import { SourceStrategy } from './source-strategy.base';

/**
 * Renders the database search page in the remote browser service, for
 * pages that only fill in after their scripts run.
 */
@Injectable()
export class BrowserAutomationStrategy extends SourceStrategy {
  readonly name: StrategyName = 'browser-automation';
  readonly proxyProtocols: readonly ProxyProtocol[] = BROWSER_PROXY_PROTOCOLS;

  constructor(
    sources: SourceCatalogService,
    @Inject(BROWSER_AUTOMATION_CLIENT)
    private readonly browser: BrowserAutomationClient,
    @Inject(CRAWLER_SETTINGS) settings: CrawlerSettings,
  ) {
    super(sources);

    const enabled = sources.get('browser-automation').enabled;
    if (enabled && !settings.browserService.apiKey) {
      throw new ConfigurationError(
        'BROWSER_SERVICE_API_KEY must be configured when browser automation is enabled',
      );
    }
  }

  attempt(
    request: EntityRequest,
    egress: Egress,
    { signal, timeoutMs }: AttemptContext,
  ): Promise<RawOutcome> {
    return this.browser.render({
      url: this.urlFor(request),
      egress,
      timeoutMs,
      signal,
    });
  }
}
