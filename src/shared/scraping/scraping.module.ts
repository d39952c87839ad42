import { Module } from '@nestjs/common';
import { ProxyModule } from '../proxy/proxy.module';
import { AcquisitionStrategy } from './interfaces/strategy.interface';
import {
  ACQUISITION_STRATEGIES,
  BROWSER_AUTOMATION_CLIENT,
  CRAWL_RESULT_SINK,
  NETWORK_TRANSPORT,
} from './scraping.constants';
import { CrawlOrchestratorService } from './services/crawl-orchestrator.service';
import { DedupeCacheService } from './services/dedupe-cache.service';
import { LoggingResultSink } from './services/logging-result.sink';
import { RateLimiterService } from './services/rate-limiter.service';
import { ResponseClassifierService } from './services/response-classifier.service';
import { RetryControllerService } from './services/retry-controller.service';
import { SourceCatalogService } from './services/source-catalog.service';
import { StrategyChainService } from './services/strategy-chain.service';
import { BrowserAutomationStrategy } from './strategies/browser-automation.strategy';
import { DirectUrlStrategy } from './strategies/direct-url.strategy';
import { SearchEngineStrategy } from './strategies/search-engine.strategy';
import { StructuredDatabaseStrategy } from './strategies/structured-database.strategy';
import { BrowserServiceClient } from './transport/browser-service.client';
import { HttpTransport } from './transport/http-transport';

/**
 * Acquisition core. Expects a global CacheModule and CrawlerConfigModule.
 */
@Module({
  imports: [ProxyModule],
  providers: [
    HttpTransport,
    { provide: NETWORK_TRANSPORT, useExisting: HttpTransport },
    BrowserServiceClient,
    { provide: BROWSER_AUTOMATION_CLIENT, useExisting: BrowserServiceClient },
    { provide: CRAWL_RESULT_SINK, useClass: LoggingResultSink },
    SourceCatalogService,
    StructuredDatabaseStrategy,
    SearchEngineStrategy,
    BrowserAutomationStrategy,
    DirectUrlStrategy,
    {
      provide: ACQUISITION_STRATEGIES,
      useFactory: (
        ...strategies: AcquisitionStrategy[]
      ): AcquisitionStrategy[] => strategies,
      inject: [
        StructuredDatabaseStrategy,
        SearchEngineStrategy,
        BrowserAutomationStrategy,
        DirectUrlStrategy,
      ],
    },
    ResponseClassifierService,
    RetryControllerService,
    RateLimiterService,
    DedupeCacheService,
    StrategyChainService,
    CrawlOrchestratorService,
  ],
  exports: [CrawlOrchestratorService, StrategyChainService],
})
export class ScrapingModule {}
