import { Module } from '@nestjs/common';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { PROXY_CATALOG, PROXY_STATE_STORE } from './proxy.constants';
import { ProxyHealthService } from './services/proxy-health.service';
import { ProxyPoolService } from './services/proxy-pool.service';
import { ProxyRegistryService } from './services/proxy-registry.service';
import { SitePolicyService } from './services/site-policy.service';
import { FileProxyStateStore } from './stores/proxy-state.store';

@Module({
  providers: [
    {
      provide: PROXY_CATALOG,
      useFactory: (settings: CrawlerSettings) =>
        ProxyRegistryService.load(settings.proxy.catalogPath),
      inject: [CRAWLER_SETTINGS],
    },
    ProxyRegistryService,
    SitePolicyService,
    {
      provide: PROXY_STATE_STORE,
      useFactory: (settings: CrawlerSettings) =>
        new FileProxyStateStore(settings.proxy.statePath),
      inject: [CRAWLER_SETTINGS],
    },
    ProxyPoolService,
    ProxyHealthService,
  ],
  exports: [ProxyPoolService, ProxyRegistryService, SitePolicyService],
})
export class ProxyModule {}
