import { Global, Module } from '@nestjs/common';
import { CLOCK, SystemClock } from '@/shared/lib/clock';
import { CRAWLER_SETTINGS, crawlerSettingsProvider } from './crawler.config';

/**
 * Typed crawler settings and the time source, available to every module.
 * Expects a global ConfigModule.
 */
@Global()
@Module({
  providers: [crawlerSettingsProvider, { provide: CLOCK, useClass: SystemClock }],
  exports: [CRAWLER_SETTINGS, CLOCK],
})
export class CrawlerConfigModule {}
