import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import { ScheduleModule } from '@nestjs/schedule';
import { CrawlerConfigModule } from '@/shared/config/crawler-config.module';
import { validationSchema } from '@/shared/config/env.validation';
import { ProxyModule } from '@/shared/proxy/proxy.module';
import { ScrapingModule } from '@/shared/scraping/scraping.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    CacheModule.register({ isGlobal: true }),
    ScheduleModule.forRoot(),
    CrawlerConfigModule,
    ProxyModule,
    ScrapingModule,
  ],
})
export class CrawlerAppModule {}
