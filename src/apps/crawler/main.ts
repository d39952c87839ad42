import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { loadEnv } from '@/shared/config/load-env';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { ConfigurationError } from '@/shared/errors/crawl.errors';
import { errorMessage } from '@/shared/lib/util';
import { CrawlOrchestratorService } from '@/shared/scraping/services/crawl-orchestrator.service';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { CrawlerAppModule } from './app.module';
import { readBatch, writeReport } from './batch-input';

async function bootstrap() {
  loadEnv();
  const logger = new Logger('Crawler');

  const app = await NestFactory.createApplicationContext(CrawlerAppModule);
  const controller = new AbortController();
  setupGracefulShutdown(app, controller);

  const settings = app.get<CrawlerSettings>(CRAWLER_SETTINGS);
  const inputPath = process.argv[2] ?? settings.crawlInputPath;
  const requests = await readBatch(inputPath);

  logger.log(`🔎 Crawling ${requests.length} entities from ${inputPath}`);

  const orchestrator = app.get(CrawlOrchestratorService);
  const report = await orchestrator.run(requests, {
    signal: controller.signal,
  });

  const written = await writeReport(settings.crawlReportPath, report);
  logger.log(
    `Report written to ${written}: ${report.statistics.succeeded}/${report.statistics.totalEntities} succeeded`,
  );

  await app.close();
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Crawler');
  if (error instanceof ConfigurationError) {
    logger.error(`Configuration error: ${error.message}`);
  } else {
    logger.error(`Crawler failed: ${errorMessage(error)}`);
  }
  process.exit(1);
});
