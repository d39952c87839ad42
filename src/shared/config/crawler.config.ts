import { ConfigService } from '@nestjs/config';

export const CRAWLER_SETTINGS = 'CRAWLER_SETTINGS';

export interface RetrySettings {
  /** Same-strategy attempt budget. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffFactor: number;
  /** Fraction, 0.2 means ±20%. */
  backoffJitter: number;
}

export interface ProxySettings {
  catalogPath: string;
  statePath: string;
  cooldownMs: number;
  failureThreshold: number;
}

export interface CrawlerSettings {
  maxConcurrent: number;
  requestsPerMinute: number;
  burstSize: number;
  requestIntervalMs: number;
  attemptTimeoutMs: number;
  runDeadlineMs: number | null;
  retry: RetrySettings;
  proxy: ProxySettings;
  blockMarkersPath: string;
  sourcesPath: string;
  dedupeTtlMs: number;
  browserService: {
    url: string;
    apiKey: string;
  };
  crawlInputPath: string;
  crawlReportPath: string;
}

export function crawlerSettingsFactory(config: ConfigService): CrawlerSettings {
  const deadline = config.getOrThrow<number>('CRAWLER_RUN_DEADLINE_MS');

  return {
    maxConcurrent: config.getOrThrow<number>('CRAWLER_MAX_CONCURRENT'),
    requestsPerMinute: config.getOrThrow<number>('CRAWLER_REQUESTS_PER_MINUTE'),
    burstSize: config.getOrThrow<number>('CRAWLER_BURST_SIZE'),
    requestIntervalMs: config.getOrThrow<number>('CRAWLER_REQUEST_INTERVAL_MS'),
    attemptTimeoutMs: config.getOrThrow<number>('CRAWLER_ATTEMPT_TIMEOUT_MS'),
    runDeadlineMs: deadline > 0 ? deadline : null,
    retry: {
      maxAttempts: config.getOrThrow<number>('CRAWLER_RETRY_MAX_ATTEMPTS'),
      backoffBaseMs: config.getOrThrow<number>('CRAWLER_BACKOFF_BASE_MS'),
      backoffFactor: config.getOrThrow<number>('CRAWLER_BACKOFF_FACTOR'),
      backoffJitter: config.getOrThrow<number>('CRAWLER_BACKOFF_JITTER'),
    },
    proxy: {
      catalogPath: config.getOrThrow<string>('PROXY_CATALOG_PATH'),
      statePath: config.getOrThrow<string>('PROXY_STATE_PATH'),
      cooldownMs: config.getOrThrow<number>('PROXY_COOLDOWN_MS'),
      failureThreshold: config.getOrThrow<number>('PROXY_FAILURE_THRESHOLD'),
    },
    blockMarkersPath: config.getOrThrow<string>('BLOCK_MARKERS_PATH'),
    sourcesPath: config.getOrThrow<string>('SOURCES_PATH'),
    dedupeTtlMs: config.getOrThrow<number>('DEDUPE_TTL_MS'),
    browserService: {
      url: config.getOrThrow<string>('BROWSER_SERVICE_URL'),
      apiKey: config.get<string>('BROWSER_SERVICE_API_KEY') ?? '',
    },
    crawlInputPath: config.getOrThrow<string>('CRAWL_INPUT_PATH'),
    crawlReportPath: config.getOrThrow<string>('CRAWL_REPORT_PATH'),
  };
}

export const crawlerSettingsProvider = {
  provide: CRAWLER_SETTINGS,
  useFactory: crawlerSettingsFactory,
  inject: [ConfigService],
};
