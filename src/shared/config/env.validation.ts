import * as Joi from 'joi';

export const validationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),

  // Worker pool and rate ceilings
  CRAWLER_MAX_CONCURRENT: Joi.number().integer().min(1).max(20).default(3),
  CRAWLER_REQUESTS_PER_MINUTE: Joi.number().min(1).max(600).default(30),
  CRAWLER_BURST_SIZE: Joi.number().integer().min(1).max(50).default(5),
  CRAWLER_REQUEST_INTERVAL_MS: Joi.number().min(0).default(1000),
  CRAWLER_ATTEMPT_TIMEOUT_MS: Joi.number().min(1000).max(120000).default(30000),
  CRAWLER_RUN_DEADLINE_MS: Joi.number().min(0).default(0),

  // Retry / backoff
  CRAWLER_RETRY_MAX_ATTEMPTS: Joi.number().integer().min(1).max(10).default(3),
  CRAWLER_BACKOFF_BASE_MS: Joi.number().min(0).default(1000),
  CRAWLER_BACKOFF_FACTOR: Joi.number().min(1).default(2),
  CRAWLER_BACKOFF_JITTER: Joi.number().min(0).max(1).default(0.2),

  // Proxy pool
  PROXY_CATALOG_PATH: Joi.string().default('config/proxy-catalog.json'),
  PROXY_STATE_PATH: Joi.string().default('data/proxy-state.json'),
  PROXY_COOLDOWN_MS: Joi.number().min(0).default(300000),
  PROXY_FAILURE_THRESHOLD: Joi.number().integer().min(1).default(2),

  // Classifier, sources, dedupe
  BLOCK_MARKERS_PATH: Joi.string().default('config/block-markers.json'),
  SOURCES_PATH: Joi.string().default('config/sources.json'),
  DEDUPE_TTL_MS: Joi.number().min(1000).default(21600000),

  // Browser automation service
  BROWSER_SERVICE_URL: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .default('http://browser-service:3001'),
  BROWSER_SERVICE_API_KEY: Joi.string().allow('').default(''),

  // Batch input / report output
  CRAWL_INPUT_PATH: Joi.string().default('config/sample-batch.json'),
  CRAWL_REPORT_PATH: Joi.string().default('data/crawl-report.json'),
});
