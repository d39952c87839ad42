import * as fs from 'fs';
import * as path from 'path';
import * as Joi from 'joi';
import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { ConfigurationError } from '@/shared/errors/crawl.errors';
import { errorMessage } from '@/shared/lib/util';
import {
  PayloadExpectation,
  StrategyName,
} from '../interfaces/strategy.interface';

export interface SourceDefinition {
  enabled: boolean;
  /** URL with a `{query}` placeholder; absent for direct-url. */
  urlTemplate?: string;
  expect: PayloadExpectation;
}

export type SourceCatalog = Record<StrategyName, SourceDefinition>;

const expectSchema = Joi.object({
  contentType: Joi.string().valid('json', 'html').required(),
  markers: Joi.array().items(Joi.string().min(1)).default([]),
});

const templatedSource = Joi.object({
  enabled: Joi.boolean().default(true),
  urlTemplate: Joi.string()
    .pattern(/^https?:\/\/[^/\s]+/, 'http(s) URL')
    .pattern(/\{query\}/, 'query placeholder')
    .required(),
  expect: expectSchema.required(),
});

const sourcesSchema = Joi.object<SourceCatalog>({
  'structured-database': templatedSource.required(),
  'search-engine': templatedSource.required(),
  'browser-automation': templatedSource.required(),
  'direct-url': Joi.object({
    enabled: Joi.boolean().default(true),
    expect: expectSchema.default({ contentType: 'html', markers: [] }),
  }).default({ enabled: true, expect: { contentType: 'html', markers: [] } }),
});

export function parseSourceCatalog(raw: unknown): SourceCatalog {
  const { error, value } = sourcesSchema.validate(raw, { abortEarly: false });
  if (error) {
    throw new ConfigurationError(`Invalid source catalog: ${error.message}`);
  }
  return value;
}

/**
 * Where each acquisition strategy looks and what its payload looks like.
 */
@Injectable()
export class SourceCatalogService {
  private readonly logger = new Logger(SourceCatalogService.name);
  private readonly catalog: SourceCatalog;

  constructor(@Inject(CRAWLER_SETTINGS) settings: CrawlerSettings) {
    const resolved = path.resolve(process.cwd(), settings.sourcesPath);
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read source catalog ${resolved}: ${errorMessage(error)}`,
      );
    }
    this.catalog = parseSourceCatalog(raw);

    const enabled = Object.entries(this.catalog)
      .filter(([, source]) => source.enabled)
      .map(([name]) => name);
    this.logger.log(`Enabled sources: ${enabled.join(', ') || 'none'}`);
  }

  get(name: StrategyName): SourceDefinition {
    return this.catalog[name];
  }
}
