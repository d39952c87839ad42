import * as fs from 'fs';
import * as path from 'path';
import * as Joi from 'joi';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigurationError } from '@/shared/errors/crawl.errors';
import { errorMessage } from '@/shared/lib/util';
import {
  ProxyCatalog,
  ProxyEndpoint,
  ProxyPoolPolicy,
  endpointKey,
} from '../interfaces/proxy.interface';
import { PROXY_CATALOG } from '../proxy.constants';

const sitePreferenceSchema = Joi.object({
  useProxy: Joi.boolean().required(),
  preferredTier: Joi.string().valid('paid', 'free'),
  allowDirect: Joi.boolean(),
});

const endpointSchema = Joi.object({
  name: Joi.string().required(),
  address: Joi.string().hostname().required(),
  port: Joi.number().integer().min(1).max(65535).required(),
  protocol: Joi.string().valid('http', 'https', 'socks5', 'trojan').required(),
  tls: Joi.boolean().default(false),
  credentials: Joi.object({
    username: Joi.string(),
    password: Joi.string(),
  }),
  region: Joi.string().default('unknown'),
  tier: Joi.string().valid('paid', 'free').required(),
  priority: Joi.number().integer().min(1).default(1),
  bridgeUrl: Joi.when('protocol', {
    is: Joi.valid('socks5', 'trojan'),
    then: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    otherwise: Joi.string().uri({ scheme: ['http', 'https'] }),
  }),
}).unknown(true);

const catalogSchema = Joi.object<ProxyCatalog>({
  policy: Joi.object({
    enabled: Joi.boolean().default(true),
    rotationEnabled: Joi.boolean().default(true),
    checkIntervalMinutes: Joi.number().min(1).default(30),
    maxRetries: Joi.number().integer().min(1).default(3),
    timeoutSeconds: Joi.number().min(1).default(10),
    fallbackToDirect: Joi.boolean().default(false),
    defaultSite: sitePreferenceSchema.default({ useProxy: false }),
    sites: Joi.object()
      .pattern(/^(\*\.)?[a-z0-9.-]+$/i, sitePreferenceSchema)
      .default({}),
  }).required(),
  endpoints: Joi.array().items(endpointSchema).default([]),
});

/**
 * Validates a raw catalog document. Throws ConfigurationError when the
 * catalog is malformed or cannot serve its own policy.
 */
export function parseProxyCatalog(raw: unknown): ProxyCatalog {
  const { error, value } = catalogSchema.validate(raw, { abortEarly: false });
  if (error) {
    throw new ConfigurationError(`Invalid proxy catalog: ${error.message}`);
  }

  const seen = new Set<string>();
  for (const endpoint of value.endpoints) {
    const key = endpointKey(endpoint);
    if (seen.has(key)) {
      throw new ConfigurationError(
        `Invalid proxy catalog: endpoint ${key} is declared twice`,
      );
    }
    seen.add(key);
  }

  if (value.policy.enabled && value.endpoints.length === 0) {
    throw new ConfigurationError(
      'Invalid proxy catalog: the pool is enabled but declares no endpoints',
    );
  }

  const endpoints = value.endpoints.map((endpoint) =>
    Object.freeze({
      ...endpoint,
      credentials: endpoint.credentials
        ? Object.freeze({ ...endpoint.credentials })
        : undefined,
    }),
  );

  return {
    policy: value.policy,
    endpoints,
  };
}

@Injectable()
export class ProxyRegistryService {
  private readonly logger = new Logger(ProxyRegistryService.name);
  private readonly catalog: ProxyCatalog;
  private readonly byKey: Map<string, ProxyEndpoint>;

  constructor(@Inject(PROXY_CATALOG) catalog: ProxyCatalog) {
    this.catalog = catalog;
    this.byKey = new Map(
      this.catalog.endpoints.map((endpoint) => [endpointKey(endpoint), endpoint]),
    );

    const paid = this.catalog.endpoints.filter((e) => e.tier === 'paid').length;
    this.logger.log(
      `Loaded ${this.catalog.endpoints.length} proxy endpoints (${paid} paid, ${this.catalog.endpoints.length - paid} free), pool ${this.catalog.policy.enabled ? 'enabled' : 'disabled'}`,
    );
  }

  static load(catalogPath: string): ProxyCatalog {
    const resolved = path.resolve(process.cwd(), catalogPath);
    let raw: unknown;

    try {
      raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read proxy catalog ${resolved}: ${errorMessage(error)}`,
      );
    }

    return parseProxyCatalog(raw);
  }

  getEndpoints(): readonly ProxyEndpoint[] {
    return this.catalog.endpoints;
  }

  getPolicy(): ProxyPoolPolicy {
    return this.catalog.policy;
  }

  findByKey(key: string): ProxyEndpoint | undefined {
    return this.byKey.get(key);
  }
}
