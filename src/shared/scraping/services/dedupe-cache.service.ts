import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { errorMessage } from '@/shared/lib/util';
import { EntityTask } from '../interfaces/acquisition.interface';

export interface DedupeResolution {
  task: EntityTask;
  /** True when this caller did not run the resolution itself. */
  fromCache: boolean;
}

function isSucceededTask(value: unknown): value is EntityTask {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.entityKey === 'string' &&
    record.status === 'Succeeded' &&
    Array.isArray(record.attempts)
  );
}

/**
 * One resolution per entity key and run. The in-flight map is checked and
 * filled synchronously, so concurrent claims for a key share the first
 * claim's promise. Succeeded tasks are also kept in the cache store with a
 * TTL, keyed by entity alone, so later runs skip entities already acquired.
 *
 * In-flight key: {runId}:{entityKey}. Store key: dedupe:{entityKey}
 */
@Injectable()
export class DedupeCacheService {
  private readonly logger = new Logger(DedupeCacheService.name);
  private readonly KEY_PREFIX = 'dedupe:';
  private readonly inFlight = new Map<string, Promise<DedupeResolution>>();
  private readonly ttlMs: number;

  constructor(
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
    @Inject(CRAWLER_SETTINGS) settings: CrawlerSettings,
  ) {
    this.ttlMs = settings.dedupeTtlMs;
  }

  claim(
    runId: string,
    entityKey: string,
    resolver: () => Promise<EntityTask>,
  ): Promise<DedupeResolution> {
    const key = `${runId}:${entityKey}`;

    const existing = this.inFlight.get(key);
    if (existing) {
      this.logger.debug(`Dedupe hit for ${entityKey}`);
      return existing.then(({ task }) => ({ task, fromCache: true }));
    }

    const resolution = this.resolveOnce(entityKey, resolver);
    this.inFlight.set(key, resolution);
    return resolution;
  }

  /** Drops the in-flight entries of a finished run. */
  forgetRun(runId: string): void {
    const prefix = `${runId}:`;
    for (const key of [...this.inFlight.keys()]) {
      if (key.startsWith(prefix)) {
        this.inFlight.delete(key);
      }
    }
  }

  private async resolveOnce(
    entityKey: string,
    resolver: () => Promise<EntityTask>,
  ): Promise<DedupeResolution> {
    const storeKey = this.storeKeyFor(entityKey);
    const stored = await this.readStore(storeKey);
    if (stored) {
      this.logger.log(`${entityKey} already acquired, skipping`);
      return { task: stored, fromCache: true };
    }

    const task = await resolver();
    if (task.status === 'Succeeded') {
      await this.writeStore(storeKey, task);
    }
    return { task, fromCache: false };
  }

  private async readStore(key: string): Promise<EntityTask | undefined> {
    try {
      const value = await this.cache.get<unknown>(key);
      return isSucceededTask(value) ? value : undefined;
    } catch (error) {
      this.logger.warn(`Dedupe store read failed for ${key}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async writeStore(key: string, task: EntityTask): Promise<void> {
    try {
      await this.cache.set(key, task, this.ttlMs);
    } catch (error) {
      this.logger.warn(`Dedupe store write failed for ${key}: ${errorMessage(error)}`);
    }
  }

  private storeKeyFor(entityKey: string): string {
    return `${this.KEY_PREFIX}${entityKey}`;
  }
}
