import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { ConfigurationError } from '@/shared/errors/crawl.errors';
import { CLOCK, Clock } from '@/shared/lib/clock';
import { errorMessage, normalizeEntityKey } from '@/shared/lib/util';
import { Verdict } from '../enums/verdict.enum';
import {
  EntityRequest,
  EntityTask,
} from '../interfaces/acquisition.interface';
import {
  CrawlResultSink,
  CrawlRunReport,
  EntityResult,
  RunOptions,
} from '../interfaces/crawl-result.interface';
import { EntityTaskRecord } from '../models/entity-task';
import { CRAWL_RESULT_SINK } from '../scraping.constants';
import { DedupeCacheService } from './dedupe-cache.service';
import { RunStatisticsRecorder } from './run-statistics';
import { StrategyChainService, rawQueryOf } from './strategy-chain.service';

/**
 * Runs a batch of entity requests with at most `maxConcurrent` tasks in
 * flight. Duplicate keys resolve once per run. The run signal and the
 * optional deadline stop admission and cancel in-flight tasks.
 */
@Injectable()
export class CrawlOrchestratorService {
  private readonly logger = new Logger(CrawlOrchestratorService.name);

  constructor(
    private readonly chain: StrategyChainService,
    private readonly dedupe: DedupeCacheService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(CRAWLER_SETTINGS) private readonly settings: CrawlerSettings,
    @Inject(CRAWL_RESULT_SINK) private readonly sink: CrawlResultSink,
  ) {}

  async run(
    requests: EntityRequest[],
    options: RunOptions = {},
  ): Promise<CrawlRunReport> {
    const runId = uuidv4();
    const startedAt = this.isoNow();
    const controller = new AbortController();
    const { signal } = controller;

    const onExternalAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const deadlineMs =
      options.deadlineMs !== undefined
        ? options.deadlineMs
        : this.settings.runDeadlineMs;
    let deadlineTimer: NodeJS.Timeout | undefined;
    if (deadlineMs !== null && deadlineMs > 0) {
      deadlineTimer = setTimeout(() => {
        this.logger.warn(`Run ${runId} reached its ${deadlineMs}ms deadline`);
        controller.abort();
      }, deadlineMs);
      deadlineTimer.unref();
    }

    const concurrency = Math.max(1, this.settings.maxConcurrent);
    this.logger.log(
      `Run ${runId}: ${requests.length} entities, ${concurrency} workers, strategies ${this.chain.strategyNames.join(' → ')}`,
    );

    const recorder = new RunStatisticsRecorder(requests.length);
    const results: Array<EntityResult | undefined> = new Array(requests.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < requests.length && !signal.aborted) {
        const index = nextIndex++;
        const result = await this.resolveEntity(runId, requests[index], signal);
        results[index] = result;
        recorder.record(result);
        await this.publish(result);
      }
    };

    try {
      await Promise.all(
        Array.from({ length: Math.min(concurrency, requests.length) }, () =>
          worker().catch((error: unknown) => {
            controller.abort();
            throw error;
          }),
        ),
      );
    } finally {
      if (deadlineTimer) {
        clearTimeout(deadlineTimer);
      }
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.dedupe.forgetRun(runId);
    }

    const admitted = results.filter(
      (result): result is EntityResult => result !== undefined,
    );
    recorder.recordNotAdmitted(requests.length - admitted.length);

    const report: CrawlRunReport = {
      runId,
      startedAt,
      finishedAt: this.isoNow(),
      partial: signal.aborted,
      statistics: recorder.snapshot(),
      results: admitted,
    };

    const { statistics } = report;
    this.logger.log(
      `Run ${runId} finished${report.partial ? ' (partial)' : ''}: ${statistics.succeeded} succeeded, ${statistics.failed} failed, ${statistics.cancelled} cancelled, ${statistics.notAdmitted} not admitted, ${statistics.cacheHits} cache hits, ${statistics.attemptsTotal} attempts`,
    );

    try {
      await this.sink.complete(report);
    } catch (error) {
      this.logger.error(`Result sink failed to complete run ${runId}: ${errorMessage(error)}`);
    }

    return report;
  }

  private async resolveEntity(
    runId: string,
    request: EntityRequest,
    signal: AbortSignal,
  ): Promise<EntityResult> {
    const entityKey = normalizeEntityKey(request.name, request.documentNumber);

    try {
      const { task, fromCache } = await this.dedupe.claim(
        runId,
        entityKey,
        () => this.chain.execute(request, entityKey, signal),
      );
      return { request, entityKey, fromCache, task };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      this.logger.error(
        `Entity ${entityKey} failed unexpectedly: ${errorMessage(error)}`,
      );
      return {
        request,
        entityKey,
        fromCache: false,
        task: this.unexpectedFailure(request, entityKey, error),
      };
    }
  }

  private unexpectedFailure(
    request: EntityRequest,
    entityKey: string,
    error: unknown,
  ): EntityTask {
    const record = new EntityTaskRecord(entityKey, rawQueryOf(request), request);
    const now = this.isoNow();
    record.start(now);
    return record.fail(Verdict.TRANSIENT_ERROR, now, errorMessage(error));
  }

  private async publish(result: EntityResult): Promise<void> {
    try {
      await this.sink.publish(result);
    } catch (error) {
      this.logger.error(
        `Result sink rejected ${result.entityKey}: ${errorMessage(error)}`,
      );
    }
  }

  private isoNow(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
