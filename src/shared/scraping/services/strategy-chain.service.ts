import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import {
  CancelledError,
  ProxyExhaustedError,
} from '@/shared/errors/crawl.errors';
import { CLOCK, Clock } from '@/shared/lib/clock';
import {
  Egress,
  describeEgress,
} from '@/shared/proxy/interfaces/proxy.interface';
import { ProxyPoolService } from '@/shared/proxy/services/proxy-pool.service';
import { Verdict } from '../enums/verdict.enum';
import {
  AcquiredPayload,
  EntityRequest,
  EntityTask,
} from '../interfaces/acquisition.interface';
import { PayloadInspector } from '../interfaces/crawl-result.interface';
import { AcquisitionStrategy } from '../interfaces/strategy.interface';
import { RawOutcome } from '../interfaces/transport.interface';
import { EntityTaskRecord } from '../models/entity-task';
import {
  ACQUISITION_STRATEGIES,
  PAYLOAD_INSPECTOR,
  STRATEGY_ORDER,
} from '../scraping.constants';
import { mapTransportError } from '../transport/http-transport';
import { RateLimiterService } from './rate-limiter.service';
import {
  Classification,
  ResponseClassifierService,
} from './response-classifier.service';
import { RetryControllerService } from './retry-controller.service';

interface StrategyOutcome {
  verdict: Verdict;
  detail?: string;
  payload?: AcquiredPayload;
}

export function rawQueryOf(request: EntityRequest): string {
  const name = request.name.trim();
  const documentNumber = request.documentNumber?.trim();
  return documentNumber ? `${name} ${documentNumber}` : name;
}

/**
 * Runs one entity through the acquisition strategies in priority order.
 * Within a strategy it retries what the retry controller allows; a block
 * or a missing payload moves on to the next strategy.
 */
@Injectable()
export class StrategyChainService {
  private readonly logger = new Logger(StrategyChainService.name);
  private readonly strategies: AcquisitionStrategy[];
  private readonly attemptTimeoutMs: number;
  private readonly maxAttempts: number;

  constructor(
    @Inject(ACQUISITION_STRATEGIES) strategies: AcquisitionStrategy[],
    private readonly pool: ProxyPoolService,
    private readonly rateLimiter: RateLimiterService,
    private readonly classifier: ResponseClassifierService,
    private readonly retry: RetryControllerService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(CRAWLER_SETTINGS) settings: CrawlerSettings,
    @Optional()
    @Inject(PAYLOAD_INSPECTOR)
    private readonly inspector?: PayloadInspector,
  ) {
    this.strategies = [...strategies].sort(
      (a, b) => STRATEGY_ORDER.indexOf(a.name) - STRATEGY_ORDER.indexOf(b.name),
    );
    this.attemptTimeoutMs = settings.attemptTimeoutMs;
    this.maxAttempts = settings.retry.maxAttempts;
  }

  get strategyNames(): string[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  /**
   * Resolves to the terminal task. Never rejects for entity-level
   * failures; a fired signal yields a task failed with Cancelled.
   */
  async execute(
    request: EntityRequest,
    entityKey: string,
    signal: AbortSignal,
  ): Promise<EntityTask> {
    const task = new EntityTaskRecord(entityKey, rawQueryOf(request), request);
    task.start(this.isoNow());

    const candidates = this.strategies.filter((s) => s.supports(request));
    if (candidates.length === 0) {
      return task.fail(
        Verdict.PARSE_FAILURE,
        this.isoNow(),
        'No acquisition strategy supports this request',
      );
    }

    let last: StrategyOutcome = { verdict: Verdict.PARSE_FAILURE };
    let exhausted = false;

    try {
      for (let i = 0; i < candidates.length; i++) {
        const hasNext = i < candidates.length - 1;
        last = await this.runStrategy(
          task,
          candidates[i],
          request,
          signal,
          hasNext,
        );

        if (last.payload) {
          this.logger.log(
            `${entityKey} acquired by ${candidates[i].name} after ${task.attemptCount} attempts`,
          );
          return task.succeed(last.payload, this.isoNow());
        }
        if (last.verdict === Verdict.PROXY_EXHAUSTED) {
          exhausted = true;
        }
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        this.logger.warn(`${entityKey} cancelled`);
        return task.fail(Verdict.CANCELLED, this.isoNow(), error.message);
      }
      throw error;
    }

    const finalVerdict = exhausted ? Verdict.PROXY_EXHAUSTED : last.verdict;
    this.logger.warn(
      `${entityKey} failed with ${finalVerdict} after ${task.attemptCount} attempts`,
    );
    return task.fail(finalVerdict, this.isoNow(), last.detail);
  }

  private async runStrategy(
    task: EntityTaskRecord,
    strategy: AcquisitionStrategy,
    request: EntityRequest,
    signal: AbortSignal,
    hasNext: boolean,
  ): Promise<StrategyOutcome> {
    let attempts = 0;

    for (;;) {
      if (signal.aborted) {
        throw new CancelledError();
      }

      const site = strategy.siteFor(request);
      let egress: Egress;
      try {
        egress = await this.pool.selectEgress(site, {
          protocols: strategy.proxyProtocols,
        });
      } catch (error) {
        if (error instanceof ProxyExhaustedError) {
          const decision = this.retry.decide(
            Verdict.PROXY_EXHAUSTED,
            attempts,
            hasNext,
          );
          this.logger.warn(
            `${task.entityKey} ${strategy.name}: ${error.message} (${decision.action})`,
          );
          return { verdict: Verdict.PROXY_EXHAUSTED, detail: error.message };
        }
        throw error;
      }

      await this.rateLimiter.acquire(signal);

      const startedAt = this.clock.now();
      const raw = await this.attemptWithin(
        strategy,
        request,
        egress,
        signal,
        this.pool.attemptTimeoutMs(egress, this.attemptTimeoutMs),
      );
      const durationMs = this.clock.now() - startedAt;
      attempts++;

      const proxyUsed = egress.kind === 'proxy' ? egress.endpoint.name : null;
      const attemptBase = {
        entityKey: task.entityKey,
        strategyName: strategy.name,
        site,
        proxyUsed,
        startedAt: new Date(startedAt).toISOString(),
        durationMs,
      };

      if (signal.aborted) {
        task.addAttempt({
          ...attemptBase,
          verdict: Verdict.CANCELLED,
          detail: 'Run cancelled during the attempt',
        });
        throw new CancelledError();
      }

      let classification: Classification = this.classifier.classify(
        raw,
        strategy.expectation,
        this.clock.now(),
      );
      let payload: AcquiredPayload | undefined;

      if (classification.verdict === Verdict.SUCCESS && raw.kind === 'response') {
        payload = {
          strategyName: strategy.name,
          sourceUrl: raw.url,
          contentType: raw.contentType,
          body: raw.body,
        };
        const inspection = this.inspector?.inspect(request, payload);
        if (inspection && !inspection.ok) {
          classification = {
            verdict: Verdict.PARSE_FAILURE,
            httpStatus: classification.httpStatus,
            detail: inspection.detail,
          };
          payload = undefined;
        }
      }

      task.addAttempt({
        ...attemptBase,
        verdict: classification.verdict,
        ...(classification.httpStatus !== undefined
          ? { httpStatus: classification.httpStatus }
          : {}),
        ...(classification.detail !== undefined
          ? { detail: classification.detail }
          : {}),
        ...(classification.retryAfterMs !== undefined
          ? { retryAfterMs: classification.retryAfterMs }
          : {}),
      });

      this.logger.log(
        `${task.entityKey} ${strategy.name} #${attempts} via ${describeEgress(egress)} → ${classification.verdict}${classification.httpStatus ? ` (${classification.httpStatus})` : ''} in ${durationMs}ms`,
      );

      await this.pool.recordOutcome(egress, classification.verdict);
      this.rateLimiter.reportVerdict(classification.verdict);

      const decision = this.retry.decide(
        classification.verdict,
        attempts,
        hasNext,
        classification.retryAfterMs,
        this.pool.attemptBudget(egress, this.maxAttempts),
      );

      switch (decision.action) {
        case 'complete':
          return { verdict: classification.verdict, payload };
        case 'backoff':
          this.logger.debug(
            `${task.entityKey} ${strategy.name}: backing off ${decision.delayMs}ms`,
          );
          await this.clock.sleep(decision.delayMs, signal);
          break;
        case 'escalate':
        case 'give-up':
          this.logger.debug(
            `${task.entityKey} ${strategy.name}: ${decision.action} (${decision.reason})`,
          );
          return {
            verdict: classification.verdict,
            detail: classification.detail,
          };
      }
    }
  }

  /**
   * One strategy attempt that settles no later than `timeoutMs`, whether or
   * not the strategy honours its signal. Never rejects.
   */
  private attemptWithin(
    strategy: AcquisitionStrategy,
    request: EntityRequest,
    egress: Egress,
    signal: AbortSignal,
    timeoutMs: number,
  ): Promise<RawOutcome> {
    const deadline = AbortSignal.timeout(timeoutMs);
    const attemptSignal = AbortSignal.any([signal, deadline]);
    const interrupted = (): RawOutcome =>
      deadline.aborted && !signal.aborted
        ? {
            kind: 'failure',
            code: 'timeout',
            message: `Attempt exceeded ${timeoutMs}ms`,
          }
        : { kind: 'failure', code: 'aborted', message: 'Run cancelled' };

    if (attemptSignal.aborted) {
      return Promise.resolve(interrupted());
    }

    return new Promise<RawOutcome>((resolve) => {
      const onAbort = () => resolve(interrupted());
      attemptSignal.addEventListener('abort', onAbort, { once: true });
      void strategy
        .attempt(request, egress, { signal: attemptSignal, timeoutMs })
        .catch((error: unknown) => mapTransportError(error))
        .then((raw) => {
          attemptSignal.removeEventListener('abort', onAbort);
          resolve(raw);
        });
    });
  }

  private isoNow(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
