import { Inject, Injectable, Optional } from '@nestjs/common';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
  RetrySettings,
} from '@/shared/config/crawler.config';
import { Verdict } from '../enums/verdict.enum';
import { RETRY_RANDOM } from '../scraping.constants';

export type RetryDecision =
  | { action: 'complete' }
  | { action: 'backoff'; delayMs: number }
  | { action: 'escalate'; reason: string }
  | { action: 'give-up'; reason: string };

/** Uniform random source in [0, 1). */
export type RandomSource = () => number;

/**
 * Decides what follows an attempt: finish, wait and retry the same
 * strategy, move to the next strategy, or stop.
 */
@Injectable()
export class RetryControllerService {
  private readonly settings: RetrySettings;
  private readonly random: RandomSource;

  constructor(
    @Inject(CRAWLER_SETTINGS) settings: CrawlerSettings,
    @Optional() @Inject(RETRY_RANDOM) random?: RandomSource,
  ) {
    this.settings = settings.retry;
    this.random = random ?? Math.random;
  }

  /**
   * @param attemptsForStrategy attempts made so far with the current strategy
   * @param retryAfterMs server hint; the backoff never undercuts it
   * @param maxAttempts lower cap than the configured one, if any
   */
  decide(
    verdict: Verdict,
    attemptsForStrategy: number,
    hasNextStrategy: boolean,
    retryAfterMs?: number,
    maxAttempts: number = this.settings.maxAttempts,
  ): RetryDecision {
    switch (verdict) {
      case Verdict.SUCCESS:
        return { action: 'complete' };

      case Verdict.TRANSIENT_ERROR:
      case Verdict.RATE_LIMITED:
        if (attemptsForStrategy < Math.min(maxAttempts, this.settings.maxAttempts)) {
          const delayMs = Math.max(
            this.backoffDelay(attemptsForStrategy),
            retryAfterMs ?? 0,
          );
          return { action: 'backoff', delayMs };
        }
        return this.escalate(
          `${verdict} after ${attemptsForStrategy} attempts`,
          hasNextStrategy,
        );

      case Verdict.HARD_BLOCK:
      case Verdict.SOFT_BLOCK:
      case Verdict.PARSE_FAILURE:
      case Verdict.PROXY_EXHAUSTED:
        return this.escalate(verdict, hasNextStrategy);

      case Verdict.CANCELLED:
        return { action: 'give-up', reason: 'cancelled' };
    }
  }

  /**
   * base * factor^(n-1), spread by ±jitter.
   */
  backoffDelay(attemptNumber: number): number {
    const { backoffBaseMs, backoffFactor, backoffJitter } = this.settings;
    const exponential =
      backoffBaseMs * Math.pow(backoffFactor, Math.max(0, attemptNumber - 1));
    const spread = 1 + (this.random() * 2 - 1) * backoffJitter;
    return Math.max(0, Math.round(exponential * spread));
  }

  private escalate(reason: string, hasNextStrategy: boolean): RetryDecision {
    return hasNextStrategy
      ? { action: 'escalate', reason }
      : { action: 'give-up', reason: `${reason}, no strategy left` };
  }
}
