import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CRAWLER_SETTINGS,
  CrawlerSettings,
} from '@/shared/config/crawler.config';
import { CancelledError } from '@/shared/errors/crawl.errors';
import { CLOCK, Clock } from '@/shared/lib/clock';
import { Verdict, WAF_VERDICTS } from '../enums/verdict.enum';

/** Spacing multiplier by consecutive blocked attempts, highest first. */
const DETECTION_LEVELS: ReadonlyArray<[blocks: number, multiplier: number]> = [
  [10, 10],
  [5, 5],
  [3, 3],
  [1, 2],
];

/**
 * Run-wide outbound gate: a token bucket (burst capacity, refill at the
 * per-minute rate) plus a minimum spacing between grants. Waiters are
 * served in arrival order. The spacing widens while targets keep blocking
 * and returns to normal on the next success.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private readonly minIntervalMs: number;
  private tokens: number;
  private lastRefill: number;
  private lastGrant = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();
  private granted = 0;
  private consecutiveBlocks = 0;

  constructor(
    @Inject(CRAWLER_SETTINGS) settings: CrawlerSettings,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.capacity = Math.max(1, settings.burstSize);
    this.refillPerMs = settings.requestsPerMinute / 60_000;
    this.minIntervalMs = settings.requestIntervalMs;
    this.tokens = this.capacity;
    this.lastRefill = clock.now();
  }

  get grantedCount(): number {
    return this.granted;
  }

  get spacingMultiplier(): number {
    const level = DETECTION_LEVELS.find(
      ([blocks]) => this.consecutiveBlocks >= blocks,
    );
    return level ? level[1] : 1;
  }

  /** Feeds one classified attempt into the detection level. */
  reportVerdict(verdict: Verdict): void {
    const before = this.spacingMultiplier;

    if (verdict === Verdict.SUCCESS) {
      this.consecutiveBlocks = 0;
    } else if (WAF_VERDICTS.has(verdict) || verdict === Verdict.RATE_LIMITED) {
      this.consecutiveBlocks++;
    }

    const after = this.spacingMultiplier;
    if (after !== before) {
      this.logger.log(`Request spacing x${before} → x${after}`);
    }
  }

  /**
   * Resolves when the caller may send one request.
   * @throws CancelledError when the signal fires while waiting
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    const turn = this.tail.then(() => this.waitForToken(signal));
    this.tail = turn.catch(() => undefined);

    if (!signal) {
      return turn;
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(new CancelledError());
      signal.addEventListener('abort', onAbort, { once: true });
      void turn
        .then(resolve, reject)
        .finally(() => signal.removeEventListener('abort', onAbort));
    });
  }

  private async waitForToken(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError();
      }

      const now = this.clock.now();
      this.refill(now);

      const intervalWait =
        this.lastGrant + this.minIntervalMs * this.spacingMultiplier - now;
      const tokenWait =
        this.tokens >= 1 ? 0 : Math.ceil((1 - this.tokens) / this.refillPerMs);
      const wait = Math.max(intervalWait, tokenWait);

      if (wait <= 0) {
        this.tokens -= 1;
        this.lastGrant = now;
        this.granted++;
        return;
      }

      this.logger.debug(`Rate limit: waiting ${wait}ms`);
      await this.clock.sleep(wait, signal);
    }
  }

  private refill(now: number): void {
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(
        this.capacity,
        this.tokens + elapsed * this.refillPerMs,
      );
      this.lastRefill = now;
    }
  }
}
