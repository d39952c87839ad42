import { Verdict, WAF_VERDICTS } from '../enums/verdict.enum';
import { EntityResult, RunStatistics } from '../interfaces/crawl-result.interface';

/**
 * Folds entity results into run totals. One recorder per run.
 */
export class RunStatisticsRecorder {
  private readonly stats: RunStatistics = {
    totalEntities: 0,
    succeeded: 0,
    failed: 0,
    cancelled: 0,
    cacheHits: 0,
    notAdmitted: 0,
    attemptsTotal: 0,
    perStrategySuccessCount: {},
    perProxySuccessCount: {},
    wafTriggeredCount: 0,
    wafTriggeredBySite: {},
  };

  constructor(totalEntities: number) {
    this.stats.totalEntities = totalEntities;
  }

  record(result: EntityResult): void {
    const { task } = result;

    if (result.fromCache) {
      this.stats.cacheHits++;
    } else {
      // Attempts of a shared task are counted once, by the resolving entry
      this.stats.attemptsTotal += task.attempts.length;
      for (const attempt of task.attempts) {
        if (WAF_VERDICTS.has(attempt.verdict)) {
          this.stats.wafTriggeredCount++;
          this.increment(this.stats.wafTriggeredBySite, attempt.site);
        }
      }
    }

    if (task.status === 'Succeeded') {
      this.stats.succeeded++;
      if (!result.fromCache) {
        const winning = task.attempts[task.attempts.length - 1];
        if (winning) {
          this.increment(this.stats.perStrategySuccessCount, winning.strategyName);
          if (winning.proxyUsed) {
            this.increment(this.stats.perProxySuccessCount, winning.proxyUsed);
          }
        }
      }
    } else if (task.finalVerdict === Verdict.CANCELLED) {
      this.stats.cancelled++;
    } else {
      this.stats.failed++;
    }
  }

  recordNotAdmitted(count: number): void {
    this.stats.notAdmitted += count;
  }

  snapshot(): RunStatistics {
    return {
      ...this.stats,
      perStrategySuccessCount: { ...this.stats.perStrategySuccessCount },
      perProxySuccessCount: { ...this.stats.perProxySuccessCount },
      wafTriggeredBySite: { ...this.stats.wafTriggeredBySite },
    };
  }

  private increment(counter: Record<string, number>, key: string): void {
    counter[key] = (counter[key] ?? 0) + 1;
  }
}
