import { Injectable, Logger } from '@nestjs/common';
import {
  CrawlResultSink,
  CrawlRunReport,
  EntityResult,
} from '../interfaces/crawl-result.interface';

/**
 * Default result sink: one log line per entity and a run summary.
 */
@Injectable()
export class LoggingResultSink implements CrawlResultSink {
  private readonly logger = new Logger(LoggingResultSink.name);

  async publish({ entityKey, fromCache, task }: EntityResult): Promise<void> {
    const source = fromCache ? ' (deduplicated)' : '';
    if (task.status === 'Succeeded') {
      this.logger.log(
        `✅ ${entityKey}${source}: ${task.payload?.strategyName ?? 'unknown'} ${task.payload?.sourceUrl ?? ''}`,
      );
    } else {
      this.logger.warn(
        `❌ ${entityKey}${source}: ${task.finalVerdict}${task.detail ? ` (${task.detail})` : ''}`,
      );
    }
  }

  async complete(report: CrawlRunReport): Promise<void> {
    const { statistics } = report;
    this.logger.log(
      `Run ${report.runId} summary: ${JSON.stringify({
        partial: report.partial,
        succeeded: statistics.succeeded,
        failed: statistics.failed,
        cancelled: statistics.cancelled,
        notAdmitted: statistics.notAdmitted,
        wafTriggered: statistics.wafTriggeredCount,
        wafBySite: statistics.wafTriggeredBySite,
        perStrategy: statistics.perStrategySuccessCount,
        perProxy: statistics.perProxySuccessCount,
      })}`,
    );
  }
}
