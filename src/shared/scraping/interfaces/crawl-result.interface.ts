import { AcquiredPayload, EntityRequest, EntityTask } from './acquisition.interface';

export interface EntityResult {
  request: EntityRequest;
  entityKey: string;
  /**
   * True when the task came from another entry of this run or from an
   * earlier run that acquired the same key.
   */
  fromCache: boolean;
  task: EntityTask;
}

export interface RunStatistics {
  totalEntities: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  cacheHits: number;
  notAdmitted: number;
  attemptsTotal: number;
  perStrategySuccessCount: Record<string, number>;
  perProxySuccessCount: Record<string, number>;
  /** Attempts classified HardBlock or SoftBlock. */
  wafTriggeredCount: number;
  /** The same attempts, by the site they contacted. */
  wafTriggeredBySite: Record<string, number>;
}

export interface CrawlRunReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  /** True when the run was cancelled or hit its deadline. */
  partial: boolean;
  statistics: RunStatistics;
  results: EntityResult[];
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Overrides the configured run deadline. */
  deadlineMs?: number | null;
}

/**
 * Parsing collaborator. Rejecting a payload turns a Success into a
 * ParseFailure.
 */
export interface PayloadInspector {
  inspect(
    request: EntityRequest,
    payload: AcquiredPayload,
  ): { ok: true } | { ok: false; detail: string };
}

/** Persistence and reporting collaborator. */
export interface CrawlResultSink {
  publish(result: EntityResult): Promise<void>;
  complete(report: CrawlRunReport): Promise<void>;
}
