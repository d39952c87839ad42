import { Verdict } from '../enums/verdict.enum';

/** One item of the input batch. */
export interface EntityRequest {
  name: string;
  documentNumber?: string;
  /** Known publication URL, used by the direct-url strategy. */
  sourceUrl?: string;
}

export interface AcquisitionAttempt {
  readonly entityKey: string;
  readonly strategyName: string;
  /** Hostname the attempt contacted. */
  readonly site: string;
  /** Endpoint name; null for direct egress. */
  readonly proxyUsed: string | null;
  readonly startedAt: string;
  readonly durationMs: number;
  readonly verdict: Verdict;
  readonly httpStatus?: number;
  readonly detail?: string;
  readonly retryAfterMs?: number;
}

export type TaskStatus = 'Pending' | 'InProgress' | 'Succeeded' | 'Failed';

/** Raw document handed to the parsing and persistence collaborators. */
export interface AcquiredPayload {
  strategyName: string;
  sourceUrl: string;
  contentType: string;
  body: string;
}

export interface EntityTask {
  readonly entityKey: string;
  readonly rawQuery: string;
  readonly request: EntityRequest;
  readonly status: TaskStatus;
  readonly attempts: readonly AcquisitionAttempt[];
  readonly finalVerdict: Verdict | null;
  readonly detail?: string;
  readonly payload?: AcquiredPayload;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
}
