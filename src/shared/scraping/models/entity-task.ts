import { IllegalTaskTransitionError } from '@/shared/errors/crawl.errors';
import { Verdict } from '../enums/verdict.enum';
import {
  AcquiredPayload,
  AcquisitionAttempt,
  EntityRequest,
  EntityTask,
  TaskStatus,
} from '../interfaces/acquisition.interface';

/**
 * Mutable lifecycle of one entity task. Pending → InProgress →
 * Succeeded | Failed, each step once; the terminal step returns a frozen
 * EntityTask.
 */
export class EntityTaskRecord {
  private status: TaskStatus = 'Pending';
  private readonly attempts: AcquisitionAttempt[] = [];
  private startedAt: string | null = null;

  constructor(
    readonly entityKey: string,
    readonly rawQuery: string,
    readonly request: EntityRequest,
  ) {}

  get currentStatus(): TaskStatus {
    return this.status;
  }

  get attemptCount(): number {
    return this.attempts.length;
  }

  start(at: string): void {
    this.transition('Pending', 'InProgress');
    this.startedAt = at;
  }

  addAttempt(attempt: AcquisitionAttempt): void {
    if (this.status !== 'InProgress') {
      throw new IllegalTaskTransitionError(
        this.entityKey,
        this.status,
        'InProgress',
      );
    }
    this.attempts.push(Object.freeze({ ...attempt }));
  }

  succeed(payload: AcquiredPayload, at: string): EntityTask {
    this.transition('InProgress', 'Succeeded');
    return this.freeze(Verdict.SUCCESS, at, undefined, payload);
  }

  fail(verdict: Verdict, at: string, detail?: string): EntityTask {
    this.transition('InProgress', 'Failed');
    return this.freeze(verdict, at, detail);
  }

  private transition(from: TaskStatus, to: TaskStatus): void {
    if (this.status !== from) {
      throw new IllegalTaskTransitionError(this.entityKey, this.status, to);
    }
    this.status = to;
  }

  private freeze(
    finalVerdict: Verdict,
    finishedAt: string,
    detail?: string,
    payload?: AcquiredPayload,
  ): EntityTask {
    const task: EntityTask = {
      entityKey: this.entityKey,
      rawQuery: this.rawQuery,
      request: Object.freeze({ ...this.request }),
      status: this.status,
      attempts: Object.freeze([...this.attempts]),
      finalVerdict,
      ...(detail !== undefined ? { detail } : {}),
      ...(payload ? { payload: Object.freeze({ ...payload }) } : {}),
      startedAt: this.startedAt,
      finishedAt,
    };
    return Object.freeze(task);
  }
}
