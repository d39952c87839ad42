import { setTimeout as delay } from 'node:timers/promises';
import { Injectable } from '@nestjs/common';
import { CancelledError } from '@/shared/errors/crawl.errors';

export const CLOCK = 'CLOCK';

/**
 * Time source for cooldowns, token refills and backoff waits.
 */
export interface Clock {
  now(): number;
  /** Rejects with CancelledError when the signal fires first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

@Injectable()
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    if (ms <= 0) {
      return;
    }

    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      throw error;
    }
  }
}
