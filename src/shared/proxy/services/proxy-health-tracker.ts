import { Clock } from '@/shared/lib/clock';
import { ProxyHealthState } from '../interfaces/proxy.interface';

export interface HealthTrackerOptions {
  cooldownMs: number;
  /** Consecutive soft failures that put an endpoint into cooldown. */
  failureThreshold: number;
}

function freshState(): ProxyHealthState {
  return {
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    cooldownUntil: null,
    lastCheckedAt: null,
    totalAttempts: 0,
    totalSuccesses: 0,
  };
}

function isHealthState(value: unknown): value is ProxyHealthState {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const state: Record<string, unknown> = { ...value };
  const isCount = (v: unknown) =>
    typeof v === 'number' && Number.isInteger(v) && v >= 0;
  const isTimeOrNull = (v: unknown) =>
    v === null || (typeof v === 'number' && Number.isFinite(v));

  return (
    isCount(state.consecutiveFailures) &&
    isCount(state.consecutiveSuccesses) &&
    isCount(state.totalAttempts) &&
    isCount(state.totalSuccesses) &&
    isTimeOrNull(state.cooldownUntil) &&
    isTimeOrNull(state.lastCheckedAt)
  );
}

/**
 * Mutable health per endpoint key. Owned by ProxyPoolService, which is the
 * only writer.
 */
export class ProxyHealthTracker {
  private readonly states = new Map<string, ProxyHealthState>();

  constructor(
    private readonly clock: Clock,
    private readonly options: HealthTrackerOptions,
  ) {}

  private stateOf(key: string): ProxyHealthState {
    let state = this.states.get(key);
    if (!state) {
      state = freshState();
      this.states.set(key, state);
    }
    return state;
  }

  isCoolingDown(key: string): boolean {
    const until = this.states.get(key)?.cooldownUntil ?? null;
    return until !== null && until > this.clock.now();
  }

  recordSuccess(key: string): void {
    const state = this.stateOf(key);
    state.consecutiveFailures = 0;
    state.consecutiveSuccesses++;
    state.totalAttempts++;
    state.totalSuccesses++;
    state.lastCheckedAt = this.clock.now();
  }

  /**
   * Counts a failure. `immediate` skips the threshold. Returns true when the
   * endpoint entered cooldown.
   */
  recordFailure(key: string, immediate: boolean): boolean {
    const state = this.stateOf(key);
    const now = this.clock.now();
    state.consecutiveSuccesses = 0;
    state.consecutiveFailures++;
    state.totalAttempts++;
    state.lastCheckedAt = now;

    if (immediate || state.consecutiveFailures >= this.options.failureThreshold) {
      state.cooldownUntil = now + this.options.cooldownMs;
      return true;
    }
    return false;
  }

  /** Clears expired cooldowns and returns the released keys. */
  sweep(): string[] {
    const now = this.clock.now();
    const released: string[] = [];

    for (const [key, state] of this.states) {
      if (state.cooldownUntil !== null && state.cooldownUntil <= now) {
        state.cooldownUntil = null;
        state.consecutiveFailures = 0;
        released.push(key);
      }
    }
    return released;
  }

  get(key: string): ProxyHealthState {
    return { ...this.stateOf(key) };
  }

  /**
   * Loads persisted states for the given keys. Unknown keys and malformed
   * entries are skipped; returns the number of states taken.
   */
  restore(persisted: Record<string, unknown>, knownKeys: Iterable<string>): number {
    let restored = 0;
    for (const key of knownKeys) {
      const candidate = persisted[key];
      if (isHealthState(candidate)) {
        this.states.set(key, { ...candidate });
        restored++;
      }
    }
    return restored;
  }

  snapshot(): Record<string, ProxyHealthState> {
    const result: Record<string, ProxyHealthState> = {};
    for (const [key, state] of this.states) {
      result[key] = { ...state };
    }
    return result;
  }
}
