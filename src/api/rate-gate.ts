/**
 * Cadence limiter for video snapshots.
 *
 * Answers whether an emission tick is due and records when one happened.
 * Only the decode loop touches it, so there is no locking.
 *
 * @example
 * ```typescript
 * const gate = new RateGate(1000);
 *
 * const now = Date.now();
 * if (gate.isOpen(now)) {
 *   await emit();
 *   gate.advance(now);
 * }
 * ```
 */
export class RateGate {
  private lastEmit = 0;
  private interval: number;

  /**
   * @param intervalMs - Minimum spacing between two emissions
   */
  constructor(intervalMs: number) {
    this.interval = Math.max(0, intervalMs);
  }

  /**
   * Configured minimum spacing (ms).
   */
  get intervalMs(): number {
    return this.interval;
  }

  /**
   * Time of the last emission tick, 0 before the first one.
   */
  get lastEmitTimestamp(): number {
    return this.lastEmit;
  }

  /**
   * Whether an emission tick is due at `now`.
   */
  isOpen(now: number): boolean {
    return now - this.lastEmit >= this.interval;
  }

  /**
   * Record an emission tick. Call at most once per tick.
   */
  advance(now: number): void {
    this.lastEmit = now;
  }
}
