import { PreconditionError } from "../errors.js";
import type { BucketInfo } from "../types/breaker-state.js";

interface Bucket {
  successCount: number;
  failureCount: number;
}

export interface WindowedCounterOptions {
  capacity: number;
  spanMs: number;
  /** Epoch ms the first span starts at. */
  startedAt: number;
}

/**
 * Fixed-capacity circular window of time buckets.
 *
 * Each bucket tallies outcomes for one `spanMs` slice of time. The bucket at
 * `cursor` is the span still in progress and never counts towards the error
 * rate. The cursor position is derived from the absolute time elapsed since
 * `startedAt`, so calling {@link advance} repeatedly with the same timestamp
 * is a no-op and infrequent calls do not drift.
 */
export class WindowedCounter {
  readonly capacity: number;
  readonly spanMs: number;
  private buckets: Bucket[];
  private _cursor = 0;
  private _startedAt: number;
  private spansApplied = 0; // whole spans between startedAt and the last advance

  constructor(options: WindowedCounterOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new PreconditionError(
        `WindowedCounter capacity must be a positive integer, got ${options.capacity}`,
      );
    }
    if (!Number.isFinite(options.spanMs) || options.spanMs <= 0) {
      throw new PreconditionError(`WindowedCounter spanMs must be positive, got ${options.spanMs}`);
    }
    this.capacity = options.capacity;
    this.spanMs = options.spanMs;
    this._startedAt = options.startedAt;
    this.buckets = Array.from({ length: this.capacity }, () => ({
      successCount: 0,
      failureCount: 0,
    }));
  }

  get cursor(): number {
    return this._cursor;
  }

  get startedAt(): number {
    return this._startedAt;
  }

  /**
   * Move the cursor forward by the number of whole spans that elapsed since
   * the last advance, zeroing every bucket it passes through or lands on.
   */
  advance(now: number): void {
    const target = Math.floor((now - this._startedAt) / this.spanMs);
    const steps = target - this.spansApplied;
    if (steps <= 0) return;

    if (steps >= this.capacity) {
      for (const bucket of this.buckets) clear(bucket);
    } else {
      for (let i = 1; i <= steps; i++) {
        clear(this.buckets[(this._cursor + i) % this.capacity]);
      }
    }

    this._cursor = (this._cursor + steps) % this.capacity;
    this.spansApplied = target;
  }

  recordSuccess(now: number): void {
    this.advance(now);
    this.buckets[this._cursor].successCount++;
  }

  recordFailure(now: number): void {
    this.advance(now);
    this.buckets[this._cursor].failureCount++;
  }

  /**
   * Failure percentage across every completed bucket, rounded to two decimals.
   * Returns 0 while fewer than `minEvalSize` outcomes have been observed.
   */
  errorRate(minEvalSize: number): number {
    let failures = 0;
    let successes = 0;
    for (let i = 0; i < this.capacity; i++) {
      if (i === this._cursor) continue;
      failures += this.buckets[i].failureCount;
      successes += this.buckets[i].successCount;
    }

    const total = failures + successes;
    if (total === 0 || total < minEvalSize) return 0;
    return Math.round((failures / total) * 10000) / 100;
  }

  inspectBucket(index: number): BucketInfo {
    if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
      throw new PreconditionError(
        `Bucket index ${index} out of range for window of ${this.capacity}`,
      );
    }
    const { successCount, failureCount } = this.buckets[index];
    return { successCount, failureCount };
  }

  /** Copies of every bucket in index order (not oldest-first). */
  snapshot(): BucketInfo[] {
    return this.buckets.map(({ successCount, failureCount }) => ({ successCount, failureCount }));
  }

  /** Time spent so far in the current span. */
  elapsedInSpan(now: number): number {
    const elapsed = now - this._startedAt;
    if (elapsed <= 0) return 0;
    return elapsed % this.spanMs;
  }

  /** Zero every bucket and start a fresh window at `now`. */
  reset(now: number): void {
    for (const bucket of this.buckets) clear(bucket);
    this._cursor = 0;
    this._startedAt = now;
    this.spansApplied = 0;
  }
}

function clear(bucket: Bucket): void {
  bucket.successCount = 0;
  bucket.failureCount = 0;
}
