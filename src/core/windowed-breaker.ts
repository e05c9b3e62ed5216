import { systemClock } from "../adapters/system-clock.js";
import type { CircuitBreaker } from "../interfaces/circuit-breaker.js";
import type { Clock } from "../interfaces/clock.js";
import type { Logger } from "../interfaces/logger.js";
import type { BreakerState, BucketInfo } from "../types/breaker-state.js";
import type { BreakerConfig } from "../types/config.js";
import type { BreakerEventMap } from "../types/events.js";
import { noopLogger } from "../utils/noop-logger.js";
import { TypedEventEmitter } from "./typed-emitter.js";
import { WindowedCounter } from "./windowed-counter.js";

export interface WindowedBreakerOptions {
  config: BreakerConfig;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Circuit breaker driven by a rolling error rate over time buckets.
 *
 * CLOSED: outcomes are tallied; opens once the rate over completed spans is
 *   strictly above `errorThreshold`
 * OPEN: outcomes are ignored; moves to HALF_OPEN after `retryTimeoutMs`
 * HALF_OPEN: `trialSuccessRequired` consecutive successes close the breaker
 *   and clear the window, a single failure reopens it
 *
 * There is no timer. Every call reads the clock once and applies whatever
 * transition is due before doing anything else. Not safe for concurrent use
 * without external serialization.
 */
export class WindowedBreaker extends TypedEventEmitter<BreakerEventMap> implements CircuitBreaker {
  private state: BreakerState = { kind: "closed" };
  private trialSuccesses = 0;
  private readonly config: Readonly<BreakerConfig>;
  private readonly window: WindowedCounter;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: WindowedBreakerOptions) {
    super();
    this.config = Object.freeze({ ...options.config });
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
    this.window = new WindowedCounter({
      capacity: this.config.capacity,
      spanMs: this.config.spanMs,
      startedAt: this.clock.now(),
    });
  }

  reportOutcome(isSuccess: boolean): void {
    const now = this.clock.now();
    this.evaluate(now);

    switch (this.state.kind) {
      case "open":
        this.logger.debug?.("outcome ignored while open", { success: isSuccess });
        return;
      case "half_open":
        if (isSuccess) {
          this.trialSuccesses++;
          this.evaluate(now);
        } else {
          this.transition({ kind: "open", since: now }, now);
        }
        return;
      case "closed":
        if (isSuccess) {
          this.window.recordSuccess(now);
        } else {
          this.window.recordFailure(now);
          this.evaluate(now);
        }
        return;
    }
  }

  recordSuccess(): void {
    this.reportOutcome(true);
  }

  recordFailure(): void {
    this.reportOutcome(false);
  }

  currentState(): BreakerState {
    this.evaluate(this.clock.now());
    return { ...this.state };
  }

  canExecute(): boolean {
    return this.currentState().kind !== "open";
  }

  errorRate(): number {
    return this.window.errorRate(this.config.minEvalSize);
  }

  inspectBucket(index: number): BucketInfo {
    return this.window.inspectBucket(index);
  }

  configuration(): Readonly<BreakerConfig> {
    return this.config;
  }

  /** Consecutive successes seen in the current half-open trial. */
  trialSuccess(): number {
    return this.trialSuccesses;
  }

  /** The underlying window, for visualizers. Mutate only through the breaker. */
  get counter(): WindowedCounter {
    return this.window;
  }

  /** Apply at most one time-driven transition. */
  private evaluate(now: number): void {
    switch (this.state.kind) {
      case "closed":
        this.window.advance(now);
        if (this.errorRate() > this.config.errorThreshold) {
          this.transition({ kind: "open", since: now }, now);
        }
        return;
      case "open":
        if (now - this.state.since >= this.config.retryTimeoutMs) {
          this.transition({ kind: "half_open" }, now);
        }
        return;
      case "half_open":
        if (this.trialSuccesses >= this.config.trialSuccessRequired) {
          this.transition({ kind: "closed" }, now);
        }
        return;
    }
  }

  private transition(to: BreakerState, now: number): void {
    const from = this.state;
    const errorRate = this.errorRate();

    this.state = to;
    this.trialSuccesses = 0;
    if (to.kind === "closed") this.window.reset(now);

    this.logger.info(TRANSITION_MESSAGES[to.kind], { from: from.kind, to: to.kind, errorRate });
    this.emit("state:changed", { from: { ...from }, to: { ...to }, at: now, errorRate });
  }
}

const TRANSITION_MESSAGES: Record<BreakerState["kind"], string> = {
  closed: "breaker closed",
  open: "breaker opened",
  half_open: "breaker half-open",
};
