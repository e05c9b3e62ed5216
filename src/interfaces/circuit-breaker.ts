import type { BreakerConfig } from "../types/config.js";
import type { BreakerState, BucketInfo } from "../types/breaker-state.js";

/**
 * Circuit breaker interface.
 * Fails fast when a dependency is having issues: callers ask whether a call is
 * allowed, run the call themselves and report how it went.
 *
 * States: CLOSED (normal) → OPEN (failing) → HALF_OPEN (testing) → CLOSED
 */
export interface CircuitBreaker {
  /**
   * Report the outcome of a protected call.
   * Time-driven transitions are applied first, then the outcome.
   */
  reportOutcome(isSuccess: boolean): void;

  /**
   * Get the state after applying any transition that is due.
   * Callers skip the protected operation while it is `open`.
   */
  currentState(): BreakerState;

  /**
   * Check if the circuit breaker allows an action.
   * Returns true if allowed (CLOSED or HALF_OPEN), false if blocked (OPEN).
   */
  canExecute(): boolean;

  /** Rolling error percentage over completed spans (0–100, two decimals). */
  errorRate(): number;

  /** Counts held by one bucket of the window. Throws on an out-of-range index. */
  inspectBucket(index: number): BucketInfo;

  configuration(): Readonly<BreakerConfig>;
}
