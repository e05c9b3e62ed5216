/**
 * Time source read at every call boundary of the breaker.
 * Tests inject a manual clock; production code uses {@link systemClock}.
 * @module
 */

export interface Clock {
  /** Current time in epoch milliseconds. */
  now(): number;
}
