/**
 * Test utilities, exported from the `"windowed-breaker/testing"` entry point.
 * Drive a breaker through time without real waiting.
 */
export { ManualClock } from "./testing/manual-clock.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
