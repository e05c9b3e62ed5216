/**
 * Public API barrel.
 *
 * Re-exports the breaker, its rolling window, configuration helpers, errors,
 * and the logging adapters that make up the package's surface.
 * @module
 */

// Adapters
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export { systemClock } from "./adapters/system-clock.js";
// CLI building blocks
export type { CliCommand } from "./cli/args.js";
export { parseArgs } from "./cli/args.js";
export type { BreakerView, RenderOptions } from "./cli/renderer.js";
export { captureView, renderBreaker } from "./cli/renderer.js";
export type { KeyInput, TextOutput, VisualizerOptions } from "./cli/visualizer.js";
export { runVisualizer } from "./cli/visualizer.js";
// Config
export { breakerConfigSchema, evalWindowSchema } from "./config/config-schema.js";
// Core
export { TypedEventEmitter } from "./core/typed-emitter.js";
export type { WindowedBreakerOptions } from "./core/windowed-breaker.js";
export { WindowedBreaker } from "./core/windowed-breaker.js";
export type { WindowedCounterOptions } from "./core/windowed-counter.js";
export { WindowedCounter } from "./core/windowed-counter.js";
// Errors
export {
  BreakerError,
  ConfigError,
  errorMessage,
  PreconditionError,
  toBreakerError,
} from "./errors.js";
// Interfaces
export type { CircuitBreaker } from "./interfaces/circuit-breaker.js";
export type { Clock } from "./interfaces/clock.js";
export type { Logger } from "./interfaces/logger.js";
// Types
export type { BreakerState, BreakerStateKind, BucketInfo } from "./types/breaker-state.js";
export type { BreakerConfig } from "./types/config.js";
export { DEFAULT_BREAKER_CONFIG, evalWindowConfig, resolveConfig } from "./types/config.js";
export type { BreakerEventMap } from "./types/events.js";
// Utils
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
export { RingBuffer } from "./utils/ring-buffer.js";
