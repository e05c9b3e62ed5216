import { breakerConfigSchema, evalWindowSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

/** Breaker configuration. Immutable for the lifetime of a breaker. */
export interface BreakerConfig {
  /** Number of buckets in the window, including the in-progress one */
  capacity: number;
  /** Duration each bucket covers */
  spanMs: number;
  /** Observations needed across completed buckets before the rate counts */
  minEvalSize: number;
  /** Percentage (0–100); the breaker opens when the rate is strictly above it */
  errorThreshold: number;
  /** Time spent open before probing */
  retryTimeoutMs: number;
  /** Consecutive half-open successes needed to close */
  trialSuccessRequired: number;
}

export const DEFAULT_BREAKER_CONFIG: Readonly<BreakerConfig> = Object.freeze({
  capacity: 5,
  spanMs: 60000,
  minEvalSize: 100,
  errorThreshold: 10,
  retryTimeoutMs: 60000,
  trialSuccessRequired: 20,
});

/**
 * Validate user-supplied settings and merge them over the defaults.
 * Keys explicitly set to `undefined` keep their default.
 */
export function resolveConfig(config: Partial<BreakerConfig> = {}): Readonly<BreakerConfig> {
  const validation = breakerConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const resolved: BreakerConfig = { ...DEFAULT_BREAKER_CONFIG };
  for (const [key, value] of Object.entries(validation.data)) {
    if (value !== undefined && isConfigKey(key)) resolved[key] = value;
  }
  return Object.freeze(resolved);
}

function isConfigKey(key: string): key is keyof BreakerConfig {
  return key in DEFAULT_BREAKER_CONFIG;
}

/**
 * Describe the window as a total duration split into completed spans.
 *
 * One extra bucket is allocated for the in-progress span, so
 * `{ windowMs: 600000, spans: 5 }` yields 6 buckets of 2 minutes each.
 */
export function evalWindowConfig(window: {
  windowMs: number;
  spans: number;
}): Pick<BreakerConfig, "capacity" | "spanMs"> {
  const validation = evalWindowSchema.safeParse(window);
  if (!validation.success) {
    throw new ConfigError(`Invalid evaluation window: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const { windowMs, spans } = validation.data;
  const spanMs = Math.floor(windowMs / spans);
  if (spanMs < 1) {
    throw new ConfigError(`Invalid evaluation window: ${windowMs}ms cannot hold ${spans} spans`);
  }
  return { capacity: spans + 1, spanMs };
}
