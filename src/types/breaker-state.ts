/**
 * Breaker state and window bucket shapes.
 * @module
 */

/** Only `open` carries a payload: the epoch-ms timestamp at which it opened. */
export type BreakerState = { kind: "closed" } | { kind: "open"; since: number } | { kind: "half_open" };

export type BreakerStateKind = BreakerState["kind"];

/** Copy of one bucket's tallies, as returned to callers. */
export interface BucketInfo {
  successCount: number;
  failureCount: number;
}
