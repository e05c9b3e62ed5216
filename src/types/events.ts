/**
 * Event map for the breaker.
 *
 * Events flow through {@link TypedEventEmitter}; visualizers and metrics
 * layers subscribe to them instead of polling.
 * @module
 */

import type { BreakerState } from "./breaker-state.js";

/** Events emitted by {@link WindowedBreaker}. */
export interface BreakerEventMap {
  "state:changed": {
    from: BreakerState;
    to: BreakerState;
    /** Epoch ms of the call that caused the transition. */
    at: number;
    /** Error rate at the moment of transition, before any counter reset. */
    errorRate: number;
  };
}
