import type { Clock } from "../interfaces/clock.js";

/** Wall-clock time via `Date.now()`. */
export const systemClock: Clock = {
  now: () => Date.now(),
};
