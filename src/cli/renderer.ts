import type { WindowedBreaker } from "../core/windowed-breaker.js";
import type { BreakerState, BucketInfo } from "../types/breaker-state.js";
import type { BreakerConfig } from "../types/config.js";

/** Everything one frame needs, captured from the breaker at a single instant. */
export interface BreakerView {
  now: number;
  state: BreakerState;
  errorRate: number;
  trialSuccess: number;
  config: Readonly<BreakerConfig>;
  buckets: BucketInfo[];
  cursor: number;
  elapsedInSpan: number;
  log: string[];
}

export interface RenderOptions {
  color: boolean;
}

const RESET = "\x1b[0m";
const BAR_WIDTH = 20;
const MAX_LOG_WIDTH = 100;
const HEAD_KEYS = new Set(["time", "level", "msg", "component"]);

/**
 * Read the breaker for display. Due transitions are applied first, and the log
 * is read after them so the frame includes the lines they wrote.
 */
export function captureView(
  breaker: WindowedBreaker,
  now: number,
  readLog: () => string[],
): BreakerView {
  const state = breaker.currentState();
  return {
    now,
    state,
    errorRate: breaker.errorRate(),
    trialSuccess: breaker.trialSuccess(),
    config: breaker.configuration(),
    buckets: breaker.counter.snapshot(),
    cursor: breaker.counter.cursor,
    elapsedInSpan: breaker.counter.elapsedInSpan(now),
    log: readLog(),
  };
}

export function stateBadge(state: BreakerState, color: boolean): string {
  switch (state.kind) {
    case "closed":
      return color ? `\x1b[42m CLOSED ${RESET}` : "CLOSED";
    case "open":
      return color ? `\x1b[41m OPEN ${RESET}` : "OPEN";
    case "half_open":
      return color ? `\x1b[43m HALF-OPEN ${RESET}` : "HALF-OPEN";
  }
}

export function progressBar(fraction: number, width = BAR_WIDTH): string {
  const clamped = Math.min(1, Math.max(0, fraction));
  const filled = Math.floor(clamped * width);
  return `[${"#".repeat(filled)}${"-".repeat(width - filled)}]`;
}

export function formatBucketRow(index: number, bucket: BucketInfo, current: boolean): string {
  const row = `${String(index).padStart(3)}${String(bucket.failureCount).padStart(7)}${String(
    bucket.successCount,
  ).padStart(7)}`;
  return current ? `${row}  <- current` : row;
}

/**
 * Compact a StructuredLogger JSON line to `HH:MM:SS.mmm level msg key=value`.
 * Anything that is not such a line is shown as-is.
 */
export function formatLogLine(line: string): string {
  let entry: unknown;
  try {
    entry = JSON.parse(line);
  } catch {
    return truncate(line);
  }
  if (typeof entry !== "object" || entry === null || !("msg" in entry)) return truncate(line);

  const fields = Object.entries(entry);
  const lookup = new Map(fields);
  const time = lookup.get("time");
  const head = [
    typeof time === "string" ? time.slice(11, 23) : undefined,
    lookup.get("level"),
    lookup.get("msg"),
  ]
    .filter((value) => value !== undefined)
    .map(String);
  const rest = fields
    .filter(([key]) => !HEAD_KEYS.has(key))
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return truncate([...head, ...rest].join(" "));
}

function truncate(line: string): string {
  return line.length > MAX_LOG_WIDTH ? `${line.slice(0, MAX_LOG_WIDTH - 1)}…` : line;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export function renderBreaker(view: BreakerView, options: RenderOptions): string {
  const { config, state } = view;
  const lines: string[] = [
    " windowed-breaker",
    "",
    ` State:      ${stateBadge(state, options.color)}`,
    ` Error rate: ${view.errorRate.toFixed(2)}% (opens above ${config.errorThreshold}%, min ${config.minEvalSize} outcomes)`,
    ` Trial:      ${view.trialSuccess}/${config.trialSuccessRequired}`,
  ];

  if (state.kind === "open") {
    const remaining = Math.max(0, state.since + config.retryTimeoutMs - view.now);
    lines.push(` Retry in:   ${seconds(remaining)}`);
  }

  lines.push("", `${"#".padStart(3)}${"fail".padStart(7)}${"ok".padStart(7)}`);
  view.buckets.forEach((bucket, index) => {
    lines.push(formatBucketRow(index, bucket, index === view.cursor));
  });

  lines.push(
    "",
    ` span ${progressBar(view.elapsedInSpan / config.spanMs)} ${seconds(view.elapsedInSpan)} / ${seconds(config.spanMs)}`,
    "",
    " [s] success  [f] failure  [q] quit",
  );

  if (view.log.length > 0) {
    lines.push("", ...view.log.map((line) => ` ${formatLogLine(line)}`));
  }

  return lines.join("\n");
}
