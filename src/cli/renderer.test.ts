import { describe, expect, it } from "vitest";
import { StructuredLogger } from "../adapters/structured-logger.js";
import { WindowedBreaker } from "../core/windowed-breaker.js";
import { ManualClock } from "../testing/manual-clock.js";
import {
  type BreakerView,
  captureView,
  formatBucketRow,
  formatLogLine,
  progressBar,
  renderBreaker,
  stateBadge,
} from "./renderer.js";

function view(overrides: Partial<BreakerView> = {}): BreakerView {
  return {
    now: 2500,
    state: { kind: "open", since: 2000 },
    errorRate: 60,
    trialSuccess: 0,
    config: {
      capacity: 3,
      spanMs: 1000,
      minEvalSize: 4,
      errorThreshold: 50,
      retryTimeoutMs: 1500,
      trialSuccessRequired: 2,
    },
    buckets: [
      { successCount: 4, failureCount: 1 },
      { successCount: 0, failureCount: 5 },
      { successCount: 0, failureCount: 0 },
    ],
    cursor: 2,
    elapsedInSpan: 500,
    log: [],
    ...overrides,
  };
}

describe("stateBadge", () => {
  it("prints plain labels without color", () => {
    expect(stateBadge({ kind: "closed" }, false)).toBe("CLOSED");
    expect(stateBadge({ kind: "open", since: 0 }, false)).toBe("OPEN");
    expect(stateBadge({ kind: "half_open" }, false)).toBe("HALF-OPEN");
  });

  it("wraps labels in background colors", () => {
    expect(stateBadge({ kind: "closed" }, true)).toBe("\x1b[42m CLOSED \x1b[0m");
    expect(stateBadge({ kind: "open", since: 0 }, true)).toBe("\x1b[41m OPEN \x1b[0m");
    expect(stateBadge({ kind: "half_open" }, true)).toBe("\x1b[43m HALF-OPEN \x1b[0m");
  });
});

describe("progressBar", () => {
  it("fills proportionally, rounding down", () => {
    expect(progressBar(0.25, 8)).toBe("[##------]");
    expect(progressBar(0.99, 4)).toBe("[###-]");
  });

  it("clamps out-of-range fractions", () => {
    expect(progressBar(1.5, 4)).toBe("[####]");
    expect(progressBar(-1, 4)).toBe("[----]");
  });

  it("defaults to 20 cells", () => {
    expect(progressBar(0)).toBe(`[${"-".repeat(20)}]`);
  });
});

describe("formatBucketRow", () => {
  it("aligns index, failures and successes", () => {
    expect(formatBucketRow(1, { successCount: 12, failureCount: 3 }, false)).toBe(
      "  1      3     12",
    );
  });

  it("marks the current bucket", () => {
    expect(formatBucketRow(0, { successCount: 0, failureCount: 0 }, true)).toBe(
      "  0      0      0  <- current",
    );
  });
});

describe("formatLogLine", () => {
  it("compacts structured log lines", () => {
    const line = JSON.stringify({
      time: "2024-01-02T03:04:05.000Z",
      level: "info",
      msg: "breaker opened",
      component: "breaker",
      from: "closed",
      to: "open",
      errorRate: 60,
    });
    expect(formatLogLine(line)).toBe(
      '03:04:05.000 info breaker opened from="closed" to="open" errorRate=60',
    );
  });

  it("passes through text that is not a log entry", () => {
    expect(formatLogLine("plain text")).toBe("plain text");
    expect(formatLogLine("[1,2]")).toBe("[1,2]");
  });

  it("truncates long lines", () => {
    const formatted = formatLogLine("x".repeat(150));
    expect(formatted).toBe(`${"x".repeat(99)}…`);
  });
});

describe("renderBreaker", () => {
  it("draws an open breaker with its retry countdown", () => {
    expect(renderBreaker(view(), { color: false }).split("\n")).toEqual([
      " windowed-breaker",
      "",
      " State:      OPEN",
      " Error rate: 60.00% (opens above 50%, min 4 outcomes)",
      " Trial:      0/2",
      " Retry in:   1.00s",
      "",
      "  #   fail     ok",
      "  0      1      4",
      "  1      5      0",
      "  2      0      0  <- current",
      "",
      " span [##########----------] 0.50s / 1.00s",
      "",
      " [s] success  [f] failure  [q] quit",
    ]);
  });

  it("omits the countdown outside the open state", () => {
    const lines = renderBreaker(view({ state: { kind: "half_open" }, trialSuccess: 1 }), {
      color: false,
    }).split("\n");
    expect(lines[2]).toBe(" State:      HALF-OPEN");
    expect(lines[4]).toBe(" Trial:      1/2");
    expect(lines[5]).toBe("");
  });

  it("never shows a negative countdown", () => {
    const lines = renderBreaker(view({ now: 9000 }), { color: false }).split("\n");
    expect(lines[5]).toBe(" Retry in:   0.00s");
  });

  it("appends the log tail", () => {
    const lines = renderBreaker(view({ log: ["first", "second"] }), { color: false }).split("\n");
    expect(lines.slice(-3)).toEqual(["", " first", " second"]);
  });
});

describe("captureView", () => {
  it("reads a consistent picture of the breaker", () => {
    const clock = new ManualClock(0);
    const breaker = new WindowedBreaker({
      config: {
        capacity: 3,
        spanMs: 1000,
        minEvalSize: 0,
        errorThreshold: 50,
        retryTimeoutMs: 500,
        trialSuccessRequired: 1,
      },
      clock,
    });
    breaker.recordFailure();
    breaker.recordSuccess();
    clock.set(1250);

    const captured = captureView(breaker, clock.now(), () => ["line"]);

    expect(captured.state).toEqual({ kind: "closed" });
    expect(captured.errorRate).toBe(50);
    expect(captured.cursor).toBe(1);
    expect(captured.elapsedInSpan).toBe(250);
    expect(captured.buckets[0]).toEqual({ successCount: 1, failureCount: 1 });
    expect(captured.log).toEqual(["line"]);
  });

  it("reads the log after applying due transitions", () => {
    const clock = new ManualClock(0);
    const lines: string[] = [];
    const breaker = new WindowedBreaker({
      config: {
        capacity: 3,
        spanMs: 1000,
        minEvalSize: 0,
        errorThreshold: 50,
        retryTimeoutMs: 500,
        trialSuccessRequired: 1,
      },
      clock,
      logger: new StructuredLogger({ writer: (line) => lines.push(line), clock }),
    });
    breaker.recordFailure();
    breaker.recordFailure();
    clock.set(1000);

    const captured = captureView(breaker, clock.now(), () => [...lines]);

    expect(captured.state).toEqual({ kind: "open", since: 1000 });
    expect(captured.log.map(formatLogLine)).toEqual([
      '00:00:01.000 info breaker opened from="closed" to="open" errorRate=100',
    ]);
  });
});
