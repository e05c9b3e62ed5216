import type { WindowedBreaker } from "../core/windowed-breaker.js";
import { toBreakerError } from "../errors.js";
import type { Clock } from "../interfaces/clock.js";
import type { Logger } from "../interfaces/logger.js";
import type { RingBuffer } from "../utils/ring-buffer.js";
import { captureView, renderBreaker } from "./renderer.js";

const CLEAR_SCREEN = "\x1b[2J\x1b[H";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const CTRL_C = "\u0003";

/** stdin, or any readable stream in tests. Raw mode is used when the stream offers it. */
export type KeyInput = NodeJS.ReadableStream & { setRawMode?(mode: boolean): unknown };

export interface TextOutput {
  write(chunk: string): unknown;
}

export interface VisualizerOptions {
  breaker: WindowedBreaker;
  clock: Clock;
  input: KeyInput;
  output: TextOutput;
  /** Recent log lines shown under the drawing. */
  logTail: RingBuffer<string>;
  logger: Logger;
  color: boolean;
  refreshMs?: number;
}

/**
 * Draw the breaker until the user quits.
 *
 * `s` reports a success, `f` a failure, `q` or Ctrl-C quits. The frame is
 * redrawn after every key and on a fixed interval so time-driven transitions
 * show up without input. Resolves once the terminal has been restored; an
 * error while handling a key or drawing restores it too and rejects.
 */
export function runVisualizer(options: VisualizerOptions): Promise<void> {
  const { breaker, clock, input, output, logTail, logger, color } = options;
  const refreshMs = options.refreshMs ?? 100;

  const draw = (): void => {
    const view = captureView(breaker, clock.now(), () => logTail.toArray());
    output.write(`${CLEAR_SCREEN}${renderBreaker(view, { color })}\n`);
  };

  return new Promise<void>((resolve, reject) => {
    const restore = (): void => {
      clearInterval(timer);
      input.off("data", onData);
      input.off("end", stop);
      input.setRawMode?.(false);
      input.pause();
      output.write(SHOW_CURSOR);
    };

    const stop = (): void => {
      restore();
      logger.info("visualizer stopped");
      resolve();
    };

    const fail = (err: unknown): void => {
      restore();
      const error = toBreakerError(err);
      logger.error("visualizer failed", { error });
      reject(error);
    };

    const guarded =
      <A extends unknown[]>(fn: (...args: A) => void) =>
      (...args: A): void => {
        try {
          fn(...args);
        } catch (err) {
          fail(err);
        }
      };

    const onData = guarded((chunk: Buffer | string): void => {
      for (const key of chunk.toString()) {
        switch (key) {
          case "s":
            breaker.recordSuccess();
            break;
          case "f":
            breaker.recordFailure();
            break;
          case "q":
          case CTRL_C:
            stop();
            return;
        }
      }
      draw();
    });

    const timer = setInterval(guarded(draw), refreshMs);

    input.setRawMode?.(true);
    input.resume();
    input.on("data", onData);
    input.on("end", stop);
    output.write(HIDE_CURSOR);
    logger.info("visualizer started", { ...breaker.configuration() });
    guarded(draw)();
  });
}
