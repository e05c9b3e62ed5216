#!/usr/bin/env node
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { systemClock } from "../adapters/system-clock.js";
import { HELP_TEXT, parseArgs } from "../cli/args.js";
import { runVisualizer } from "../cli/visualizer.js";
import { WindowedBreaker } from "../core/windowed-breaker.js";
import { ConfigError, errorMessage } from "../errors.js";
import { resolvePackageVersion } from "../utils/resolve-package-version.js";
import { RingBuffer } from "../utils/ring-buffer.js";

const LOG_TAIL_LINES = 5;

async function main(): Promise<void> {
  let command: ReturnType<typeof parseArgs>;
  try {
    command = parseArgs(process.argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  switch (command.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "version":
      // dist/bin and src/bin both sit two levels below the package root
      console.log(resolvePackageVersion(import.meta.url, ["../../package.json"]));
      return;
    case "run":
      break;
  }

  // Log lines are shown inside the drawing rather than on stderr, which the redraw would wipe.
  const logTail = new RingBuffer<string>(LOG_TAIL_LINES);
  const logger = new StructuredLogger({
    component: "breaker",
    level: command.verbose ? LogLevel.DEBUG : LogLevel.INFO,
    writer: (line) => logTail.push(line),
    clock: systemClock,
  });

  const breaker = new WindowedBreaker({ config: command.config, clock: systemClock, logger });

  await runVisualizer({
    breaker,
    clock: systemClock,
    input: process.stdin,
    output: process.stdout,
    logTail,
    logger: logger.child("visualizer"),
    color: command.color && process.stdout.isTTY === true,
  });
}

main().catch((err) => {
  console.error(`Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
