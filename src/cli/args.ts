import { ConfigError } from "../errors.js";
import type { BreakerConfig } from "../types/config.js";
import { resolveConfig } from "../types/config.js";

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; config: Readonly<BreakerConfig>; color: boolean; verbose: boolean };

type NumericField = keyof BreakerConfig;

interface NumericFlag {
  field: NumericField;
  /** Multiplier from the flag's unit to the config's unit. */
  scale: number;
}

const NUMERIC_FLAGS = new Map<string, NumericFlag>([
  ["-b", { field: "capacity", scale: 1 }],
  ["--buffer-size", { field: "capacity", scale: 1 }],
  ["-s", { field: "spanMs", scale: 1000 }],
  ["--span", { field: "spanMs", scale: 1000 }],
  ["-m", { field: "minEvalSize", scale: 1 }],
  ["--min-eval-size", { field: "minEvalSize", scale: 1 }],
  ["-e", { field: "errorThreshold", scale: 1 }],
  ["--error-threshold", { field: "errorThreshold", scale: 1 }],
  ["-r", { field: "retryTimeoutMs", scale: 1000 }],
  ["--retry-timeout", { field: "retryTimeoutMs", scale: 1000 }],
  ["-t", { field: "trialSuccessRequired", scale: 1 }],
  ["--trial-success", { field: "trialSuccessRequired", scale: 1 }],
]);

export const HELP_TEXT = `
  windowed-breaker: watch a rolling-window circuit breaker react to outcomes

  Usage: windowed-breaker [options]

  Options:
    -b, --buffer-size <n>      Buckets in the window, including the current one (default: 5)
    -s, --span <seconds>       Duration of each bucket (default: 60)
    -m, --min-eval-size <n>    Outcomes needed before the error rate counts (default: 100)
    -e, --error-threshold <%>  Error rate the breaker must exceed to open (default: 10)
    -r, --retry-timeout <sec>  Time spent open before probing (default: 60)
    -t, --trial-success <n>    Half-open successes needed to close (default: 20)
    --no-color                 Disable ANSI colours
    --verbose                  Show debug log lines
    -V, --version              Print version
    -h, --help                 Show this help

  Keys: s = success, f = failure, q = quit
`;

/** Parse `process.argv`-shaped input (node binary and script path first). */
export function parseArgs(argv: string[]): CliCommand {
  const overrides: Partial<BreakerConfig> = {};
  let color = true;
  let verbose = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const numeric = NUMERIC_FLAGS.get(arg);
    if (numeric) {
      const value = parseNumber(arg, argv[++i]);
      // Durations are given in seconds; counts stay as typed
      overrides[numeric.field] = numeric.scale === 1 ? value : Math.round(value * numeric.scale);
      continue;
    }

    switch (arg) {
      case "--no-color":
        color = false;
        break;
      case "--verbose":
        verbose = true;
        break;
      case "--help":
      case "-h":
        return { kind: "help" };
      case "--version":
      case "-V":
        return { kind: "version" };
      default:
        throw new ConfigError(`Unknown option: ${arg}\nRun with --help for usage.`);
    }
  }

  return { kind: "run", config: resolveConfig(overrides), color, verbose };
}

function parseNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    throw new ConfigError(`${flag} requires a value`);
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${flag} requires a number, got "${raw}"`);
  }
  return value;
}
