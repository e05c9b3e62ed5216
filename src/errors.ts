export class BreakerError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BreakerError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Caller broke a contract of the core (zero-length window, bad bucket index). */
export class PreconditionError extends BreakerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PRECONDITION", options);
    this.name = "PreconditionError";
  }
}

export class ConfigError extends BreakerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to BreakerError (preserves cause chain). */
export function toBreakerError(value: unknown): BreakerError {
  if (value instanceof BreakerError) return value;
  if (value instanceof Error) return new BreakerError(value.message, "UNKNOWN", { cause: value });
  return new BreakerError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
