export class LifecycleError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LifecycleError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Setup-time fault: bad table, chain or config. Never raised while handling a request. */
export class ConfigurationError extends LifecycleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
    this.name = "ConfigurationError";
  }
}

export class InvalidStateError extends LifecycleError {
  readonly state: string;

  constructor(message: string, state: string, options?: ErrorOptions) {
    super(message, "INVALID_STATE", options);
    this.name = "InvalidStateError";
    this.state = state;
  }
}

/** A guard threw instead of returning a verdict. */
export class GuardEvaluationError extends LifecycleError {
  readonly guardName: string;

  constructor(guardName: string, options?: ErrorOptions) {
    super(`Guard "${guardName}" threw during evaluation`, "GUARD_EVALUATION", options);
    this.name = "GuardEvaluationError";
    this.guardName = guardName;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to LifecycleError (preserves cause chain). */
export function toLifecycleError(value: unknown): LifecycleError {
  if (value instanceof LifecycleError) return value;
  if (value instanceof Error) return new LifecycleError(value.message, "UNKNOWN", { cause: value });
  return new LifecycleError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
