/**
 * Error types shared across the assessment engine.
 *
 * Generation failures and an empty score set are not errors here: they are
 * result variants (see questionGenerator.ts and scoring.ts).
 */

/** Unknown category or invalid environment. Indicates a programming/deployment error. */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A generated question failed shape checks. `index` is the 0-based batch position. */
export class QuestionValidationError extends Error {
  constructor(readonly index: number, readonly issues: string[]) {
    super(`Question ${index + 1} failed validation: ${issues.join("; ")}`);
    this.name = "QuestionValidationError";
  }
}

/** An operation that the assessment flow does not allow in its current state. */
export class FlowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FlowError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return "Unknown error";
}

/** Abort or `AbortSignal.timeout` expiry, whether surfaced as an Error or a DOMException. */
export function isAbortError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) return false;
  return error.name === "AbortError" || error.name === "TimeoutError";
}
