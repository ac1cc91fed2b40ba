/**
 * Raised by {@link IntentBuilder.buildOrThrow} and carried inside a failed
 * {@link BuildResult}. `errors` holds every collected message, in the order
 * the checks ran.
 */
export class IntentValidationError extends Error {
  public readonly code = "VALIDATION_FAILED";

  constructor(public readonly errors: readonly string[]) {
    super(`Intent validation failed: ${errors.join("; ")}`);
    this.name = "IntentValidationError";
  }
}
