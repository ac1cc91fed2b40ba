/**
 * Error codes for schema loading.
 */
export type SchemaLoadErrorCode = "MISSING_SOURCE" | "MALFORMED_SOURCE";

/**
 * Thrown when an action or policy source is absent or fails validation.
 * Fatal: a planner cannot start without both sources.
 */
export class SchemaLoadError extends Error {
  constructor(
    public readonly code: SchemaLoadErrorCode,
    message: string,
    public readonly source: "actions" | "policy",
  ) {
    super(message);
    this.name = "SchemaLoadError";
  }
}
