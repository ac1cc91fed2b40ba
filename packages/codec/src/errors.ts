/**
 * Error codes for canonical encoding and decoding.
 */
export type EncodingErrorCode =
  | "UNSUPPORTED_TYPE"
  | "OUT_OF_RANGE"
  | "INVALID_TEXT"
  | "INVALID_BYTES"
  | "DUPLICATE_KEY"
  | "NON_CANONICAL";

/**
 * Thrown when a value has no canonical form, or when bytes are not the
 * canonical encoding of anything. Never transient.
 */
export class EncodingError extends Error {
  constructor(
    public readonly code: EncodingErrorCode,
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = "EncodingError";
  }
}
