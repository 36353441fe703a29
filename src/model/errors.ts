/**
 * Error taxonomy for implementation generation.
 *
 * @packageDocumentation
 */

/**
 * Error codes for implementation generation errors.
 */
export type ImplementorErrorCode =
  | 'INVALID_ARGUMENT'
  | 'INVALID_SUBJECT'
  | 'TYPE_RESOLUTION_ERROR'
  | 'NO_USABLE_CONSTRUCTOR'
  | 'RENDER_FAILURE'
  | 'COMPILATION_FAILURE'
  | 'PACKAGING_FAILURE';

/**
 * Error class for implementation generation errors.
 */
export class ImplementorError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ImplementorErrorCode;
  /** Additional details about the error, such as compiler diagnostics. */
  public readonly details?: string;
  /** The underlying error, if any. */
  public override readonly cause: Error | undefined;

  constructor(message: string, code: ImplementorErrorCode, details?: string, cause?: Error) {
    super(message);
    this.name = 'ImplementorError';
    this.code = code;
    this.cause = cause;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

/**
 * Returns true when `error` is an {@link ImplementorError} with the given code.
 */
export function isImplementorError(
  error: unknown,
  code?: ImplementorErrorCode
): error is ImplementorError {
  return error instanceof ImplementorError && (code === undefined || error.code === code);
}

/**
 * Normalizes an unknown thrown value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
