/**
 * Errors raised by the incremental record parser.
 */

/**
 * The byte source could not be opened or failed while being read.
 */
export class SourceError extends Error {
  /** Node.js error code, when the failure came from the OS (e.g. "ENOENT") */
  readonly code?: string;
  /** HTTP status code, when the source is an HTTP response */
  readonly statusCode?: number;

  constructor(
    message: string,
    options: { cause?: unknown; code?: string; statusCode?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "SourceError";
    this.code = options.code ?? errorCode(options.cause);
    this.statusCode = options.statusCode;
  }
}

/**
 * A second pull was started while one was still pending.
 */
export class ConcurrentPullError extends Error {
  constructor(message = "A record pull is already in progress on this parser") {
    super(message);
    this.name = "ConcurrentPullError";
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Wraps any thrown value as a SourceError, keeping an existing one as is.
 */
export function toSourceError(error: unknown, context: string): SourceError {
  if (error instanceof SourceError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new SourceError(`${context}: ${message}`, { cause: error });
}
