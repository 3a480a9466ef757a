/**
 * How a remote call ended when it did not return a body.
 *
 * - `exhausted`: transient failures (429, 5xx, connection, timeout) outlasted the retry budget
 * - `non-retryable`: a client error or a TLS failure; retrying cannot help
 * - `cancelled`: the caller's cancellation token was set
 * - `not-found`: 404 on a single-entity lookup
 */
export type ApiErrorKind = "exhausted" | "non-retryable" | "cancelled" | "not-found";

export type ApiErrorReason =
  | "rate-limit"
  | "server-error"
  | "connection"
  | "timeout"
  | "tls"
  | "client-error"
  | "invalid-response"
  | "cancelled"
  | "not-found";

export class EntityApiError extends Error {
  name = "EntityApiError";

  constructor(
    message: string,
    readonly kind: ApiErrorKind,
    readonly reason: ApiErrorReason,
    readonly statusCode = 0,
  ) {
    super(message);
  }

  static cancelled(): EntityApiError {
    return new EntityApiError("Operation cancelled by user", "cancelled", "cancelled");
  }
}

/** A single entity record that could not be decoded. */
export class EntityDecodeError extends Error {
  name = "EntityDecodeError";
}

export function isCancellation(err: unknown): boolean {
  return err instanceof EntityApiError && err.kind === "cancelled";
}

export function describeError(err: unknown): string {
  if (err instanceof EntityApiError) {
    return err.statusCode > 0 ? `HTTP ${err.statusCode}: ${err.message}` : err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
