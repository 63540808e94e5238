/**
 * Link Errors
 *
 * Everything the engine and the coordinator throw on purpose. Each
 * carries a stable `code` for response bodies and the HTTP `status`
 * the transports answer with.
 *
 * | Error               | code          | status |
 * |---------------------|---------------|--------|
 * | NotFoundError       | NOT_FOUND     | 404    |
 * | ForbiddenError      | FORBIDDEN     | 403    |
 * | ValidationError     | VALIDATION    | 422    |
 * | StoreFailureError   | STORE_FAILURE | 500    |
 */

export type LinkErrorCode = "NOT_FOUND" | "FORBIDDEN" | "VALIDATION" | "STORE_FAILURE";

export type LinkErrorStatus = 403 | 404 | 422 | 500;

export class LinkError extends Error {
  constructor(
    message: string,
    readonly code: LinkErrorCode,
    readonly status: LinkErrorStatus,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LinkError";
  }
}

export class NotFoundError extends LinkError {
  constructor(readonly slug: string) {
    super(`page "${slug}" not found`, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

export class ForbiddenError extends LinkError {
  constructor(readonly slug: string) {
    super(`page "${slug}" belongs to another user`, "FORBIDDEN", 403);
    this.name = "ForbiddenError";
  }
}

export class ValidationError extends LinkError {
  constructor(message: string) {
    super(message, "VALIDATION", 422);
    this.name = "ValidationError";
  }
}

/**
 * A store call failed. The driver error is kept as `cause`.
 */
export class StoreFailureError extends LinkError {
  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`${operation} failed`, "STORE_FAILURE", 500, { cause });
    this.name = "StoreFailureError";
  }
}

export function isLinkError(err: unknown): err is LinkError {
  return err instanceof LinkError;
}
