/**
 * Store driver errors. Callers above the store wrap these into their
 * own taxonomy; nothing here knows about HTTP.
 */

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

/**
 * The unique constraint on pages.slug rejected an insert.
 */
export class SlugConflictError extends StoreError {
  constructor(
    readonly slug: string,
    cause?: unknown
  ) {
    super(`slug "${slug}" is already taken`, { cause });
    this.name = "SlugConflictError";
  }
}
