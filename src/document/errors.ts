/**
 * Error classes for operations on the document model.
 *
 * Reading is tolerant (see parser/errors); these errors are for callers
 * that break a contract and for rewrites that cannot keep the object graph
 * consistent. Neither is ever caught by the library itself.
 */

/**
 * A caller contract violation, e.g. deleting the only revision or adding
 * an object number twice to one revision.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * A rewrite would leave a reference pointing at nothing.
 * The rewrite is abandoned before anything is changed.
 */
export class IntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IntegrityError";
  }
}
