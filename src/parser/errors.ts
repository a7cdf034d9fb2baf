/**
 * Errors raised while reading PDF bytes.
 *
 * Anything below RecoverableParseError is turned into a warning by the
 * document layer: a broken older section ends the revision chain, a broken
 * object resolves to null. UnrecoverableParseError is raised only when the
 * newest cross-reference section cannot be read.
 */

export interface ParseErrorOptions {
  /** Byte offset in the file where the problem was found. */
  offset?: number;
  cause?: unknown;
}

export class UnrecoverableParseError extends Error {
  constructor(message: string, options: ParseErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "UnrecoverableParseError";
  }
}

export class RecoverableParseError extends Error {
  readonly offset: number | undefined;

  constructor(message: string, options: ParseErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "RecoverableParseError";
    this.offset = options.offset;
  }
}

/** Malformed cross-reference table, stream or trailer. */
export class XRefParseError extends RecoverableParseError {
  constructor(message: string, options?: ParseErrorOptions) {
    super(message, options);
    this.name = "XRefParseError";
  }
}

/** Malformed indirect object. */
export class ObjectParseError extends RecoverableParseError {
  constructor(message: string, options?: ParseErrorOptions) {
    super(message, options);
    this.name = "ObjectParseError";
  }
}

export class StreamDecodeError extends RecoverableParseError {
  constructor(message: string, options?: ParseErrorOptions) {
    super(message, options);
    this.name = "StreamDecodeError";
  }
}

/** Object stream header or other container data does not add up. */
export class StructureError extends RecoverableParseError {
  constructor(message: string, options?: ParseErrorOptions) {
    super(message, options);
    this.name = "StructureError";
  }
}
