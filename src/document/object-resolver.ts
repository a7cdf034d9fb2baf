/**
 * Object resolver: turns identities into materialized objects and back.
 *
 * Walks the revision chain newest to oldest, loads objects from the file
 * on first use, caches them in the revision that binds them, and keeps a
 * reverse map from values to identities.
 */

import { isInterned, isPdfStream, type PdfObject } from "#src/objects/pdf-object";
import type { RefResolver } from "#src/objects/pdf-primitive";
import { PdfRef } from "#src/objects/pdf-ref";
import type { PdfStream } from "#src/objects/pdf-stream";
import { RecoverableParseError } from "#src/parser/errors";
import type { ObjectSource } from "#src/parser/object-source";
import { ObjectStreamParser } from "#src/parser/object-stream-parser";
import type { DeleteOptions, Revision } from "./revision";
import type { RevisionChain } from "./revision-chain";
import type { XRefLocation } from "./xref-section";

/**
 * An identity paired with the value bound to it.
 */
export interface IndirectObject {
  ref: PdfRef;
  value: PdfObject;
}

export interface EachOptions {
  /**
   * Visit only the binding that resolution would pick for each object
   * number (default: true). Otherwise every revision's bindings are
   * visited, older ones included.
   */
  onlyCurrent?: boolean;
}

/**
 * Resolves references against a revision chain.
 *
 * Resolving one identity twice returns the same instance until the object
 * is replaced or deleted. Values that cannot be read are treated as
 * missing and leave a warning behind.
 */
export class ObjectResolver {
  /** Reverse mapping: object → ref (uses WeakMap for GC) */
  private objectToRef = new WeakMap<PdfObject, PdfRef>();

  /** Parsed object streams, by container */
  private streamParsers = new WeakMap<PdfStream, ObjectStreamParser>();

  /**
   * Highest object number in use, once scanned. Only raised by `register`;
   * `forgetAll` drops it so the next read scans the chain again.
   */
  private highestNumber: number | null = null;

  /** Identities being loaded right now; guards against self-referencing loads */
  private loading = new Set<PdfRef>();

  /** Resolver callback for typed dictionary getters */
  readonly resolver: RefResolver = ref => this.resolve(ref);

  constructor(
    readonly revisions: RevisionChain,
    private readonly source: ObjectSource | null,
    readonly warnings: string[] = [],
  ) {}

  /**
   * Materialized value of `ref`, or null if it is unbound, free or unreadable.
   *
   * Object number 0 never resolves.
   */
  resolve(ref: PdfRef): PdfObject | null {
    if (ref.isSentinel) {
      return null;
    }

    for (const revision of this.revisions.reversed()) {
      if (revision.contains(ref)) {
        return this.loadFrom(revision, ref);
      }
    }

    return null;
  }

  /**
   * Follow a value if it is a reference.
   */
  resolveValue(value: PdfObject): PdfObject | null {
    return value instanceof PdfRef ? this.resolve(value) : value;
  }

  /**
   * The revision whose binding decides `ref`, if any.
   */
  revisionOf(ref: PdfRef): Revision | undefined {
    return this.revisions.reversed().find(revision => revision.contains(ref));
  }

  /**
   * Value of `ref` as bound in `revision` specifically.
   */
  loadFrom(revision: Revision, ref: PdfRef): PdfObject | null {
    const cached = revision.object(ref);

    if (cached !== undefined) {
      return cached;
    }

    const location = revision.location(ref);

    if (location === undefined || location.type === "free") {
      return null;
    }

    if (this.loading.has(ref)) {
      this.warnings.push(`Object ${ref.objectNumber} ${ref.generation} refers to itself while loading`);

      return null;
    }

    this.loading.add(ref);

    try {
      const value = this.load(ref, location);

      if (value !== null) {
        revision.cache(ref, value);
        this.remember(ref, value);
      }

      return value;
    } catch (error) {
      if (!(error instanceof RecoverableParseError)) {
        throw error;
      }

      this.warnings.push(`Cannot load object ${ref.objectNumber} ${ref.generation}: ${error.message}`);

      return null;
    } finally {
      this.loading.delete(ref);
    }
  }

  /**
   * Get the reference for an object.
   *
   * @returns The reference, or null for direct and interned values
   */
  getRef(obj: PdfObject): PdfRef | null {
    return this.objectToRef.get(obj) ?? null;
  }

  /**
   * Next object number that `add` would assign.
   */
  get nextObjectNumber(): number {
    this.highestNumber ??= this.scanHighestNumber();

    return this.highestNumber + 1;
  }

  private scanHighestNumber(): number {
    let max = 0;

    for (const revision of this.revisions) {
      max = Math.max(max, revision.maxObjectNumber);

      const size = revision.trailer.getNumber("Size");

      if (size?.isInteger()) {
        max = Math.max(max, size.value - 1);
      }
    }

    return max;
  }

  /**
   * Add a new object to the current revision, assigning it a fresh number.
   */
  add(obj: PdfObject): PdfRef {
    const ref = PdfRef.of(this.nextObjectNumber, 0);

    this.register(ref, obj);

    return ref;
  }

  /**
   * Bind `obj` to a chosen identity in `revision` (default: current).
   *
   * @throws {UsageError} if the number is already in use in that revision
   */
  register(ref: PdfRef, obj: PdfObject, revision: Revision = this.revisions.current): void {
    revision.add(ref, obj);
    this.remember(ref, obj);

    if (this.highestNumber !== null) {
      this.highestNumber = Math.max(this.highestNumber, ref.objectNumber);
    }
  }

  /**
   * Replace the value of an existing object, in the revision that binds it,
   * or in the current revision when it is only bound in an older one.
   */
  update(ref: PdfRef, obj: PdfObject): void {
    const current = this.revisions.current;

    if (current.contains(ref)) {
      current.update(ref, obj);
    } else {
      current.add(ref, obj);
    }

    this.remember(ref, obj);
  }

  /**
   * Delete an object.
   *
   * With `markAsFree` (the default) the current revision gets a free entry
   * that hides all older bindings; older revisions keep their history.
   * Without it every revision's binding of the number is removed.
   */
  delete(ref: PdfRef, options: DeleteOptions = {}): void {
    const markAsFree = options.markAsFree ?? true;
    const value = this.revisionOf(ref)?.object(ref);

    if (markAsFree) {
      this.revisions.current.delete(ref, { markAsFree: true });
    } else {
      for (const revision of this.revisions) {
        revision.delete(ref, { markAsFree: false });
      }
    }

    if (value !== undefined) {
      this.objectToRef.delete(value);
    }
  }

  /**
   * Record that `obj` is stored under `ref`. Interned values cannot be
   * told apart by instance and are never recorded.
   */
  remember(ref: PdfRef, obj: PdfObject): void {
    if (!isInterned(obj)) {
      this.objectToRef.set(obj, ref);
    }
  }

  /**
   * Drop the parsed index of an object stream whose data was rewritten.
   */
  invalidateObjectStream(container: PdfStream): void {
    this.streamParsers.delete(container);
  }

  /**
   * Forget every value-to-identity mapping and the highest number in use,
   * e.g. after renumbering.
   */
  forgetAll(): void {
    this.objectToRef = new WeakMap();
    this.highestNumber = null;
  }

  /**
   * Visit bound objects, newest revision first, ascending object numbers
   * within a revision. Unreadable objects are skipped.
   */
  *each(options: EachOptions = {}): Generator<IndirectObject & { revision: Revision }> {
    const onlyCurrent = options.onlyCurrent ?? true;
    const seen = new Set<number>();

    for (const revision of this.revisions.reversed()) {
      for (const ref of revision.refs()) {
        if (onlyCurrent && seen.has(ref.objectNumber)) {
          continue;
        }

        seen.add(ref.objectNumber);

        const value = this.loadFrom(revision, ref);

        if (value !== null) {
          yield { ref, value, revision };
        }
      }

      for (const ref of revision.freeRefs()) {
        seen.add(ref.objectNumber);
      }
    }
  }

  /**
   * Integer value of a /Length reference, for reading streams.
   */
  private lengthOf(ref: PdfRef): number | null {
    const value = this.resolve(ref);

    return value?.type === "number" && value.isInteger() ? value.value : null;
  }

  private load(ref: PdfRef, location: Exclude<XRefLocation, { type: "free" }>): PdfObject | null {
    if (location.type === "uncompressed") {
      if (this.source === null) {
        return null;
      }

      const parsed = this.source.parseObjectAt(location.offset, length => this.lengthOf(length));

      if (parsed.ref.objectNumber !== ref.objectNumber) {
        this.warnings.push(
          `Offset ${location.offset} holds object ${parsed.ref.objectNumber}, expected ${ref.objectNumber}`,
        );

        return null;
      }

      return parsed.value;
    }

    const container = this.resolve(PdfRef.of(location.streamObjNum, 0));

    if (container === null || !isPdfStream(container)) {
      this.warnings.push(`Object stream ${location.streamObjNum} for object ${ref.objectNumber} is missing`);

      return null;
    }

    const parser = this.parserFor(container);

    if (parser.getObjectNumber(location.indexInStream) !== ref.objectNumber) {
      this.warnings.push(
        `Object stream ${location.streamObjNum} has no object ${ref.objectNumber} at index ${location.indexInStream}`,
      );

      return null;
    }

    return parser.getObject(location.indexInStream);
  }

  private parserFor(container: PdfStream): ObjectStreamParser {
    let parser = this.streamParsers.get(container);

    if (parser === undefined) {
      parser = new ObjectStreamParser(container);
      this.streamParsers.set(container, parser);
    }

    return parser;
  }
}
