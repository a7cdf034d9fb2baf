import { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { RecoverableParseError } from "#src/parser/errors";
import type { ObjectSource } from "#src/parser/object-source";
import { UsageError } from "./errors";
import { type XRefLocation, XRefSection } from "./xref-section";

/**
 * Loading progress of a revision read from a file.
 * Revisions created in memory start out loaded.
 */
export type LoadState = "unparsed" | "loading" | "loaded";

/**
 * Trailer keys of an xref stream that describe the stream itself rather
 * than the document.
 */
const STREAM_ONLY_KEYS = ["Type", "W", "Index", "Length", "Filter", "DecodeParms"];

export interface DeleteOptions {
  /**
   * Leave a free entry behind that shadows older revisions (default: true).
   * Without it the number simply has no binding in this revision.
   */
  markAsFree?: boolean;
}

/**
 * One incremental update of a document: a trailer, a cross-reference
 * section, and the objects materialized or added in this revision.
 *
 * An identity is bound here if the revision holds an object for it or its
 * section has an entry for it. Materializing objects is the resolver's job;
 * a revision only stores them.
 */
export class Revision {
  trailer: PdfDict;

  private _xref: XRefSection;
  private _state: LoadState;
  private _hybridOffset: number | undefined;

  /** Materialized and added objects, one binding per object number */
  private readonly objects = new Map<number, { ref: PdfRef; value: PdfObject }>();

  /**
   * @param offset - file offset of the section this revision is read from
   */
  constructor(
    trailer: PdfDict = new PdfDict(),
    xref: XRefSection = new XRefSection(),
    readonly offset: number | null = null,
  ) {
    this.trailer = trailer;
    this._xref = xref;
    this._state = offset === null ? "loaded" : "unparsed";
  }

  /**
   * A revision whose section at `offset` has not been read yet.
   */
  static unparsed(offset: number): Revision {
    return new Revision(new PdfDict(), new XRefSection(), offset);
  }

  get xref(): XRefSection {
    return this._xref;
  }

  get loadState(): LoadState {
    return this._state;
  }

  /** True for revisions read from a file, whose objects can be loaded lazily. */
  get hasXRefSource(): boolean {
    return this.offset !== null;
  }

  /** Offset of the /XRefStm section merged into this one, if any. */
  get hybridOffset(): number | undefined {
    return this._hybridOffset;
  }

  /**
   * Read this revision's section and trailer.
   *
   * A hybrid file's /XRefStm section is merged over the table's entries;
   * if it cannot be read, the table alone is used and a warning recorded.
   *
   * @returns offset of the preceding section, if any
   * @throws {RecoverableParseError} if the section at `offset` cannot be read
   */
  load(source: ObjectSource, warnings: string[]): number | undefined {
    if (this._state !== "unparsed" || this.offset === null) {
      throw new UsageError("Revision is not waiting to be loaded");
    }

    this._state = "loading";

    try {
      const data = source.parseRevisionAt(this.offset);

      this._xref = XRefSection.fromEntries(data.entries);

      if (data.xrefStm !== undefined) {
        this._hybridOffset = data.xrefStm;
        this.mergeHybridSection(source, data.xrefStm, warnings);
      }

      this.trailer = new PdfDict(data.trailer);

      if (data.streamObjNum !== undefined) {
        for (const key of STREAM_ONLY_KEYS) {
          this.trailer.delete(key);
        }
      }

      this._state = "loaded";

      return data.prev;
    } catch (error) {
      this._state = "unparsed";
      throw error;
    }
  }

  /** Materialized or added object for exactly this identity. */
  object(ref: PdfRef): PdfObject | undefined {
    const binding = this.objects.get(ref.objectNumber);

    return binding?.ref === ref ? binding.value : undefined;
  }

  /**
   * True if this revision says anything about `ref`, a free entry included.
   */
  contains(ref: PdfRef): boolean {
    return this.object(ref) !== undefined || this._xref.lookup(ref) !== undefined;
  }

  /** Storage location from the section, ignoring materialized objects. */
  location(ref: PdfRef): XRefLocation | undefined {
    return this._xref.lookup(ref);
  }

  /**
   * Bind a new object in this revision.
   *
   * @throws {UsageError} if the object number is already in use here
   */
  add(ref: PdfRef, value: PdfObject): void {
    const location = this._xref.get(ref.objectNumber)?.location;

    if (this.objects.has(ref.objectNumber) || (location !== undefined && location.type !== "free")) {
      throw new UsageError(`Object ${ref.objectNumber} is already in use in this revision`);
    }

    if (location?.type === "free") {
      this._xref.delete(ref.objectNumber);
    }

    this.objects.set(ref.objectNumber, { ref, value });
  }

  /**
   * Store the materialized value of an identity this revision's section
   * locates.
   */
  cache(ref: PdfRef, value: PdfObject): void {
    this.objects.set(ref.objectNumber, { ref, value });
  }

  /**
   * Replace the value bound to `ref`.
   *
   * @throws {UsageError} if `ref` is not bound to an object here
   */
  update(ref: PdfRef, value: PdfObject): void {
    const location = this._xref.lookup(ref);

    if (this.object(ref) === undefined && (location === undefined || location.type === "free")) {
      throw new UsageError(`Object ${ref.objectNumber} ${ref.generation} is not in this revision`);
    }

    this.objects.set(ref.objectNumber, { ref, value });
  }

  /**
   * Remove the binding of `ref`'s object number.
   *
   * With `markAsFree` the number becomes free, its next generation one
   * higher than the removed object's.
   */
  delete(ref: PdfRef, options: DeleteOptions = {}): void {
    const markAsFree = options.markAsFree ?? true;

    this.objects.delete(ref.objectNumber);
    this._xref.delete(ref.objectNumber);

    if (markAsFree) {
      this._xref.addFree(ref.objectNumber, ref.nextGeneration);
    }
  }

  /**
   * Drop the section entry of an object this revision also holds
   * materialized, so that it is written as a plain object.
   */
  detach(ref: PdfRef): void {
    if (this.object(ref) !== undefined) {
      this._xref.delete(ref.objectNumber);
    }
  }

  /**
   * Identities of every in-use binding, ascending by object number.
   */
  refs(): PdfRef[] {
    const refs = new Map<number, PdfRef>();

    for (const [ref, location] of this._xref) {
      if (location.type !== "free") {
        refs.set(ref.objectNumber, ref);
      }
    }

    for (const [objNum, { ref }] of this.objects) {
      refs.set(objNum, ref);
    }

    return [...refs.values()].sort(PdfRef.compare);
  }

  /** Free entries of this revision's section. */
  freeRefs(): PdfRef[] {
    const refs: PdfRef[] = [];

    for (const [ref, location] of this._xref) {
      if (location.type === "free" && !this.objects.has(ref.objectNumber)) {
        refs.push(ref);
      }
    }

    return refs;
  }

  /**
   * Highest object number bound or freed here, or 0.
   */
  get maxObjectNumber(): number {
    let max = this._xref.maxObjectNumber;

    for (const objNum of this.objects.keys()) {
      max = Math.max(max, objNum);
    }

    return max;
  }

  /** The first object number after every number this revision uses. */
  get nextFreeObjectNumber(): number {
    return this.maxObjectNumber + 1;
  }

  /**
   * True if this revision holds objects that are not backed by the file
   * as read: added objects, and any revision created in memory.
   */
  isModified(): boolean {
    if (!this.hasXRefSource) {
      return true;
    }

    for (const { ref } of this.objects.values()) {
      if (this._xref.lookup(ref) === undefined) {
        return true;
      }
    }

    return false;
  }

  /**
   * Take over all bindings and free entries of `newer`, newest winning.
   */
  absorb(newer: Revision): void {
    for (const [ref, location] of newer._xref) {
      const binding = this.objects.get(ref.objectNumber);

      if (binding !== undefined && (location.type === "free" || binding.ref !== ref)) {
        this.objects.delete(ref.objectNumber);
      }
    }

    this._xref.merge(newer._xref);

    for (const [objNum, binding] of newer.objects) {
      if (!newer._xref.has(objNum)) {
        this._xref.delete(objNum);
      }

      this.objects.set(objNum, binding);
    }

    this.trailer = newer.trailer;
  }

  private mergeHybridSection(source: ObjectSource, offset: number, warnings: string[]): void {
    try {
      const stream = source.parseRevisionAt(offset);

      this._xref.merge(XRefSection.fromEntries(stream.entries));
    } catch (error) {
      if (!(error instanceof RecoverableParseError)) {
        throw error;
      }

      warnings.push(`Ignoring /XRefStm section at offset ${offset}: ${error.message}`);
    }
  }
}
