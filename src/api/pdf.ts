/**
 * High-level PDF document API.
 *
 * Ties the revision chain, the object resolver and the rewrite tasks
 * together behind one document object.
 */

import { UsageError } from "#src/document/errors";
import { type EachOptions, type IndirectObject, ObjectResolver } from "#src/document/object-resolver";
import type { DeleteOptions, Revision } from "#src/document/revision";
import { RevisionChain } from "#src/document/revision-chain";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { DEFAULT_VERSION, FileParser, type ParseOptions } from "#src/parser/file-parser";
import { isValidVersion, maxVersion } from "#src/schema/version";
import { dereferenceAll, dereferenceObject } from "#src/tasks/dereference";
import { computeMinimumVersion } from "#src/tasks/minimum-version";
import { type OptimizeOptions, optimize } from "#src/tasks/optimize";
import { writeDocument } from "#src/writer/pdf-writer";

/**
 * Options for loading a PDF.
 */
export interface LoadOptions extends ParseOptions {
  // Inherits lenient from ParseOptions
}

/**
 * A bound object as seen through the document.
 */
export interface DocumentObject {
  ref: PdfRef;
  value: PdfObject;
  revision: Revision;
}

/**
 * High-level PDF document class.
 *
 * @example
 * ```typescript
 * const pdf = PDF.load(bytes);
 *
 * pdf.catalog.set("PageMode", PdfName.of("UseOutlines"));
 * pdf.optimize({ compact: true, objectStreams: "generate", xrefStreams: "generate" });
 *
 * const rewritten = pdf.save();
 * ```
 */
export class PDF {
  private headerVersion: string;

  private constructor(
    readonly resolver: ObjectResolver,
    headerVersion: string,
  ) {
    this.headerVersion = headerVersion;
  }

  /** Warnings from reading and resolving */
  get warnings(): string[] {
    return this.resolver.warnings;
  }

  get revisions(): RevisionChain {
    return this.resolver.revisions;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Load a PDF from bytes.
   *
   * Only the cross-reference sections are read; objects load on first use.
   *
   * @throws {UnrecoverableParseError} if the newest section cannot be read
   * @throws {StructureError} in strict mode, for a missing or invalid header
   */
  static load(bytes: Uint8Array, options: LoadOptions = {}): PDF {
    const source = new FileParser(bytes, options);
    const warnings = source.warnings;
    const revisions = RevisionChain.load(source, warnings);

    return new PDF(new ObjectResolver(revisions, source, warnings), source.headerVersion);
  }

  /**
   * A new document with one empty revision and a minimal catalog.
   */
  static create(): PDF {
    const pdf = new PDF(new ObjectResolver(new RevisionChain(), null), DEFAULT_VERSION);

    pdf.createCatalog();

    return pdf;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Document info
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * PDF version: the header's, or the catalog's /Version when that is newer.
   */
  get version(): string {
    const override = this.catalogIfPresent()?.getName("Version")?.value;

    return override !== undefined && isValidVersion(override)
      ? maxVersion(this.headerVersion, override)
      : this.headerVersion;
  }

  /**
   * @throws {UsageError} if the value is not of the form `M.N`
   */
  set version(value: string) {
    if (!isValidVersion(value)) {
      throw new UsageError(`Invalid PDF version "${value}"`);
    }

    this.headerVersion = value;
  }

  /** Trailer of the current revision */
  get trailer(): PdfDict {
    return this.revisions.current.trailer;
  }

  /**
   * The document catalog, created when the trailer has none.
   */
  get catalog(): PdfDict {
    return this.catalogIfPresent() ?? this.createCatalog();
  }

  private catalogIfPresent(): PdfDict | undefined {
    return this.trailer.getDict("Root", this.resolver.resolver);
  }

  private createCatalog(): PdfDict {
    const pages = PdfDict.of({ Type: PdfName.of("Pages"), Kids: new PdfArray(), Count: PdfNumber.of(0) });
    const catalog = PdfDict.of({ Type: PdfName.Catalog, Pages: this.resolver.add(pages) });

    this.trailer.set(PdfName.Root, this.resolver.add(catalog));

    return catalog;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Object access
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Get an object by reference. Returns null if it is unbound, free or
   * unreadable.
   */
  getObject(ref: PdfRef): PdfObject | null {
    return this.resolver.resolve(ref);
  }

  /**
   * Add an object to the current revision under a fresh number.
   */
  add(obj: PdfObject): PdfRef {
    return this.resolver.add(obj);
  }

  /**
   * Delete an object; by default a free entry is recorded in the current
   * revision, so older revisions keep their copy.
   */
  delete(ref: PdfRef, options?: DeleteOptions): void {
    this.resolver.delete(ref, options);
  }

  *each(options?: EachOptions): Generator<DocumentObject> {
    yield* this.resolver.each(options);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Tasks
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Replace references by their targets.
   *
   * With an object, dereferences just that graph and returns the value
   * standing in its place. Without one, dereferences the whole document
   * and returns the objects nothing reaches.
   */
  dereference(obj: PdfObject): PdfObject;
  dereference(): IndirectObject[];
  dereference(obj?: PdfObject): PdfObject | IndirectObject[] {
    return obj === undefined ? dereferenceAll(this.resolver) : dereferenceObject(this.resolver, obj);
  }

  /**
   * @throws {ZodError} for invalid options
   * @throws {IntegrityError} if compaction would leave a dangling reference
   */
  optimize(options?: OptimizeOptions): void {
    optimize(this.resolver, options);
  }

  /**
   * Raise the version to what the fields in use need.
   *
   * @returns the lowest version that knows every field in use
   */
  computeMinimumVersion(): string {
    return computeMinimumVersion(this);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Saving
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Write every revision, oldest first, each with its own
   * cross-reference section.
   */
  save(): Uint8Array {
    return writeDocument(this.resolver, { version: this.version }).bytes;
  }
}
