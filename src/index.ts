/**
 * Multi-revision PDF document model: lazy resolution across incremental
 * updates, dereferencing, and lossless rewriting.
 */

// ─────────────────────────────────────────────────────────────────────────────
// High-level API
// ─────────────────────────────────────────────────────────────────────────────

export { type DocumentObject, type LoadOptions, PDF } from "./api/pdf";

// ─────────────────────────────────────────────────────────────────────────────
// Document model
// ─────────────────────────────────────────────────────────────────────────────

export { IntegrityError, UsageError } from "./document/errors";
export { type EachOptions, type IndirectObject, ObjectResolver } from "./document/object-resolver";
export { type DeleteOptions, type LoadState, Revision } from "./document/revision";
export { RevisionChain } from "./document/revision-chain";
export { type FreeListEntry, type XRefLocation, XRefSection } from "./document/xref-section";

// ─────────────────────────────────────────────────────────────────────────────
// Tasks
// ─────────────────────────────────────────────────────────────────────────────

export { dereferenceAll, dereferenceObject } from "./tasks/dereference";
export { computeMinimumVersion, type VersionedDocument } from "./tasks/minimum-version";
export { compact, deleteFieldsWithDefaults, type OptimizeOptions, optimize } from "./tasks/optimize";
export { fieldOf, fieldsFor, type FieldDefinition } from "./schema/field-schema";
export { compareVersions } from "./schema/version";

// ─────────────────────────────────────────────────────────────────────────────
// Reading and writing
// ─────────────────────────────────────────────────────────────────────────────

export type { Filter, FilterSpec } from "./filters/filter";
export { FilterPipeline } from "./filters/filter-pipeline";
export {
  ObjectParseError,
  RecoverableParseError,
  StreamDecodeError,
  StructureError,
  UnrecoverableParseError,
  XRefParseError,
} from "./parser/errors";
export { FileParser, type ParseOptions } from "./parser/file-parser";
export type { ObjectSource } from "./parser/object-source";
export { type WriteOptions, type WriteResult, writeDocument } from "./writer/pdf-writer";

// ─────────────────────────────────────────────────────────────────────────────
// PDF Objects
// ─────────────────────────────────────────────────────────────────────────────

export { PdfArray } from "./objects/pdf-array";
export { PdfBool, PdfNull } from "./objects/pdf-constant";
export { PdfDict } from "./objects/pdf-dict";
export { PdfName } from "./objects/pdf-name";
export { PdfNumber } from "./objects/pdf-number";
export { type PdfObject, pdfEquals } from "./objects/pdf-object";
export { PdfRef } from "./objects/pdf-ref";
export { PdfStream } from "./objects/pdf-stream";
export { PdfString } from "./objects/pdf-string";
