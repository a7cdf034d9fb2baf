/**
 * PDF file writer.
 *
 * Writes every revision of a document, oldest first, each followed by its
 * own cross-reference section, so that the output reloads into the same
 * revision chain.
 *
 * Uses a single ByteWriter for the entire PDF to minimize allocations.
 */

import type { ObjectResolver } from "#src/document/object-resolver";
import type { Revision } from "#src/document/revision";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { RefLookup } from "#src/objects/pdf-primitive";
import type { PdfRef } from "#src/objects/pdf-ref";
import { isStreamOfType, PdfStream } from "#src/objects/pdf-stream";
import { DEFAULT_VERSION } from "#src/parser/file-parser";
import { type ObjectStreamMember, packObjectStream } from "./object-stream-writer";
import { writeHeader, writeIndirectObject, writeTrailerEnd } from "./serializer";
import { buildXRefStream, writeXRefTable, type XRefWriteEntry } from "./xref-writer";

/**
 * Options for PDF writing.
 */
export interface WriteOptions {
  /** PDF version string (default: "1.7") */
  version?: string;
}

/**
 * Result of a write operation.
 */
export interface WriteResult {
  /** The written PDF bytes */
  bytes: Uint8Array;

  /** Byte offset of the newest xref section */
  xrefOffset: number;
}

interface Container {
  ref: PdfRef;
  stream: PdfStream;
  members: Array<ObjectStreamMember & { index: number }>;
}

/**
 * How one revision's objects will be written.
 */
interface RevisionLayout {
  direct: ObjectStreamMember[];
  containers: Container[];
  xrefStream: PdfRef | null;
}

/**
 * Sort a revision's bindings into plain objects, object stream members
 * and the xref stream.
 *
 * Members stay packed only when their container is in the same revision
 * and the revision has an xref stream to record them in.
 */
function layoutRevision(resolver: ObjectResolver, revision: Revision): RevisionLayout {
  const objects: ObjectStreamMember[] = [];
  const containers = new Map<number, Container>();
  let xrefStream: PdfRef | null = null;

  for (const ref of revision.refs()) {
    const value = resolver.loadFrom(revision, ref);

    if (value === null) {
      continue;
    }

    if (isStreamOfType(value, "XRef")) {
      xrefStream ??= ref;
    } else if (value instanceof PdfStream && isStreamOfType(value, "ObjStm")) {
      containers.set(ref.objectNumber, { ref, stream: value, members: [] });
    } else {
      objects.push({ ref, value });
    }
  }

  const direct: ObjectStreamMember[] = [];

  for (const object of objects) {
    const location = revision.location(object.ref);
    const container = location?.type === "compressed" ? containers.get(location.streamObjNum) : undefined;

    if (location?.type === "compressed" && container && xrefStream && !(object.value instanceof PdfStream)) {
      container.members.push({ ...object, index: location.indexInStream });
    } else {
      direct.push(object);
    }
  }

  return {
    direct,
    containers: [...containers.values()].filter(container => container.members.length > 0),
    xrefStream,
  };
}

/**
 * The trailer as written: the revision's entries with /Size and /Prev
 * filled in for this file.
 */
function buildTrailer(revision: Revision, size: number, prev: number | undefined): PdfDict {
  const trailer = new PdfDict(revision.trailer);

  trailer.delete(PdfName.XRefStm);
  trailer.delete(PdfName.Prev);
  trailer.set(PdfName.Size, PdfNumber.of(size));

  if (prev !== undefined) {
    trailer.set(PdfName.Prev, PdfNumber.of(prev));
  }

  return trailer;
}

/**
 * Write a whole document.
 *
 * Structure:
 * ```
 * %PDF-1.7
 * %âãÏÓ
 * 1 0 obj
 * ...
 * endobj
 * xref
 * ...
 * trailer
 * ...
 * startxref
 * ...
 * %%EOF
 * [next revision, its trailer with /Prev]
 * ```
 */
export function writeDocument(resolver: ObjectResolver, options: WriteOptions = {}): WriteResult {
  const writer = new ByteWriter();
  const refs: RefLookup = obj => resolver.getRef(obj);

  writeHeader(writer, options.version ?? DEFAULT_VERSION);

  let size = 1;
  let prev: number | undefined;

  for (const revision of resolver.revisions) {
    const layout = layoutRevision(resolver, revision);
    const entries: XRefWriteEntry[] = [];

    for (const { ref, value } of layout.direct) {
      entries.push(writeIndirectObject(writer, ref, value, refs));
    }

    for (const container of layout.containers) {
      const members = container.members.sort((a, b) => a.index - b.index);

      packObjectStream(container.stream, members, refs);
      resolver.invalidateObjectStream(container.stream);

      members.forEach((member, index) => {
        entries.push({
          type: "compressed",
          objectNumber: member.ref.objectNumber,
          streamNumber: container.ref.objectNumber,
          index,
        });
      });

      entries.push(writeIndirectObject(writer, container.ref, container.stream, refs));
    }

    for (const free of revision.xref.linkedFreeEntries()) {
      entries.push({ type: "free", ...free });
    }

    const xrefOffset = writer.position;

    if (layout.xrefStream) {
      entries.push({
        type: "inuse",
        objectNumber: layout.xrefStream.objectNumber,
        generation: layout.xrefStream.generation,
        offset: xrefOffset,
      });
    }

    for (const entry of entries) {
      size = Math.max(size, entry.objectNumber + 1);
    }

    const trailer = buildTrailer(revision, size, prev);

    if (layout.xrefStream) {
      writeIndirectObject(writer, layout.xrefStream, buildXRefStream(entries, trailer), refs);
    } else {
      writeXRefTable(writer, entries, trailer, refs);
    }

    writeTrailerEnd(writer, xrefOffset);
    prev = xrefOffset;
  }

  return { bytes: writer.toBytes(), xrefOffset: prev ?? 0 };
}
