/**
 * File-level framing: the header, indirect object definitions and the
 * `startxref` footer. Object syntax itself is written by each object's
 * `toBytes()`.
 */

import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { RefLookup } from "#src/objects/pdf-primitive";
import type { PdfRef } from "#src/objects/pdf-ref";
import type { XRefWriteEntry } from "./xref-writer";

// %âãÏÓ: marks the file as binary for tools that sniff the second line
const BINARY_MARKER = new Uint8Array([0x25, 0xe2, 0xe3, 0xcf, 0xd3, 0x0a]);

export function writeHeader(writer: ByteWriter, version: string): void {
  writer.writeAscii(`%PDF-${version}\n`);
  writer.writeBytes(BINARY_MARKER);
}

/**
 * Write `N G obj ... endobj` and return the in-use entry locating it.
 */
export function writeIndirectObject(
  writer: ByteWriter,
  ref: PdfRef,
  obj: PdfObject,
  refs?: RefLookup,
): XRefWriteEntry {
  const offset = writer.position;

  writer.writeAscii(`${ref.key} obj\n`);
  obj.toBytes(writer, refs);
  writer.writeAscii("\nendobj\n");

  return { objectNumber: ref.objectNumber, generation: ref.generation, type: "inuse", offset };
}

export function writeTrailerEnd(writer: ByteWriter, xrefOffset: number): void {
  writer.writeAscii(`startxref\n${xrefOffset}\n%%EOF\n`);
}
