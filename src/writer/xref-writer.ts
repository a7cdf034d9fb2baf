/**
 * Cross-reference output: classic tables and xref streams (PDF 1.5+).
 */

import { UsageError } from "#src/document/errors";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "#src/objects/pdf-array";
import type { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { RefLookup } from "#src/objects/pdf-primitive";
import { PdfStream } from "#src/objects/pdf-stream";

/** One row of a cross-reference section being written. */
export type XRefWriteEntry =
  | { type: "free"; objectNumber: number; generation: number; nextFree: number }
  | { type: "inuse"; objectNumber: number; generation: number; offset: number }
  | { type: "compressed"; objectNumber: number; streamNumber: number; index: number };

type Row = [type: number, second: number, third: number];

/** The three numeric fields an xref stream stores for an entry. */
function rowOf(entry: XRefWriteEntry): Row {
  switch (entry.type) {
    case "free":
      return [0, entry.nextFree, entry.generation];
    case "inuse":
      return [1, entry.offset, entry.generation];
    case "compressed":
      return [2, entry.streamNumber, entry.index];
  }
}

interface Subsection {
  start: number;
  entries: XRefWriteEntry[];
}

/** Runs of consecutive object numbers: 1 2 3 7 8 gives (1, 3 entries) and (7, 2 entries). */
function groupIntoSubsections(entries: XRefWriteEntry[]): Subsection[] {
  const subsections: Subsection[] = [];
  let current: Subsection | undefined;

  for (const entry of [...entries].sort((a, b) => a.objectNumber - b.objectNumber)) {
    if (current && entry.objectNumber === current.start + current.entries.length) {
      current.entries.push(entry);
    } else {
      current = { start: entry.objectNumber, entries: [entry] };
      subsections.push(current);
    }
  }

  return subsections;
}

/**
 * Write an `xref` table and its trailer.
 *
 * ```
 * xref
 * 0 1
 * 0000000000 65535 f
 * 5 2
 * 0000012345 00000 n
 * 0000012567 00000 n
 * trailer
 * << /Size 7 /Root 1 0 R >>
 * ```
 *
 * @throws {UsageError} for a compressed entry, which a table cannot hold
 */
export function writeXRefTable(
  writer: ByteWriter,
  entries: XRefWriteEntry[],
  trailer: PdfDict,
  refs?: RefLookup,
): void {
  writer.writeAscii("xref\n");

  for (const { start, entries: run } of groupIntoSubsections(entries)) {
    writer.writeAscii(`${start} ${run.length}\n`);

    for (const entry of run) {
      if (entry.type === "compressed") {
        throw new UsageError(`Object ${entry.objectNumber} is compressed and needs a cross-reference stream`);
      }

      const [, second, generation] = rowOf(entry);
      const marker = entry.type === "free" ? "f" : "n";

      // Exactly 20 bytes per entry
      writer.writeAscii(`${String(second).padStart(10, "0")} ${String(generation).padStart(5, "0")} ${marker}\r\n`);
    }
  }

  writer.writeAscii("trailer\n");
  trailer.toBytes(writer, refs);
  writer.writeAscii("\n");
}

function bytesNeeded(value: number): number {
  let width = 1;

  while (value >= 256 ** width) {
    width++;
  }

  return width;
}

/**
 * Build an xref stream holding `entries`, its dictionary seeded from
 * `trailer`. /W is as narrow as the values allow; /Index is left out when
 * it would be the default `[0 Size]`.
 *
 * The caller writes it as an indirect object; its own entry must already
 * be among `entries`.
 */
export function buildXRefStream(entries: XRefWriteEntry[], trailer: PdfDict): PdfStream {
  const subsections = groupIntoSubsections(entries);
  const rows = subsections.flatMap(({ entries: run }) => run.map(rowOf));
  const widths: Row = [1, 0, 0];

  for (const [, second, third] of rows) {
    widths[1] = Math.max(widths[1], bytesNeeded(second));
    widths[2] = Math.max(widths[2], bytesNeeded(third));
  }

  const data = new ByteWriter({ initialSize: rows.length * (widths[0] + widths[1] + widths[2]) });

  for (const row of rows) {
    row.forEach((value, i) => data.writeUint(value, widths[i]));
  }

  const stream = new PdfStream(trailer);

  stream.set("Type", PdfName.XRef);
  stream.set("W", PdfArray.of(...widths.map(w => PdfNumber.of(w))));

  const [first] = subsections;
  const size = stream.getNumber("Size")?.value;

  if (subsections.length !== 1 || first.start !== 0 || first.entries.length !== size) {
    stream.set("Index", new PdfArray(subsections.flatMap(s => [PdfNumber.of(s.start), PdfNumber.of(s.entries.length)])));
  }

  stream.setEncodedData(data.toBytes(), [{ name: "FlateDecode" }]);

  return stream;
}
