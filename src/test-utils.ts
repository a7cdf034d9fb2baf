/**
 * Test utilities: byte/string helpers and an in-memory PDF file builder.
 */

import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { RefLookup } from "#src/objects/pdf-primitive";

/**
 * Create a Uint8Array from an ASCII string.
 */
export function stringToBytes(str: string): Uint8Array {
  return new Uint8Array(str.split("").map(c => c.charCodeAt(0)));
}

/**
 * Decode bytes as Latin-1 so that every byte maps to one character.
 */
export function bytesToString(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes);
}

/**
 * Serialize an object to a string.
 */
export function serialize(obj: PdfObject, refs?: RefLookup): string {
  const writer = new ByteWriter({ initialSize: 256 });

  obj.toBytes(writer, refs);

  return bytesToString(writer.toBytes());
}

/** An object written in classic `n g obj ... endobj` form. */
export interface TestObject {
  num: number;
  gen?: number;
  /** Object body in PDF syntax, e.g. `<< /Type /Catalog >>`. */
  body: string;
}

/** Objects packed, uncompressed, into one object stream. */
export interface TestObjectStream {
  num: number;
  members: Array<{ num: number; body: string }>;
}

export interface TestRevision {
  objects?: TestObject[];
  /** Free entries; linked into a free list headed by object 0. */
  free?: Array<{ num: number; gen: number }>;
  objectStream?: TestObjectStream;
  /** Extra trailer entries, e.g. `/Root 1 0 R`. /Size and /Prev are added. */
  trailer?: string;
  /** Write the section as a cross-reference stream with this object number. */
  xrefStream?: number;
}

interface Entry {
  num: number;
  fields: [number, number, number];
}

/**
 * Build a complete PDF file with one section per revision, oldest first.
 *
 * Each revision after the first is appended as an incremental update with
 * /Prev pointing at the previous section. /Size is one past the highest
 * object number seen so far. Object 0 heads the free list of every section.
 *
 * @example
 * ```ts
 * const bytes = buildPdf([
 *   { objects: [{ num: 1, body: "<< /Type /Catalog >>" }], trailer: "/Root 1 0 R" },
 * ]);
 * ```
 */
export function buildPdf(revisions: TestRevision[], version = "1.7"): Uint8Array {
  const writer = new ByteWriter({ initialSize: 1024 });

  writer.writeAscii(`%PDF-${version}\n%\xE2\xE3\xCF\xD3\n`);

  let size = 1;
  let prev: number | undefined;

  for (const revision of revisions) {
    const entries: Entry[] = [];

    for (const obj of revision.objects ?? []) {
      entries.push({ num: obj.num, fields: [1, writer.position, obj.gen ?? 0] });
      writer.writeAscii(`${obj.num} ${obj.gen ?? 0} obj\n${obj.body}\nendobj\n`);
    }

    if (revision.objectStream) {
      const { num, members } = revision.objectStream;
      let header = "";
      let body = "";

      members.forEach((member, index) => {
        header += `${member.num} ${body.length} `;
        body += `${member.body}\n`;
        entries.push({ num: member.num, fields: [2, num, index] });
      });

      const data = header + body;

      entries.push({ num, fields: [1, writer.position, 0] });
      writer.writeAscii(
        `${num} 0 obj\n<< /Type /ObjStm /N ${members.length} /First ${header.length} /Length ${data.length} >>\nstream\n${data}\nendstream\nendobj\n`,
      );
    }

    const free = revision.free ?? [];

    free.forEach((entry, i) => {
      entries.push({ num: entry.num, fields: [0, free[i + 1]?.num ?? 0, entry.gen] });
    });

    entries.push({ num: 0, fields: [0, free[0]?.num ?? 0, 65535] });

    if (revision.xrefStream !== undefined) {
      entries.push({ num: revision.xrefStream, fields: [1, writer.position, 0] });
    }

    for (const entry of entries) {
      size = Math.max(size, entry.num + 1);
    }

    entries.sort((a, b) => a.num - b.num);

    const startXRef = writer.position;
    const trailer = `/Size ${size}${prev === undefined ? "" : ` /Prev ${prev}`} ${revision.trailer ?? ""}`;

    if (revision.xrefStream === undefined) {
      writeTable(writer, entries);
      writer.writeAscii(`trailer\n<< ${trailer} >>\n`);
    } else {
      writeStream(writer, revision.xrefStream, entries, trailer);
    }

    writer.writeAscii(`startxref\n${startXRef}\n%%EOF\n`);
    prev = startXRef;
  }

  return writer.toBytes();
}

function subsections(entries: Entry[]): Entry[][] {
  const groups: Entry[][] = [];

  for (const entry of entries) {
    const last = groups.at(-1);
    const lastEntry = last?.at(-1);

    if (last && lastEntry && lastEntry.num + 1 === entry.num) {
      last.push(entry);
    } else {
      groups.push([entry]);
    }
  }

  return groups;
}

function writeTable(writer: ByteWriter, entries: Entry[]): void {
  writer.writeAscii("xref\n");

  for (const group of subsections(entries)) {
    writer.writeAscii(`${group[0].num} ${group.length}\n`);

    for (const { fields } of group) {
      const [type, first, second] = fields;

      writer.writeAscii(
        `${String(first).padStart(10, "0")} ${String(second).padStart(5, "0")} ${type === 0 ? "f" : "n"}\r\n`,
      );
    }
  }
}

function writeStream(writer: ByteWriter, num: number, entries: Entry[], trailer: string): void {
  const groups = subsections(entries);
  const index = groups.map(group => `${group[0].num} ${group.length}`).join(" ");
  const data: number[] = [];

  for (const { fields } of entries) {
    const [type, first, second] = fields;

    data.push(type, (first >>> 24) & 0xff, (first >>> 16) & 0xff, (first >>> 8) & 0xff, first & 0xff);
    data.push((second >>> 8) & 0xff, second & 0xff);
  }

  writer.writeAscii(
    `${num} 0 obj\n<< /Type /XRef /W [1 4 2] /Index [${index}] /Length ${data.length} ${trailer} >>\nstream\n`,
  );
  writer.writeBytes(new Uint8Array(data));
  writer.writeAscii("\nendstream\nendobj\n");
}
