import type { Scanner } from "#src/io/scanner";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfStream } from "#src/objects/pdf-stream";
import { XRefParseError } from "./errors";
import { IndirectObjectParser } from "./indirect-object-parser";
import { ObjectParser } from "./object-parser";
import { isInteger, isKeyword } from "./token";
import { TokenReader } from "./token-reader";

/**
 * Entry of a cross-reference section as stored in the file.
 *
 * Free entries keep the raw free-list pointer (`nextFree`); the document
 * layer turns it into a walkable list.
 */
export type XRefEntry =
  | { type: "free"; nextFree: number; generation: number }
  | { type: "uncompressed"; offset: number; generation: number }
  | { type: "compressed"; streamObjNum: number; indexInStream: number };

/**
 * One parsed cross-reference section with its trailer.
 */
export interface XRefData {
  entries: Map<number, XRefEntry>;
  trailer: PdfDict;
  /** /Prev: offset of the preceding section */
  prev?: number;
  /** /XRefStm: offset of the hybrid-file companion stream */
  xrefStm?: number;
  /** Object number of the xref stream this section was read from */
  streamObjNum?: number;
}

/**
 * How far from the end of the file to look for `startxref`.
 */
const STARTXREF_SEARCH_WINDOW = 1024;

/**
 * Parser for cross-reference tables and streams.
 *
 * Supports both the classic table format and the stream format (PDF 1.5+).
 * Following /Prev is left to the caller.
 */
export class XRefParser {
  constructor(private scanner: Scanner) {}

  /**
   * Find the offset recorded after the last `startxref` keyword.
   *
   * @throws {XRefParseError} if there is no startxref marker with an offset
   */
  findStartXRef(): number {
    const bytes = this.scanner.bytes;
    const searchStart = Math.max(0, bytes.length - STARTXREF_SEARCH_WINDOW);

    for (let i = bytes.length - "startxref".length; i >= searchStart; i--) {
      if (!this.matchesAt(i, "startxref")) {
        continue;
      }

      const reader = new TokenReader(this.scanner);

      reader.moveTo(i + "startxref".length);

      const offset = reader.nextToken();

      if (!isInteger(offset)) {
        throw new XRefParseError("Invalid startxref offset");
      }

      return offset.value;
    }

    throw new XRefParseError("Could not find startxref marker");
  }

  /**
   * Parse the section at `offset`, detecting table vs. stream format.
   *
   * @throws {XRefParseError} if the bytes at `offset` are not a section
   */
  parseAt(offset: number): XRefData {
    if (offset < 0 || offset >= this.scanner.length) {
      throw new XRefParseError(`Cross-reference offset ${offset} is outside the file`, { offset });
    }

    const reader = new TokenReader(this.scanner);

    reader.moveTo(offset);

    const first = reader.peekToken();

    if (isKeyword(first, "xref")) {
      reader.nextToken();

      return this.parseTable(reader);
    }

    if (isInteger(first)) {
      return this.parseStream(first.position);
    }

    throw new XRefParseError(`Unknown xref format at offset ${offset}`, { offset });
  }

  /**
   * Parse subsections and the trailer. The reader sits after `xref`.
   */
  private parseTable(reader: TokenReader): XRefData {
    const entries = new Map<number, XRefEntry>();

    while (true) {
      const token = reader.nextToken();

      if (isKeyword(token, "trailer")) {
        break;
      }

      const count = reader.nextToken();

      if (!isInteger(token) || !isInteger(count)) {
        throw new XRefParseError(`Invalid xref subsection header at offset ${token.position}`);
      }

      for (let i = 0; i < count.value; i++) {
        entries.set(token.value + i, this.parseTableEntry(reader));
      }
    }

    const parser = new ObjectParser(reader);
    const result = parser.parseObject();

    if (result === null || !(result.object instanceof PdfDict)) {
      throw new XRefParseError("Invalid trailer dictionary");
    }

    return this.withPointers({ entries, trailer: result.object });
  }

  /**
   * `OOOOOOOOOO GGGGG n|f`. Tokens instead of fixed columns, so that
   * entries with wrong padding or line endings still read.
   */
  private parseTableEntry(reader: TokenReader): XRefEntry {
    const first = reader.nextToken();
    const generation = reader.nextToken();
    const kind = reader.nextToken();

    if (!isInteger(first) || !isInteger(generation)) {
      throw new XRefParseError(`Invalid xref entry at offset ${first.position}`);
    }

    if (isKeyword(kind, "n")) {
      return { type: "uncompressed", offset: first.value, generation: generation.value };
    }

    if (isKeyword(kind, "f")) {
      return { type: "free", nextFree: first.value, generation: generation.value };
    }

    throw new XRefParseError(`Invalid xref entry type at offset ${kind.position}`);
  }

  /**
   * Parse an xref stream object (`N M obj << /Type /XRef ... >> stream`).
   *
   * The stream dictionary contains /W (field widths), /Size, and optional
   * /Index ranges (default `[0 Size]`). It doubles as the trailer.
   */
  private parseStream(offset: number): XRefData {
    const parsed = new IndirectObjectParser(this.scanner).parseObjectAt(offset);
    const stream = parsed.value;

    if (!(stream instanceof PdfStream)) {
      throw new XRefParseError(`Expected xref stream at offset ${offset}`, { offset });
    }

    const type = stream.getName("Type");

    if (type !== undefined && type.value !== "XRef") {
      throw new XRefParseError(`Expected /Type /XRef, got /Type /${type.value}`);
    }

    const widths = stream
      .getArray("W")
      ?.toArray()
      .map(w => (w instanceof PdfNumber ? w.value : 0));

    if (widths === undefined || widths.length < 3) {
      throw new XRefParseError("XRef stream missing or invalid /W array");
    }

    const size = stream.getNumber("Size")?.value;

    if (size === undefined) {
      throw new XRefParseError("XRef stream missing /Size");
    }

    const ranges = this.readIndex(stream, size);
    const [w1, w2, w3] = widths;
    const data = stream.getDecodedData();
    const entries = new Map<number, XRefEntry>();
    let pos = 0;

    const readField = (width: number, fallback: number): number => {
      if (width === 0) {
        return fallback;
      }

      let value = 0;

      for (let j = 0; j < width; j++) {
        value = value * 256 + data[pos++];
      }

      return value;
    };

    for (const { first, count } of ranges) {
      for (let i = 0; i < count; i++) {
        if (pos + w1 + w2 + w3 > data.length) {
          throw new XRefParseError("XRef stream data truncated");
        }

        // A zero-width type field means every entry is in use
        const entryType = readField(w1, 1);
        const field2 = readField(w2, 0);
        const field3 = readField(w3, 0);

        let entry: XRefEntry;

        switch (entryType) {
          case 0:
            entry = { type: "free", nextFree: field2, generation: field3 };
            break;
          case 1:
            entry = { type: "uncompressed", offset: field2, generation: field3 };
            break;
          case 2:
            entry = { type: "compressed", streamObjNum: field2, indexInStream: field3 };
            break;
          default:
            throw new XRefParseError(`Invalid XRef entry type: ${entryType}`);
        }

        // First definition wins
        if (!entries.has(first + i)) {
          entries.set(first + i, entry);
        }
      }
    }

    return this.withPointers({
      entries,
      trailer: stream,
      streamObjNum: parsed.ref.objectNumber,
    });
  }

  private readIndex(stream: PdfStream, size: number): Array<{ first: number; count: number }> {
    const index = stream.getArray("Index");

    if (index === undefined) {
      return [{ first: 0, count: size }];
    }

    const ranges: Array<{ first: number; count: number }> = [];

    for (let i = 0; i < index.length; i += 2) {
      const first = index.at(i);
      const count = index.at(i + 1);

      if (!(first instanceof PdfNumber) || !(count instanceof PdfNumber)) {
        throw new XRefParseError("Invalid /Index array in XRef stream");
      }

      ranges.push({ first: first.value, count: count.value });
    }

    return ranges;
  }

  /**
   * Read /Prev and /XRefStm off the trailer.
   */
  private withPointers(data: XRefData): XRefData {
    const prev = data.trailer.getNumber("Prev");
    const xrefStm = data.trailer.getNumber("XRefStm");

    return {
      ...data,
      prev: prev?.isInteger() ? prev.value : undefined,
      xrefStm: xrefStm?.isInteger() ? xrefStm.value : undefined,
    };
  }

  private matchesAt(pos: number, str: string): boolean {
    for (let i = 0; i < str.length; i++) {
      if (this.scanner.peekAt(pos + i) !== str.charCodeAt(i)) {
        return false;
      }
    }

    return true;
  }
}
