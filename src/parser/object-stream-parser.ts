import { Scanner } from "#src/io/scanner";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfStream } from "#src/objects/pdf-stream";
import { StructureError } from "./errors";
import { ObjectParser } from "./object-parser";
import { isInteger } from "./token";
import { TokenReader } from "./token-reader";

/**
 * One member of an object stream's index.
 */
export interface ObjectStreamEntry {
  objNum: number;
  /** Byte offset relative to /First */
  offset: number;
}

/**
 * Parser for object streams (/Type /ObjStm).
 *
 * The decoded data holds an index of N `objNum offset` integer pairs,
 * followed (at /First) by the member objects without obj/endobj wrappers.
 * Decoding happens on first access and is done once.
 *
 * @example
 * ```typescript
 * const parser = new ObjectStreamParser(stream);
 * const obj = parser.getObject(0);
 * ```
 */
export class ObjectStreamParser {
  private index: ObjectStreamEntry[] | null = null;
  private decodedData: Uint8Array | null = null;
  private readonly first: number;
  private readonly n: number;

  /**
   * @throws {StructureError} if the stream is not an object stream or lacks /N or /First
   */
  constructor(private stream: PdfStream) {
    const type = stream.getName("Type");

    if (type?.value !== "ObjStm") {
      throw new StructureError(`Expected /Type /ObjStm, got ${type?.value ?? "none"}`);
    }

    const n = stream.getNumber("N");
    const first = stream.getNumber("First");

    if (n === undefined || !n.isInteger() || n.value < 0) {
      throw new StructureError("Object stream missing valid /N entry");
    }

    if (first === undefined || !first.isInteger() || first.value < 0) {
      throw new StructureError("Object stream missing valid /First entry");
    }

    this.n = n.value;
    this.first = first.value;
  }

  /**
   * Decode the stream and read its index. Idempotent.
   *
   * @throws {StreamDecodeError} if the filter chain fails
   * @throws {StructureError} if the index is malformed
   */
  parse(): ObjectStreamEntry[] {
    if (this.index !== null) {
      return this.index;
    }

    const data = this.stream.getDecodedData();
    const reader = new TokenReader(new Scanner(data.subarray(0, this.first)));
    const index: ObjectStreamEntry[] = [];

    for (let i = 0; i < this.n; i++) {
      const objNum = reader.nextToken();
      const offset = reader.nextToken();

      if (!isInteger(objNum) || !isInteger(offset)) {
        throw new StructureError(`Invalid object stream index at entry ${i}`);
      }

      index.push({ objNum: objNum.value, offset: offset.value });
    }

    this.decodedData = data;
    this.index = index;

    return index;
  }

  /**
   * Get the member at `index` (the xref entry's index within the stream).
   *
   * @returns The parsed object, or null if index is out of range
   */
  getObject(index: number): PdfObject | null {
    const entries = this.parse();
    const entry = entries.at(index);

    if (index < 0 || entry === undefined || this.decodedData === null) {
      return null;
    }

    const scanner = new Scanner(this.decodedData.subarray(this.first));

    scanner.moveTo(entry.offset);

    const result = new ObjectParser(new TokenReader(scanner)).parseObject();

    return result?.object ?? null;
  }

  /**
   * Object number of the member at `index`, or null if out of range.
   */
  getObjectNumber(index: number): number | null {
    const entry = this.parse().at(index);

    return index < 0 || entry === undefined ? null : entry.objNum;
  }

  get objectCount(): number {
    return this.n;
  }
}
