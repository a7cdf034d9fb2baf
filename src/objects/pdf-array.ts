import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "./pdf-object";
import { type PdfPrimitive, type RefLookup, writeNested } from "./pdf-primitive";

/**
 * PDF array object (mutable).
 *
 * In PDF: `[1 2 3]`, `[/Name (string) 42]`
 *
 * Items are references as parsed; dereferencing swaps them for the shared
 * objects in place, and `toBytes` with a lookup writes those back as
 * references.
 */
export class PdfArray implements PdfPrimitive {
  get type(): "array" {
    return "array";
  }

  private readonly items: PdfObject[];

  constructor(items: Iterable<PdfObject> = []) {
    this.items = [...items];
  }

  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): PdfObject | undefined {
    return this.items.at(index);
  }

  set(index: number, value: PdfObject): void {
    this.items[index] = value;
  }

  push(...values: PdfObject[]): void {
    this.items.push(...values);
  }

  /** Swap every item for what `fn` returns, keeping positions. */
  replaceEach(fn: (item: PdfObject, index: number) => PdfObject): void {
    this.items.forEach((item, i) => {
      this.items[i] = fn(item, i);
    });
  }

  [Symbol.iterator](): Iterator<PdfObject> {
    return this.items[Symbol.iterator]();
  }

  toArray(): PdfObject[] {
    return [...this.items];
  }

  toBytes(writer: ByteWriter, refs?: RefLookup): void {
    writer.writeAscii("[");

    for (const [i, item] of this.items.entries()) {
      if (i > 0) {
        writer.writeAscii(" ");
      }

      writeNested(writer, item, refs);
    }

    writer.writeAscii("]");
  }
}
