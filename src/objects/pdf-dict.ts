import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfArray } from "./pdf-array";
import { PdfName } from "./pdf-name";
import type { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import { type PdfPrimitive, type RefLookup, type RefResolver, writeNested } from "./pdf-primitive";
import type { PdfRef } from "./pdf-ref";

/**
 * PDF dictionary object (mutable).
 *
 * In PDF: `<< /Type /Page /MediaBox [0 0 612 792] >>`
 *
 * Keys are always PdfName; insertion order is kept for output but carries
 * no meaning.
 */
export class PdfDict implements PdfPrimitive {
  get type(): "dict" | "stream" {
    return "dict";
  }

  private readonly entries = new Map<PdfName, PdfObject>();

  constructor(entries: Iterable<[PdfName | string, PdfObject]> = []) {
    for (const [key, value] of entries) {
      this.entries.set(toName(key), value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Get value for key. With a resolver, a reference value is followed;
   * a reference to nothing reads as absent.
   */
  get(key: PdfName | string, resolver?: RefResolver): PdfObject | undefined {
    const value = this.entries.get(toName(key));

    if (resolver && value?.type === "ref") {
      return resolver(value) ?? undefined;
    }

    return value;
  }

  set(key: PdfName | string, value: PdfObject): void {
    this.entries.set(toName(key), value);
  }

  has(key: PdfName | string): boolean {
    return this.entries.has(toName(key));
  }

  delete(key: PdfName | string): boolean {
    return this.entries.delete(toName(key));
  }

  keys(): Iterable<PdfName> {
    return this.entries.keys();
  }

  values(): Iterable<PdfObject> {
    return this.entries.values();
  }

  /**
   * Replace every value by what `fn` returns for it, in place. Keys and
   * their order stay as they are.
   */
  replaceEach(fn: (value: PdfObject, key: PdfName) => PdfObject): void {
    for (const [key, value] of [...this.entries]) {
      this.entries.set(key, fn(value, key));
    }
  }

  *[Symbol.iterator](): Iterator<[PdfName, PdfObject]> {
    yield* this.entries;
  }

  // Typed getters: undefined when the value has another type. With a
  // resolver, a reference is followed first.

  getName(key: string, resolver?: RefResolver): PdfName | undefined {
    const value = this.get(key, resolver);

    return value?.type === "name" ? value : undefined;
  }

  getNumber(key: string, resolver?: RefResolver): PdfNumber | undefined {
    const value = this.get(key, resolver);

    return value?.type === "number" ? value : undefined;
  }

  getArray(key: string, resolver?: RefResolver): PdfArray | undefined {
    const value = this.get(key, resolver);

    return value?.type === "array" ? value : undefined;
  }

  /** Dictionaries and streams both qualify. */
  getDict(key: string, resolver?: RefResolver): PdfDict | undefined {
    const value = this.get(key, resolver);

    return value?.type === "dict" || value?.type === "stream" ? value : undefined;
  }

  getRef(key: string): PdfRef | undefined {
    const value = this.get(key);

    return value?.type === "ref" ? value : undefined;
  }

  /** Shallow: values are shared. */
  clone(): PdfDict {
    return new PdfDict(this.entries);
  }

  static of(entries: Record<string, PdfObject>): PdfDict {
    return new PdfDict(Object.entries(entries));
  }

  toBytes(writer: ByteWriter, refs?: RefLookup): void {
    writer.writeAscii("<<");
    this.writeEntries(writer, refs);
    writer.writeAscii(">>");
  }

  /**
   * Write `/Key value` pairs, one per line. `skip` names keys the caller
   * writes itself.
   */
  protected writeEntries(writer: ByteWriter, refs?: RefLookup, skip?: PdfName): void {
    for (const [key, value] of this.entries) {
      if (key === skip) {
        continue;
      }

      key.toBytes(writer);
      writer.writeAscii(" ");
      writeNested(writer, value, refs);
      writer.writeAscii("\n");
    }
  }
}

function toName(key: PdfName | string): PdfName {
  return typeof key === "string" ? PdfName.of(key) : key;
}
