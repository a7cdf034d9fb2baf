import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/** Highest generation number a cross-reference entry can hold. */
export const MAX_GENERATION = 65535;

/**
 * Identity of an indirect object, and the reference that points at it.
 *
 * In PDF: `1 0 R`, `42 0 R`
 *
 * Interned by object and generation number, so identities compare with
 * `===` and `key` can stand in for them in maps.
 */
export class PdfRef implements PdfPrimitive {
  get type(): "ref" {
    return "ref";
  }

  private static cache = new Map<string, PdfRef>();

  readonly key: string;

  private constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {
    this.key = `${objectNumber} ${generation}`;
  }

  static of(objectNumber: number, generation = 0): PdfRef {
    const key = `${objectNumber} ${generation}`;
    let ref = PdfRef.cache.get(key);

    if (ref === undefined) {
      ref = new PdfRef(objectNumber, generation);
      PdfRef.cache.set(key, ref);
    }

    return ref;
  }

  /** Orders by object number, then generation. */
  static compare(a: PdfRef, b: PdfRef): number {
    return a.objectNumber - b.objectNumber || a.generation - b.generation;
  }

  /** Object number 0 heads the free list and names no object. */
  get isSentinel(): boolean {
    return this.objectNumber === 0;
  }

  /**
   * The generation a free entry records once this object is deleted.
   * Stays at the maximum once reached, so the number is never reused.
   */
  get nextGeneration(): number {
    return Math.min(this.generation + 1, MAX_GENERATION);
  }

  toString(): string {
    return `${this.key} R`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }
}
