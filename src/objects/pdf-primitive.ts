import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "./pdf-object";
import type { PdfRef } from "./pdf-ref";

/**
 * Reverse lookup from a materialized value to the identity it is stored
 * under. Returns null for direct values.
 */
export type RefLookup = (obj: PdfObject) => PdfRef | null;

/** The other direction: the value bound to a reference, or null. */
export type RefResolver = (ref: PdfRef) => PdfObject | null;

/** What every value in the object model can do: name its kind and write itself. */
export interface PdfPrimitive {
  readonly type: string;

  /**
   * Write this object's PDF byte representation.
   *
   * When `refs` is given, nested values that are themselves indirect
   * objects are written as `n g R` rather than inline. The receiver itself
   * is always written inline.
   */
  toBytes(writer: ByteWriter, refs?: RefLookup): void;
}

/** Write a value held by an array or dictionary: by reference when it has an identity. */
export function writeNested(writer: ByteWriter, value: PdfObject, refs?: RefLookup): void {
  const ref = refs?.(value);

  if (ref) {
    ref.toBytes(writer);

    return;
  }

  value.toBytes(writer, refs);
}
