import type { LengthResolver, ParsedIndirectObject } from "./indirect-object-parser";
import type { XRefData } from "./xref-parser";

/**
 * Byte-level reader the document model loads from.
 *
 * The revision chain and the object resolver only talk to the file through
 * this interface, so tests (and other storage back ends) can substitute
 * their own.
 */
export interface ObjectSource {
  /** Offset of the newest cross-reference section. */
  readonly startXRef: number;

  /** Version from the `%PDF-x.y` header. */
  readonly headerVersion: string;

  /**
   * Parse the `n g obj ... endobj` definition at `offset`.
   *
   * @throws {ObjectParseError} if no object can be read there
   */
  parseObjectAt(offset: number, lengthResolver?: LengthResolver): ParsedIndirectObject;

  /**
   * Parse the cross-reference section (table or stream) and trailer at `offset`.
   *
   * @throws {XRefParseError} if no section can be read there
   */
  parseRevisionAt(offset: number): XRefData;
}
