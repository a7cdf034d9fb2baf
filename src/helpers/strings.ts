/**
 * Writing string bodies in the two PDF string syntaxes.
 */

import type { ByteWriter } from "#src/io/byte-writer";
import { CHAR_BACKSLASH, CHAR_PARENTHESIS_CLOSE, CHAR_PARENTHESIS_OPEN, CR } from "./chars";

// Escape sequence per byte that cannot appear bare in `( ... )`. A bare CR
// would be read back as LF.
const LITERAL_ESCAPES = new Map<number, string>([
  [CHAR_BACKSLASH, "\\\\"],
  [CHAR_PARENTHESIS_OPEN, "\\("],
  [CHAR_PARENTHESIS_CLOSE, "\\)"],
  [CR, "\\r"],
]);

/** Write `(bytes)` with escapes. */
export function writeLiteralString(writer: ByteWriter, bytes: Uint8Array): void {
  writer.writeByte(CHAR_PARENTHESIS_OPEN);

  for (const byte of bytes) {
    const escape = LITERAL_ESCAPES.get(byte);

    if (escape === undefined) {
      writer.writeByte(byte);
    } else {
      writer.writeAscii(escape);
    }
  }

  writer.writeByte(CHAR_PARENTHESIS_CLOSE);
}

/** Write `<hex>`, uppercase, two digits per byte. */
export function writeHexString(writer: ByteWriter, bytes: Uint8Array): void {
  writer.writeAscii(`<${Array.from(bytes, byte => byte.toString(16).toUpperCase().padStart(2, "0")).join("")}>`);
}
