import { writeHexString, writeLiteralString } from "#src/helpers/strings";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

const UTF16BE_BOM = [0xfe, 0xff];

/**
 * PDF string object: raw bytes plus the syntax they were written in.
 *
 * In PDF: `(Hello World)` (literal) or `<48656C6C6F>` (hex)
 *
 * Equality and identity ignore the format; it only matters for output.
 */
export class PdfString implements PdfPrimitive {
  get type(): "string" {
    return "string";
  }

  constructor(
    readonly bytes: Uint8Array,
    readonly format: "literal" | "hex" = "literal",
  ) {}

  /**
   * Read the bytes as a text string: UTF-16BE after a byte order mark,
   * one character per byte otherwise.
   */
  asString(): string {
    if (this.bytes[0] === UTF16BE_BOM[0] && this.bytes[1] === UTF16BE_BOM[1]) {
      return new TextDecoder("utf-16be").decode(this.bytes.subarray(2));
    }

    return Array.from(this.bytes, byte => String.fromCharCode(byte)).join("");
  }

  /**
   * A literal string holding `text`: one byte per character when every
   * character fits, UTF-16BE with a byte order mark otherwise.
   */
  static fromString(text: string): PdfString {
    if (Array.from(text).every(c => c.charCodeAt(0) <= 0xff)) {
      return new PdfString(Uint8Array.from(text, c => c.charCodeAt(0)));
    }

    const bytes = [...UTF16BE_BOM];

    for (let i = 0; i < text.length; i++) {
      const unit = text.charCodeAt(i);

      bytes.push(unit >> 8, unit & 0xff);
    }

    return new PdfString(new Uint8Array(bytes));
  }

  toBytes(writer: ByteWriter): void {
    if (this.format === "hex") {
      writeHexString(writer, this.bytes);
    } else {
      writeLiteralString(writer, this.bytes);
    }
  }
}
