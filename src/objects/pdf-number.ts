import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/** Digits kept after the decimal point when writing reals */
const REAL_PRECISION = 5;

/**
 * PDF numeric object (integer or real).
 *
 * In PDF: `42`, `-3.14`, `0.5`
 *
 * Not interned: an indirect number (e.g. a stream's `/Length 7 0 R`
 * target) needs an instance of its own.
 */
export class PdfNumber implements PdfPrimitive {
  get type(): "number" {
    return "number";
  }

  constructor(readonly value: number) {}

  isInteger(): boolean {
    return Number.isInteger(this.value);
  }

  static of(value: number): PdfNumber {
    return new PdfNumber(value);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(formatNumber(this.value));
  }
}

/**
 * Integers as-is; reals rounded, without exponent or trailing zeros.
 */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return value.toString();
  }

  const str = value.toFixed(REAL_PRECISION).replace(/\.?0+$/, "");

  return str === "" || str === "-" || str === "-0" ? "0" : str;
}
