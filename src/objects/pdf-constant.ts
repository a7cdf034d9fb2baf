import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * The PDF `null` object. There is one instance.
 *
 * A reference to a missing or free object means the same as `null`, and
 * dereferencing turns such references into this value.
 */
export class PdfNull implements PdfPrimitive {
  static readonly instance = new PdfNull();

  get type(): "null" {
    return "null";
  }

  private constructor() {}

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("null");
  }
}

/**
 * `true` or `false`. There are two instances, so booleans compare by
 * identity and cannot be indirect objects with an identity of their own.
 */
export class PdfBool implements PdfPrimitive {
  static readonly TRUE = new PdfBool(true);
  static readonly FALSE = new PdfBool(false);

  private constructor(readonly value: boolean) {}

  get type(): "bool" {
    return "bool";
  }

  static of(value: boolean): PdfBool {
    return value ? PdfBool.TRUE : PdfBool.FALSE;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(String(this.value));
  }
}

const KEYWORD_CONSTANTS = new Map<string, PdfNull | PdfBool>([
  ["null", PdfNull.instance],
  ["true", PdfBool.TRUE],
  ["false", PdfBool.FALSE],
]);

/**
 * The value a bare keyword stands for, or undefined for keywords that are
 * not values (`obj`, `R`, `stream`, ...).
 */
export function keywordConstant(keyword: string): PdfNull | PdfBool | undefined {
  return KEYWORD_CONSTANTS.get(keyword);
}
