import { CHAR_HASH, DELIMITERS, WHITESPACE } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

// Whitespace, delimiters and `#` itself are always escaped, as is
// anything outside printable ASCII
const NAME_NEEDS_ESCAPE = new Set([...WHITESPACE, ...DELIMITERS, CHAR_HASH]);

/**
 * The bytes of a name. Names read from a file hold one character per
 * byte; names with wider characters are taken as UTF-8.
 */
function nameBytes(name: string): Iterable<number> {
  const codes = Array.from(name, c => c.charCodeAt(0));

  return codes.every(code => code <= 0xff) ? codes : new TextEncoder().encode(name);
}

/**
 * Escape a PDF name for serialization, with `#XX` for every byte that
 * cannot appear as-is.
 */
export function escapeName(name: string): string {
  let result = "";

  for (const byte of nameBytes(name)) {
    result +=
      byte < 0x21 || byte > 0x7e || NAME_NEEDS_ESCAPE.has(byte)
        ? `#${byte.toString(16).toUpperCase().padStart(2, "0")}`
        : String.fromCharCode(byte);
  }

  return result;
}

/**
 * PDF name object (interned).
 *
 * In PDF: `/Type`, `/Page`, `/Length`
 *
 * Names are interned: `PdfName.of("Type") === PdfName.of("Type")`.
 * Use `.of()` to get or create instances.
 */
export class PdfName implements PdfPrimitive {
  get type(): "name" {
    return "name";
  }

  private static cache = new Map<string, PdfName>();

  private constructor(readonly value: string) {}

  /**
   * Get or create an interned PdfName for the given string.
   * The leading `/` should NOT be included.
   */
  static of(name: string): PdfName {
    let cached = PdfName.cache.get(name);

    if (!cached) {
      cached = new PdfName(name);

      PdfName.cache.set(name, cached);
    }

    return cached;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(`/${escapeName(this.value)}`);
  }

  // Names the document model looks at (pre-cached)
  static readonly Type = PdfName.of("Type");
  static readonly Root = PdfName.of("Root");
  static readonly Size = PdfName.of("Size");
  static readonly Prev = PdfName.of("Prev");
  static readonly XRefStm = PdfName.of("XRefStm");
  static readonly Encrypt = PdfName.of("Encrypt");
  static readonly Catalog = PdfName.of("Catalog");
  static readonly Length = PdfName.of("Length");
  static readonly Filter = PdfName.of("Filter");
  static readonly FlateDecode = PdfName.of("FlateDecode");
  static readonly ObjStm = PdfName.of("ObjStm");
  static readonly XRef = PdfName.of("XRef");
}
