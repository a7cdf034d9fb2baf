import { Scanner } from "#src/io/scanner";
import { StructureError } from "./errors";
import { IndirectObjectParser, type LengthResolver, type ParsedIndirectObject } from "./indirect-object-parser";
import type { ObjectSource } from "./object-source";
import { type XRefData, XRefParser } from "./xref-parser";

/**
 * Options for reading a file.
 */
export interface ParseOptions {
  /** Enable lenient parsing for malformed PDFs (default: true) */
  lenient?: boolean;
}

// PDF header signature: %PDF-
const PDF_HEADER = "%PDF-";

// Version pattern: X.Y where X is 1-9 and Y is 0-9
const VERSION_PATTERN = /^[1-9]\.\d$/;

export const DEFAULT_VERSION = "1.7";

// Maximum bytes to search for header
const HEADER_SEARCH_LIMIT = 1024;

/**
 * ObjectSource over an in-memory file.
 *
 * Reads the header eagerly and everything else on demand. Warnings about
 * tolerated damage are appended to `warnings`.
 *
 * @example
 * ```typescript
 * const source = new FileParser(bytes);
 * const section = source.parseRevisionAt(source.startXRef);
 * ```
 */
export class FileParser implements ObjectSource {
  readonly warnings: string[] = [];
  readonly headerVersion: string;

  private readonly scanner: Scanner;
  private readonly lenient: boolean;
  private readonly objectParser: IndirectObjectParser;
  private readonly xrefParser: XRefParser;
  private cachedStartXRef: number | null = null;

  /**
   * @throws {StructureError} in strict mode, when the header is missing or invalid
   */
  constructor(bytes: Uint8Array, options: ParseOptions = {}) {
    this.scanner = new Scanner(bytes);
    this.lenient = options.lenient ?? true;
    this.objectParser = new IndirectObjectParser(this.scanner, (message, position) =>
      this.warnings.push(`${message} (offset ${position})`),
    );
    this.xrefParser = new XRefParser(this.scanner);
    this.headerVersion = this.parseHeader();
  }

  /**
   * @throws {XRefParseError} if there is no startxref marker
   */
  get startXRef(): number {
    this.cachedStartXRef ??= this.xrefParser.findStartXRef();

    return this.cachedStartXRef;
  }

  get length(): number {
    return this.scanner.length;
  }

  parseObjectAt(offset: number, lengthResolver?: LengthResolver): ParsedIndirectObject {
    return this.objectParser.parseObjectAt(offset, lengthResolver);
  }

  parseRevisionAt(offset: number): XRefData {
    return this.xrefParser.parseAt(offset);
  }

  /**
   * Find `%PDF-x.y` within the first KB and return `x.y`.
   *
   * Garbage before the header and after the version is tolerated with a
   * warning; in lenient mode a missing or invalid version reads as 1.7.
   */
  private parseHeader(): string {
    const bytes = this.scanner.bytes;
    const searchLimit = Math.min(bytes.length, HEADER_SEARCH_LIMIT);
    let headerPos = -1;

    for (let i = 0; i <= searchLimit - PDF_HEADER.length; i++) {
      if (this.matchesAt(i, PDF_HEADER)) {
        headerPos = i;
        break;
      }
    }

    if (headerPos === -1) {
      return this.invalidHeader("PDF header not found");
    }

    if (headerPos > 0) {
      this.warnings.push(`PDF header found at offset ${headerPos} (expected 0)`);
    }

    let version = "";

    for (let i = headerPos + PDF_HEADER.length; i < bytes.length && version.length < 7; i++) {
      // Stop at whitespace or control chars
      if (bytes[i] <= 0x20) {
        break;
      }

      version += String.fromCharCode(bytes[i]);
    }

    if (VERSION_PATTERN.test(version)) {
      return version;
    }

    const match = version.match(/^([1-9]\.\d)/);

    if (match) {
      this.warnings.push(`Version string has garbage after it: ${version}`);

      return match[1];
    }

    return this.invalidHeader(`Invalid PDF version: ${version}`);
  }

  private invalidHeader(message: string): string {
    if (!this.lenient) {
      throw new StructureError(message);
    }

    this.warnings.push(`${message}, using ${DEFAULT_VERSION}`);

    return DEFAULT_VERSION;
  }

  private matchesAt(pos: number, str: string): boolean {
    for (let i = 0; i < str.length; i++) {
      if (this.scanner.peekAt(pos + i) !== str.charCodeAt(i)) {
        return false;
      }
    }

    return true;
  }
}
