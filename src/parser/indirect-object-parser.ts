import { CR, LF } from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { ObjectParseError } from "./errors";
import { ObjectParser, type WarningCallback } from "./object-parser";
import { isInteger, isKeyword } from "./token";
import { TokenReader } from "./token-reader";

/**
 * An `n g obj ... endobj` definition read from the file.
 */
export interface ParsedIndirectObject {
  ref: PdfRef;
  value: PdfObject;
}

/**
 * Resolves an indirect /Length reference to its integer value.
 * Returns null if not resolvable.
 */
export type LengthResolver = (ref: PdfRef) => number | null;

/**
 * Parser for indirect object definitions.
 *
 * Handles the `N M obj ... endobj` syntax and stream binary data.
 * Uses ObjectParser for the object value.
 */
export class IndirectObjectParser {
  constructor(
    private scanner: Scanner,
    private onWarning: WarningCallback | null = null,
  ) {}

  /**
   * Parse the indirect object starting at `offset`.
   *
   * @throws {ObjectParseError} when the bytes at `offset` are not an object
   *   definition, or a stream's length cannot be determined
   */
  parseObjectAt(offset: number, lengthResolver?: LengthResolver): ParsedIndirectObject {
    const reader = new TokenReader(this.scanner);

    reader.moveTo(offset);

    const objNum = reader.nextToken();
    const genNum = reader.nextToken();
    const keyword = reader.nextToken();

    if (!isInteger(objNum) || !isInteger(genNum) || !isKeyword(keyword, "obj")) {
      throw new ObjectParseError(`No object definition at offset ${offset}`, { offset });
    }

    const parser = new ObjectParser(reader);

    parser.recoveryMode = true;
    parser.onWarning = this.onWarning;

    const result = parser.parseObject();

    if (result === null) {
      throw new ObjectParseError(`Object ${objNum.value} ${genNum.value} has no value`);
    }

    const ref = PdfRef.of(objNum.value, genNum.value);

    if (!result.hasStream) {
      // A missing endobj is tolerated
      return { ref, value: result.object };
    }

    this.scanner.moveTo(result.streamDataPosition);

    return { ref, value: this.readStream(result.object, lengthResolver) };
  }

  /**
   * Read stream data; the scanner sits right after the "stream" keyword.
   */
  private readStream(dict: PdfDict, lengthResolver?: LengthResolver): PdfStream {
    // "stream" is followed by CRLF or LF (a lone CR is tolerated)
    if (this.scanner.peek() === CR) {
      this.scanner.advance();
    }

    if (this.scanner.peek() === LF) {
      this.scanner.advance();
    }

    const start = this.scanner.position;
    const length = this.resolveLength(dict, lengthResolver);

    if (start + length > this.scanner.length) {
      throw new ObjectParseError(`Stream at offset ${start} extends past end of file`);
    }

    const data = this.scanner.bytes.slice(start, start + length);

    this.scanner.moveTo(start + length);

    const reader = new TokenReader(this.scanner);

    if (!isKeyword(reader.nextToken(), "endstream")) {
      this.onWarning?.("Stream data not followed by endstream", start + length);
    }

    return new PdfStream(dict, data);
  }

  private resolveLength(dict: PdfDict, lengthResolver?: LengthResolver): number {
    const lengthObj = dict.get("Length");

    if (lengthObj?.type === "number") {
      return lengthObj.value;
    }

    if (lengthObj?.type === "ref") {
      const length = lengthResolver?.(lengthObj) ?? null;

      if (length === null) {
        throw new ObjectParseError(`Could not resolve /Length reference ${lengthObj}`);
      }

      return length;
    }

    throw new ObjectParseError(
      lengthObj === undefined ? "Stream missing required /Length entry" : `Invalid /Length type: ${lengthObj.type}`,
    );
  }
}
