import { PdfArray } from "#src/objects/pdf-array";
import { keywordConstant, PdfNull } from "#src/objects/pdf-constant";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { MAX_GENERATION, PdfRef } from "#src/objects/pdf-ref";
import { PdfString } from "#src/objects/pdf-string";
import { ObjectParseError } from "./errors";
import { isDelimiter, isInteger, isKeyword, type NumberToken } from "./token";
import type { TokenReader } from "./token-reader";

/**
 * Result of parsing an object.
 *
 * `hasStream` is set when a dictionary is followed by the `stream` keyword;
 * `streamDataPosition` is the byte offset just past that keyword.
 */
export type ParseResult =
  | { object: PdfObject; hasStream: false }
  | { object: PdfDict; hasStream: true; streamDataPosition: number };

export type WarningCallback = (message: string, position: number) => void;

/**
 * Recursive descent parser for direct PDF objects.
 *
 * Distinguishes references (`1 0 R`) from consecutive integers by reading
 * ahead and rewinding the TokenReader when the pattern does not match.
 */
export class ObjectParser {
  private static readonly MAX_DEPTH = 500;

  private depth = 0;

  /**
   * When true, malformed composites are closed at the point of trouble
   * with a warning instead of throwing.
   */
  recoveryMode = false;

  onWarning: WarningCallback | null = null;

  constructor(private reader: TokenReader) {}

  /**
   * Parse one object at the reader's position. Returns null at EOF.
   *
   * @throws {ObjectParseError} on malformed syntax (outside recovery mode)
   */
  parseObject(): ParseResult | null {
    if (this.reader.peekToken().type === "eof") {
      return null;
    }

    if (++this.depth > ObjectParser.MAX_DEPTH) {
      this.depth--;
      throw new ObjectParseError("Maximum nesting depth exceeded");
    }

    try {
      return this.parseValue();
    } finally {
      this.depth--;
    }
  }

  private warn(message: string): void {
    this.onWarning?.(message, this.reader.position);
  }

  /**
   * Throw, or in recovery mode just warn.
   */
  private fail(message: string): void {
    if (!this.recoveryMode) {
      throw new ObjectParseError(message);
    }

    this.warn(message);
  }

  private parseValue(): ParseResult {
    const token = this.reader.nextToken();

    switch (token.type) {
      case "number":
        return { object: this.parseNumberOrRef(token), hasStream: false };
      case "name":
        return { object: PdfName.of(token.value), hasStream: false };
      case "string":
        return { object: new PdfString(token.value, token.format), hasStream: false };
      case "delimiter":
        if (token.value === "[") {
          return { object: this.parseArray(), hasStream: false };
        }

        if (token.value === "<<") {
          return this.parseDict();
        }

        throw new ObjectParseError(`Unexpected delimiter ${token.value} at offset ${token.position}`);
      case "keyword":
        return { object: this.parseKeyword(token.value, token.position), hasStream: false };
      case "eof":
        throw new ObjectParseError("Unexpected end of input");
    }
  }

  private parseKeyword(value: string, position: number): PdfObject {
    const constant = keywordConstant(value);

    if (constant === undefined) {
      throw new ObjectParseError(`Unexpected keyword "${value}" at offset ${position}`);
    }

    return constant;
  }

  private parseNumberOrRef(first: NumberToken): PdfObject {
    if (!first.isInteger) {
      return PdfNumber.of(first.value);
    }

    const second = this.reader.peekToken();

    if (!isInteger(second)) {
      return PdfNumber.of(first.value);
    }

    this.reader.nextToken();

    if (!isKeyword(this.reader.peekToken(), "R")) {
      // Two plain integers; give the second one back
      this.reader.moveTo(second.position);

      return PdfNumber.of(first.value);
    }

    this.reader.nextToken();

    if (first.value < 0 || second.value < 0 || second.value > MAX_GENERATION) {
      this.fail(`Invalid reference ${first.value} ${second.value} R`);

      return PdfNull.instance;
    }

    return PdfRef.of(first.value, second.value);
  }

  private parseArray(): PdfArray {
    const items: PdfObject[] = [];

    while (true) {
      const token = this.reader.peekToken();

      if (token.type === "eof") {
        this.fail("Unterminated array at EOF");
        break;
      }

      if (isDelimiter(token, "]")) {
        this.reader.nextToken();
        break;
      }

      const result = this.parseObject();

      if (result !== null) {
        items.push(result.object);
      }
    }

    return new PdfArray(items);
  }

  private parseDict(): ParseResult {
    const dict = new PdfDict();

    while (true) {
      const token = this.reader.nextToken();

      if (token.type === "eof") {
        this.fail("Unterminated dictionary at EOF");
        break;
      }

      if (isDelimiter(token, ">>")) {
        break;
      }

      if (token.type !== "name") {
        this.fail(`Invalid dictionary key at offset ${token.position}: expected name, got ${token.type}`);
        continue;
      }

      const next = this.reader.peekToken();

      if (isDelimiter(next, ">>")) {
        this.fail(`Missing value for key ${token.value}`);
        continue;
      }

      const value = this.parseObject();

      if (value !== null) {
        dict.set(token.value, value.object);
      }
    }

    // "stream" is a keyword of regular characters, so peeking it never
    // reads into the binary data that follows.
    const after = this.reader.peekToken();

    if (isKeyword(after, "stream")) {
      return { object: dict, hasStream: true, streamDataPosition: after.position + "stream".length };
    }

    return { object: dict, hasStream: false };
  }
}
