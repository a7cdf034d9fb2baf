import {
  BS,
  CHAR_BACKSLASH,
  CHAR_BRACKET_CLOSE,
  CHAR_BRACKET_OPEN,
  CHAR_GREATER_THAN,
  CHAR_HASH,
  CHAR_LESS_THAN,
  CHAR_MINUS,
  CHAR_PARENTHESIS_CLOSE,
  CHAR_PARENTHESIS_OPEN,
  CHAR_PERCENT,
  CHAR_PERIOD,
  CHAR_PLUS,
  CHAR_SLASH,
  CR,
  DIGIT_0,
  FF,
  hexValue,
  isDigit,
  isRegularChar,
  isWhitespace,
  LF,
  TAB,
} from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import type {
  DelimiterToken,
  KeywordToken,
  NameToken,
  NumberToken,
  StringToken,
  Token,
} from "./token";

/** Escape letters inside literal strings: `\n`, `\r`, `\t`, `\b`, `\f`. */
const ESCAPES = new Map([
  [0x6e, LF],
  [0x72, CR],
  [0x74, TAB],
  [0x62, BS],
  [0x66, FF],
]);

/**
 * On-demand tokenizer for PDF syntax.
 *
 * Reads tokens one at a time from a Scanner, skipping whitespace and
 * comments. Malformed input is read leniently: unterminated strings end at
 * EOF, stray bytes become one-character keywords.
 */
export class TokenReader {
  private cachedToken: Token | null = null;

  constructor(private scanner: Scanner) {}

  /**
   * Position of the next unread byte. A peeked token counts as unread.
   */
  get position(): number {
    return this.cachedToken?.position ?? this.scanner.position;
  }

  /**
   * Reposition the reader, discarding any peeked token.
   */
  moveTo(offset: number): void {
    this.cachedToken = null;
    this.scanner.moveTo(offset);
  }

  peekToken(): Token {
    if (this.cachedToken === null) {
      this.cachedToken = this.readToken();
    }

    return this.cachedToken;
  }

  nextToken(): Token {
    const token = this.peekToken();

    this.cachedToken = null;

    return token;
  }

  skipWhitespaceAndComments(): void {
    while (true) {
      const byte = this.scanner.peek();

      if (isWhitespace(byte)) {
        this.scanner.advance();
        continue;
      }

      if (byte === CHAR_PERCENT) {
        this.skipToEndOfLine();
        continue;
      }

      return;
    }
  }

  private skipToEndOfLine(): void {
    while (true) {
      const byte = this.scanner.peek();

      if (byte === -1 || byte === LF || byte === CR) {
        return;
      }

      this.scanner.advance();
    }
  }

  private readToken(): Token {
    this.skipWhitespaceAndComments();

    const position = this.scanner.position;
    const byte = this.scanner.peek();

    switch (byte) {
      case -1:
        return { type: "eof", position };
      case CHAR_SLASH:
        return this.readName(position);
      case CHAR_PARENTHESIS_OPEN:
        return this.readLiteralString(position);
      case CHAR_LESS_THAN:
        return this.readAngleBracket(position);
      case CHAR_GREATER_THAN:
        return this.readClosingAngle(position);
      case CHAR_BRACKET_OPEN:
        this.scanner.advance();

        return { type: "delimiter", value: "[", position };
      case CHAR_BRACKET_CLOSE:
        this.scanner.advance();

        return { type: "delimiter", value: "]", position };
    }

    if (isDigit(byte) || byte === CHAR_PLUS || byte === CHAR_MINUS || byte === CHAR_PERIOD) {
      return this.readNumber(position);
    }

    return this.readKeyword(position);
  }

  private readNumber(position: number): NumberToken | KeywordToken {
    const start = this.scanner.position;
    let negative = false;
    let hasDecimal = false;
    let hasDigit = false;

    const sign = this.scanner.peek();

    if (sign === CHAR_PLUS || sign === CHAR_MINUS) {
      negative = sign === CHAR_MINUS;
      this.scanner.advance();

      // Producers occasionally write "--5"; read it as 5.
      if (this.scanner.peek() === CHAR_MINUS) {
        negative = false;

        while (this.scanner.peek() === CHAR_MINUS) {
          this.scanner.advance();
        }
      }
    }

    const digitsStart = this.scanner.position;

    while (true) {
      const byte = this.scanner.peek();

      if (isDigit(byte)) {
        hasDigit = true;
      } else if (byte === CHAR_PERIOD && !hasDecimal) {
        hasDecimal = true;
      } else {
        break;
      }

      this.scanner.advance();
    }

    if (!hasDigit) {
      while (isRegularChar(this.scanner.peek())) {
        this.scanner.advance();
      }

      return { type: "keyword", value: this.text(start, this.scanner.position), position };
    }

    const magnitude = Number.parseFloat(this.text(digitsStart, this.scanner.position));
    const value = negative ? -magnitude : magnitude;

    return { type: "number", value, isInteger: !hasDecimal, position };
  }

  private readName(position: number): NameToken {
    this.scanner.advance();

    const bytes: number[] = [];

    while (isRegularChar(this.scanner.peek())) {
      const byte = this.scanner.advance();

      if (byte === CHAR_HASH) {
        const high = hexValue(this.scanner.peek());
        const low = hexValue(this.scanner.peekAt(this.scanner.position + 1));

        if (high !== -1 && low !== -1) {
          this.scanner.advance();
          this.scanner.advance();
          bytes.push((high << 4) | low);
          continue;
        }
      }

      bytes.push(byte);
    }

    // One character per byte, so that any name survives a write unchanged
    return { type: "name", value: String.fromCharCode(...bytes), position };
  }

  private readLiteralString(position: number): StringToken {
    this.scanner.advance();

    const bytes: number[] = [];
    let depth = 1;

    while (true) {
      const byte = this.scanner.advance();

      if (byte === -1) {
        break;
      }

      if (byte === CHAR_PARENTHESIS_OPEN) {
        depth++;
      } else if (byte === CHAR_PARENTHESIS_CLOSE) {
        depth--;

        if (depth === 0) {
          break;
        }
      } else if (byte === CHAR_BACKSLASH) {
        const escaped = this.readEscape();

        if (escaped !== null) {
          bytes.push(escaped);
        }

        continue;
      } else if (byte === CR) {
        // End-of-line inside a string reads as LF
        if (this.scanner.peek() === LF) {
          this.scanner.advance();
        }

        bytes.push(LF);
        continue;
      }

      bytes.push(byte);
    }

    return { type: "string", value: new Uint8Array(bytes), format: "literal", position };
  }

  /**
   * Read the byte(s) after a backslash. Returns null for a line continuation.
   */
  private readEscape(): number | null {
    const byte = this.scanner.advance();

    if (byte === -1) {
      return null;
    }

    const mapped = ESCAPES.get(byte);

    if (mapped !== undefined) {
      return mapped;
    }

    if (byte === CR) {
      if (this.scanner.peek() === LF) {
        this.scanner.advance();
      }

      return null;
    }

    if (byte === LF) {
      return null;
    }

    if (byte >= DIGIT_0 && byte <= DIGIT_0 + 7) {
      let value = byte - DIGIT_0;

      for (let digits = 1; digits < 3; digits++) {
        const next = this.scanner.peek();

        if (next < DIGIT_0 || next > DIGIT_0 + 7) {
          break;
        }

        this.scanner.advance();
        value = (value << 3) | (next - DIGIT_0);
      }

      return value & 0xff;
    }

    // \( \) \\ and unknown escapes stand for the character itself
    return byte;
  }

  private readAngleBracket(position: number): StringToken | DelimiterToken {
    this.scanner.advance();

    if (this.scanner.peek() === CHAR_LESS_THAN) {
      this.scanner.advance();

      return { type: "delimiter", value: "<<", position };
    }

    const bytes: number[] = [];
    let pending: number | null = null;

    while (true) {
      const byte = this.scanner.advance();

      if (byte === -1 || byte === CHAR_GREATER_THAN) {
        break;
      }

      const nibble = hexValue(byte);

      // Whitespace and junk inside hex strings are skipped
      if (nibble === -1) {
        continue;
      }

      if (pending === null) {
        pending = nibble;
      } else {
        bytes.push((pending << 4) | nibble);
        pending = null;
      }
    }

    // Odd number of digits: the last one is padded with 0
    if (pending !== null) {
      bytes.push(pending << 4);
    }

    return { type: "string", value: new Uint8Array(bytes), format: "hex", position };
  }

  private readClosingAngle(position: number): DelimiterToken {
    this.scanner.advance();

    // A lone ">" is not valid syntax; read it as ">>"
    if (this.scanner.peek() === CHAR_GREATER_THAN) {
      this.scanner.advance();
    }

    return { type: "delimiter", value: ">>", position };
  }

  private readKeyword(position: number): KeywordToken {
    const start = this.scanner.position;

    // Always consume at least one byte so that stray delimiters ("{", ")")
    // cannot stall the reader.
    this.scanner.advance();

    if (isRegularChar(this.scanner.peekAt(start))) {
      while (isRegularChar(this.scanner.peek())) {
        this.scanner.advance();
      }
    }

    return { type: "keyword", value: this.text(start, this.scanner.position), position };
  }

  private text(start: number, end: number): string {
    return new TextDecoder().decode(this.scanner.bytes.subarray(start, end));
  }
}
