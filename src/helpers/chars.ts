/**
 * Byte values of PDF syntax and the lexical classes built from them.
 */

export const BS = 0x08;
export const TAB = 0x09;
export const LF = 0x0a;
export const FF = 0x0c;
export const CR = 0x0d;

export const CHAR_PARENTHESIS_OPEN = 0x28; // (
export const CHAR_PARENTHESIS_CLOSE = 0x29; // )
export const CHAR_LESS_THAN = 0x3c; // <
export const CHAR_GREATER_THAN = 0x3e; // >
export const CHAR_BRACKET_OPEN = 0x5b; // [
export const CHAR_BRACKET_CLOSE = 0x5d; // ]
export const CHAR_SLASH = 0x2f; // /
export const CHAR_PERCENT = 0x25; // %
export const CHAR_BACKSLASH = 0x5c; // \
export const CHAR_PLUS = 0x2b; // +
export const CHAR_MINUS = 0x2d; // -
export const CHAR_PERIOD = 0x2e; // .
export const CHAR_HASH = 0x23; // #
export const DIGIT_0 = 0x30;

export const WHITESPACE: ReadonlySet<number> = new Set([0x00, TAB, LF, FF, CR, 0x20]);

export const DELIMITERS: ReadonlySet<number> = new Set(Array.from("()<>[]{}/%", c => c.charCodeAt(0)));

// Digit value per byte, -1 where the byte is not a hex digit
const HEX_VALUES = new Int8Array(256).fill(-1);

for (const [i, c] of [..."0123456789abcdef"].entries()) {
  HEX_VALUES[c.charCodeAt(0)] = i;
  HEX_VALUES[c.toUpperCase().charCodeAt(0)] = i;
}

export function isWhitespace(byte: number): boolean {
  return WHITESPACE.has(byte);
}

/** Neither whitespace nor a delimiter. End of input (-1) is not regular. */
export function isRegularChar(byte: number): boolean {
  return byte >= 0 && !WHITESPACE.has(byte) && !DELIMITERS.has(byte);
}

export function isDigit(byte: number): boolean {
  return byte >= DIGIT_0 && byte <= DIGIT_0 + 9;
}

/** Value of a hex digit, or -1. */
export function hexValue(byte: number): number {
  return byte >= 0 && byte < 256 ? HEX_VALUES[byte] : -1;
}
