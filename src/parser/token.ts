/**
 * Tokens produced by TokenReader. Every token records the byte offset it
 * starts at, so that parsers can rewind and report positions.
 */

export type Token = NumberToken | NameToken | StringToken | KeywordToken | DelimiterToken | EofToken;

interface Positioned {
  /** Offset of the token's first byte. */
  position: number;
}

export interface NumberToken extends Positioned {
  type: "number";
  value: number;
  /** Written without a decimal point, so usable as an object number. */
  isInteger: boolean;
}

export interface NameToken extends Positioned {
  type: "name";
  /** Without the leading `/`, `#XX` escapes decoded. */
  value: string;
}

export interface StringToken extends Positioned {
  type: "string";
  value: Uint8Array;
  format: "literal" | "hex";
}

/** Bare words: `obj`, `endobj`, `R`, `true`, `null`, `xref`, ... */
export interface KeywordToken extends Positioned {
  type: "keyword";
  value: string;
}

export interface DelimiterToken extends Positioned {
  type: "delimiter";
  value: "[" | "]" | "<<" | ">>";
}

export interface EofToken extends Positioned {
  type: "eof";
}

/** Whether `token` is the bare word `value`. */
export function isKeyword(token: Token, value: string): token is KeywordToken {
  return token.type === "keyword" && token.value === value;
}

export function isInteger(token: Token): token is NumberToken {
  return token.type === "number" && token.isInteger;
}

export function isDelimiter(token: Token, value: DelimiterToken["value"]): token is DelimiterToken {
  return token.type === "delimiter" && token.value === value;
}
