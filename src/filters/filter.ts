import type { PdfDict } from "#src/objects/pdf-dict";

/**
 * A stream filter: one entry of a stream's /Filter chain.
 *
 * Filters are synchronous; the whole document is in memory and no operation
 * in the document model suspends.
 */
export interface Filter {
  /** Name as written in /Filter, e.g. "FlateDecode". */
  readonly name: string;

  decode(data: Uint8Array, params?: PdfDict): Uint8Array;

  encode(data: Uint8Array, params?: PdfDict): Uint8Array;
}

/**
 * One filter in a chain, with its /DecodeParms entry.
 */
export interface FilterSpec {
  name: string;
  params?: PdfDict;
}
