/**
 * PDF object types, type guards and structural equality.
 */
import { bytesEqual } from "#src/helpers/buffer";
import type { PdfArray } from "./pdf-array";
import type { PdfBool, PdfNull } from "./pdf-constant";
import type { PdfDict } from "./pdf-dict";
import type { PdfName } from "./pdf-name";
import type { PdfNumber } from "./pdf-number";
import type { PdfRef } from "./pdf-ref";
import type { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

/**
 * Union of all PDF object types.
 * All types have a `type` field for discrimination.
 */
export type PdfObject =
  | PdfNull
  | PdfBool
  | PdfNumber
  | PdfName
  | PdfString
  | PdfRef
  | PdfArray
  | PdfDict
  | PdfStream;

// Type guards

export function isPdfNull(obj: PdfObject): obj is PdfNull {
  return obj.type === "null";
}

export function isPdfNumber(obj: PdfObject): obj is PdfNumber {
  return obj.type === "number";
}

export function isPdfName(obj: PdfObject): obj is PdfName {
  return obj.type === "name";
}

export function isPdfRef(obj: PdfObject): obj is PdfRef {
  return obj.type === "ref";
}

export function isPdfArray(obj: PdfObject): obj is PdfArray {
  return obj.type === "array";
}

/** True for plain dictionaries and streams. */
export function isPdfDict(obj: PdfObject): obj is PdfDict {
  return obj.type === "dict" || obj.type === "stream";
}

export function isPdfStream(obj: PdfObject): obj is PdfStream {
  return obj.type === "stream";
}

/**
 * Null, booleans and names are interned: equal values share one instance,
 * so such a value cannot carry an identity of its own.
 */
export function isInterned(obj: PdfObject): obj is PdfNull | PdfBool | PdfName {
  return obj.type === "null" || obj.type === "bool" || obj.type === "name";
}

/**
 * The value of a dictionary's /Type entry, if it is a name.
 */
export function typeNameOf(obj: PdfObject): string | undefined {
  return isPdfDict(obj) ? obj.getName("Type")?.value : undefined;
}

/**
 * Structural equality.
 *
 * References compare by identity; composites compare element-wise without
 * following references. Dictionary key order is irrelevant. Streams also
 * compare their raw data.
 */
export function pdfEquals(a: PdfObject, b: PdfObject): boolean {
  if (a === b) {
    return true;
  }

  switch (a.type) {
    case "number":
      return b.type === "number" && a.value === b.value;
    case "string":
      return b.type === "string" && bytesEqual(a.bytes, b.bytes);
    case "array": {
      if (b.type !== "array" || a.length !== b.length) {
        return false;
      }

      const right = b.toArray();

      return a.toArray().every((item, i) => pdfEquals(item, right[i]));
    }
    case "dict":
    case "stream": {
      if (b.type !== a.type || !isPdfDict(b) || a.size !== b.size) {
        return false;
      }

      for (const [key, value] of a) {
        const other = b.get(key);

        if (other === undefined || !pdfEquals(value, other)) {
          return false;
        }
      }

      if (isPdfStream(a) && isPdfStream(b)) {
        return bytesEqual(a.data, b.data);
      }

      return true;
    }
    default:
      // null, bool, name and ref are interned; identity was checked above
      return false;
  }
}
