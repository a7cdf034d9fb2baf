import { deflate, inflate } from "pako";
import type { PdfDict } from "#src/objects/pdf-dict";
import { StreamDecodeError } from "#src/parser/errors";
import type { Filter } from "./filter";

/**
 * FlateDecode filter: zlib (RFC 1950) compression through pako.
 *
 * PNG/TIFF predictors are not implemented; a /Predictor above 1 is
 * rejected rather than returning undecoded rows.
 */
export class FlateFilter implements Filter {
  readonly name = "FlateDecode";

  decode(data: Uint8Array, params?: PdfDict): Uint8Array {
    const predictor = params?.getNumber("Predictor")?.value ?? 1;

    if (predictor > 1) {
      throw new StreamDecodeError(`FlateDecode predictor ${predictor} is not supported`);
    }

    try {
      return inflate(data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      throw new StreamDecodeError(`FlateDecode failed: ${message}`, { cause: error });
    }
  }

  encode(data: Uint8Array): Uint8Array {
    return deflate(data);
  }
}
