import { deflate } from "pako";
import { afterEach, describe, expect, it } from "vitest";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import { StreamDecodeError } from "#src/parser/errors";
import { bytesToString, stringToBytes } from "#src/test-utils";
import type { Filter } from "./filter";
import { FilterPipeline } from "./filter-pipeline";

/** Adds one to every byte on encode. */
const shiftFilter: Filter = {
  name: "TestShift",
  decode: data => data.map(byte => (byte - 1) & 0xff),
  encode: data => data.map(byte => (byte + 1) & 0xff),
};

describe("FilterPipeline", () => {
  afterEach(() => {
    FilterPipeline.reset();
  });

  it("registers FlateDecode by default", () => {
    expect(FilterPipeline.hasFilter("FlateDecode")).toBe(true);
    expect(FilterPipeline.hasFilter("LZWDecode")).toBe(false);
  });

  it("passes data through an empty chain", () => {
    const data = new Uint8Array([1, 2, 3]);

    expect(FilterPipeline.decode(data, [])).toEqual(data);
  });

  it("inflates FlateDecode data", () => {
    const compressed = deflate(stringToBytes("BT /F1 12 Tf ET"));

    expect(bytesToString(FilterPipeline.decode(compressed, { name: "FlateDecode" }))).toBe("BT /F1 12 Tf ET");
  });

  it("encodes in reverse order so that decoding restores the input", () => {
    FilterPipeline.register(shiftFilter);

    const chain = [{ name: "TestShift" }, { name: "FlateDecode" }];
    const encoded = FilterPipeline.encode(stringToBytes("abc"), chain);

    expect(bytesToString(FilterPipeline.decode(encoded, chain))).toBe("abc");
    // FlateDecode ran first, so the outer layer is the shift
    expect(encoded[0]).toBe(0x79);
  });

  it("rejects unknown filters", () => {
    expect(() => FilterPipeline.decode(new Uint8Array(1), { name: "JBIG2Decode" })).toThrow(StreamDecodeError);
  });

  it("rejects predictors", () => {
    const params = PdfDict.of({ Predictor: PdfNumber.of(12) });

    expect(() => FilterPipeline.decode(deflate(new Uint8Array(4)), { name: "FlateDecode", params })).toThrow(
      "FlateDecode predictor 12 is not supported",
    );
  });
});
