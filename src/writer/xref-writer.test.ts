import { describe, expect, it } from "vitest";
import { UsageError } from "#src/document/errors";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import { bytesToString } from "#src/test-utils";
import { buildXRefStream, writeXRefTable, type XRefWriteEntry } from "./xref-writer";

function numbers(values: Iterable<unknown>): number[] {
  return [...values].map(value => (value instanceof PdfNumber ? value.value : Number.NaN));
}

describe("writeXRefTable", () => {
  it("writes subsections of 20-byte entries and the trailer", () => {
    const writer = new ByteWriter();
    const entries: XRefWriteEntry[] = [
      { type: "free", objectNumber: 5, generation: 1, nextFree: 0 },
      { type: "free", objectNumber: 0, generation: 65535, nextFree: 5 },
      { type: "inuse", objectNumber: 1, generation: 0, offset: 15 },
      { type: "inuse", objectNumber: 2, generation: 0, offset: 80 },
    ];

    writeXRefTable(writer, entries, PdfDict.of({ Size: PdfNumber.of(6) }));

    expect(bytesToString(writer.toBytes())).toBe(
      "xref\n0 3\n0000000005 65535 f\r\n0000000015 00000 n\r\n0000000080 00000 n\r\n" +
        "5 1\n0000000000 00001 f\r\ntrailer\n<</Size 6\n>>\n",
    );
  });

  it("refuses compressed entries", () => {
    const entries: XRefWriteEntry[] = [{ type: "compressed", objectNumber: 3, streamNumber: 9, index: 0 }];

    expect(() => writeXRefTable(new ByteWriter(), entries, new PdfDict())).toThrow(UsageError);
  });
});

describe("buildXRefStream", () => {
  const entries: XRefWriteEntry[] = [
    { type: "free", objectNumber: 0, generation: 65535, nextFree: 0 },
    { type: "inuse", objectNumber: 1, generation: 0, offset: 300 },
    { type: "compressed", objectNumber: 2, streamNumber: 7, index: 3 },
    { type: "inuse", objectNumber: 7, generation: 0, offset: 20 },
  ];

  it("sizes the fields to the largest values", () => {
    const stream = buildXRefStream(entries, PdfDict.of({ Size: PdfNumber.of(8) }));

    expect(numbers(stream.getArray("W") ?? [])).toEqual([1, 2, 2]);
    expect(numbers(stream.getArray("Index") ?? [])).toEqual([0, 3, 7, 1]);
    expect(stream.getName("Type")?.value).toBe("XRef");
    expect(stream.getNumber("Size")?.value).toBe(8);
  });

  it("encodes one row per entry", () => {
    const stream = buildXRefStream(entries, PdfDict.of({ Size: PdfNumber.of(8) }));

    expect(stream.getName("Filter")?.value).toBe("FlateDecode");
    expect([...stream.getDecodedData()]).toEqual([
      0, 0, 0, 0xff, 0xff,
      1, 1, 0x2c, 0, 0,
      2, 0, 7, 0, 3,
      1, 0, 0x14, 0, 0,
    ]);
  });

  it("omits /Index when it would be the default", () => {
    const stream = buildXRefStream(entries.slice(0, 3), PdfDict.of({ Size: PdfNumber.of(3) }));

    expect(stream.has("Index")).toBe(false);
  });
});
