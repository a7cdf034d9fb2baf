import { describe, expect, it } from "vitest";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfRef } from "#src/objects/pdf-ref";
import { ObjectStreamParser } from "#src/parser/object-stream-parser";
import { bytesToString } from "#src/test-utils";
import { createObjectStream, packObjectStream } from "./object-stream-writer";

describe("packObjectStream", () => {
  it("writes the index, then the members", () => {
    const container = createObjectStream();

    packObjectStream(container, [
      { ref: PdfRef.of(3), value: PdfDict.of({ A: PdfNumber.of(1) }) },
      { ref: PdfRef.of(5), value: PdfNumber.of(42) },
    ]);

    expect(bytesToString(container.getDecodedData())).toBe("3 0 5 10\n<</A 1\n>>\n42\n");
    expect(container.getNumber("N")?.value).toBe(2);
    expect(container.getNumber("First")?.value).toBe(9);
    expect(container.getName("Filter")?.value).toBe("FlateDecode");
  });

  it("produces a container the object stream parser reads back", () => {
    const container = createObjectStream();

    packObjectStream(container, [
      { ref: PdfRef.of(3), value: PdfDict.of({ A: PdfNumber.of(1) }) },
      { ref: PdfRef.of(5), value: PdfNumber.of(42) },
    ]);

    const parser = new ObjectStreamParser(container);

    expect(parser.getObjectNumber(1)).toBe(5);
    expect(parser.getObject(1)).toEqual(PdfNumber.of(42));
    expect(parser.getObject(0)).toEqual(PdfDict.of({ A: PdfNumber.of(1) }));
  });

  it("writes nested indirect objects as references", () => {
    const container = createObjectStream();
    const shared = new PdfDict();

    packObjectStream(container, [{ ref: PdfRef.of(1), value: PdfDict.of({ Kid: shared }) }], obj =>
      obj === shared ? PdfRef.of(9) : null,
    );

    expect(bytesToString(container.getDecodedData())).toBe("1 0\n<</Kid 9 0 R\n>>\n");
  });
});
