import { describe, expect, it } from "vitest";
import { serialize } from "#src/test-utils";
import { PdfArray } from "./pdf-array";
import { PdfNull } from "./pdf-constant";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import { PdfNumber } from "./pdf-number";
import type { PdfObject } from "./pdf-object";
import { PdfRef } from "./pdf-ref";
import { PdfStream } from "./pdf-stream";

describe("PdfDict", () => {
  it("has type 'dict'", () => {
    expect(new PdfDict().type).toBe("dict");
  });

  it("accepts string and PdfName keys interchangeably", () => {
    const dict = new PdfDict([["Type", PdfName.Catalog]]);

    dict.set(PdfName.of("Count"), PdfNumber.of(5));

    expect(dict.get(PdfName.Type)).toBe(PdfName.Catalog);
    expect(dict.getNumber("Count")?.value).toBe(5);
    expect(dict.size).toBe(2);
  });

  it("reports whether delete removed a key", () => {
    const dict = PdfDict.of({ A: PdfNumber.of(1) });

    expect(dict.delete("A")).toBe(true);
    expect(dict.delete("A")).toBe(false);
    expect(dict.has("A")).toBe(false);
  });

  describe("typed getters", () => {
    it("return undefined on a type mismatch", () => {
      const dict = PdfDict.of({ Count: PdfNumber.of(1) });

      expect(dict.getName("Count")).toBeUndefined();
      expect(dict.getArray("Count")).toBeUndefined();
    });

    it("follow references through a resolver", () => {
      const target = PdfArray.of(PdfNumber.of(1));
      const dict = PdfDict.of({ Kids: PdfRef.of(4) });
      const resolver = (ref: PdfRef): PdfObject | null => (ref === PdfRef.of(4) ? target : null);

      expect(dict.getArray("Kids")).toBeUndefined();
      expect(dict.getArray("Kids", resolver)).toBe(target);
      expect(dict.getRef("Kids")).toBe(PdfRef.of(4));
    });

    it("treat a reference to nothing as absent", () => {
      const dict = PdfDict.of({ Kids: PdfRef.of(9) });

      expect(dict.get("Kids", () => null)).toBeUndefined();
    });

    it("getDict accepts streams", () => {
      const stream = new PdfStream();
      const dict = PdfDict.of({ Contents: stream });

      expect(dict.getDict("Contents")).toBe(stream);
    });
  });

  it("clone shares values but not the key table", () => {
    const kids = new PdfArray();
    const dict = PdfDict.of({ Kids: kids });
    const copy = dict.clone();

    copy.set("Count", PdfNumber.of(0));

    expect(copy.get("Kids")).toBe(kids);
    expect(dict.has("Count")).toBe(false);
  });

  it("replaceEach keeps keys and their order", () => {
    const dict = PdfDict.of({ A: PdfRef.of(1), B: PdfNumber.of(2) });

    dict.replaceEach((value, key) => (key.value === "A" ? PdfNull.instance : value));

    expect([...dict.keys()].map(key => key.value)).toEqual(["A", "B"]);
    expect(dict.get("A")).toBe(PdfNull.instance);
    expect(dict.getNumber("B")?.value).toBe(2);
  });

  describe("toBytes", () => {
    it("writes one entry per line", () => {
      const dict = PdfDict.of({ Type: PdfName.of("Page"), Count: PdfNumber.of(3) });

      expect(serialize(dict)).toBe("<</Type /Page\n/Count 3\n>>");
    });

    it("writes nested indirect objects as references", () => {
      const font = PdfDict.of({ Type: PdfName.of("Font") });
      const dict = PdfDict.of({ F1: font, N: PdfNull.instance });

      const refs = (obj: PdfObject) => (obj === font ? PdfRef.of(12) : null);

      expect(serialize(dict, refs)).toBe("<</F1 12 0 R\n/N null\n>>");
    });
  });
});
