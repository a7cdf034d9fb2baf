import { describe, expect, it } from "vitest";
import { Scanner } from "#src/io/scanner";
import { PdfRef } from "#src/objects/pdf-ref";
import { buildPdf, bytesToString, stringToBytes } from "#src/test-utils";
import { XRefParseError } from "./errors";
import { XRefParser } from "./xref-parser";

function parserFor(bytes: Uint8Array): XRefParser {
  return new XRefParser(new Scanner(bytes));
}

describe("XRefParser", () => {
  describe("tables", () => {
    const bytes = buildPdf([
      {
        objects: [{ num: 1, body: "<< /Type /Catalog >>" }],
        free: [{ num: 2, gen: 1 }],
        trailer: "/Root 1 0 R",
      },
    ]);

    it("finds startxref", () => {
      expect(parserFor(bytes).findStartXRef()).toBe(bytesToString(bytes).indexOf("xref\n"));
    });

    it("reads in-use and free entries with their free-list pointers", () => {
      const parser = parserFor(bytes);
      const data = parser.parseAt(parser.findStartXRef());

      expect(data.entries.get(0)).toEqual({ type: "free", nextFree: 2, generation: 65535 });
      expect(data.entries.get(1)).toEqual({
        type: "uncompressed",
        offset: bytesToString(bytes).indexOf("1 0 obj"),
        generation: 0,
      });
      expect(data.entries.get(2)).toEqual({ type: "free", nextFree: 0, generation: 1 });
      expect(data.trailer.getNumber("Size")?.value).toBe(3);
      expect(data.trailer.getRef("Root")).toBe(PdfRef.of(1));
      expect(data.prev).toBeUndefined();
    });

    it("reads /Prev from an incremental update", () => {
      const updated = buildPdf([
        { objects: [{ num: 1, body: "1" }] },
        { objects: [{ num: 1, body: "2" }] },
      ]);
      const text = bytesToString(updated);
      const parser = parserFor(updated);

      const data = parser.parseAt(parser.findStartXRef());

      expect(data.prev).toBe(text.indexOf("xref\n"));
    });

    it("tolerates irregular spacing and line endings", () => {
      const text = "xref\n0 2\n0 65535 f\r1 0 n\n3 1\n00000099 00002 n \ntrailer << /Size 4 >>";
      const data = parserFor(stringToBytes(text)).parseAt(0);

      expect(data.entries.get(1)).toEqual({ type: "uncompressed", offset: 1, generation: 0 });
      expect(data.entries.get(3)).toEqual({ type: "uncompressed", offset: 99, generation: 2 });
    });

    it("reads /XRefStm from a hybrid trailer", () => {
      const text = "xref\n0 1\n0000000000 65535 f\r\ntrailer << /Size 1 /XRefStm 417 >>";

      expect(parserFor(stringToBytes(text)).parseAt(0).xrefStm).toBe(417);
    });
  });

  describe("streams", () => {
    const bytes = buildPdf([
      {
        objects: [{ num: 1, body: "<< /Type /Catalog /Pages 2 0 R >>" }],
        objectStream: { num: 3, members: [{ num: 2, body: "<< /Type /Pages /Kids [] /Count 0 >>" }] },
        xrefStream: 4,
        trailer: "/Root 1 0 R",
      },
    ]);

    it("reads compressed and uncompressed entries", () => {
      const parser = parserFor(bytes);
      const data = parser.parseAt(parser.findStartXRef());

      expect(data.entries.get(2)).toEqual({ type: "compressed", streamObjNum: 3, indexInStream: 0 });
      expect(data.entries.get(3)).toEqual({
        type: "uncompressed",
        offset: bytesToString(bytes).indexOf("3 0 obj"),
        generation: 0,
      });
      expect(data.entries.get(0)).toEqual({ type: "free", nextFree: 0, generation: 65535 });
      expect(data.entries.size).toBe(5);
    });

    it("uses the stream dictionary as trailer", () => {
      const parser = parserFor(bytes);
      const data = parser.parseAt(parser.findStartXRef());

      expect(data.streamObjNum).toBe(4);
      expect(data.trailer.getName("Type")?.value).toBe("XRef");
      expect(data.trailer.getRef("Root")).toBe(PdfRef.of(1));
    });
  });

  describe("errors", () => {
    it("throws when startxref is missing", () => {
      expect(() => parserFor(stringToBytes("%PDF-1.4\n")).findStartXRef()).toThrow(
        "Could not find startxref marker",
      );
    });

    it("throws on an unknown section format", () => {
      expect(() => parserFor(stringToBytes("garbage")).parseAt(0)).toThrow(XRefParseError);
    });

    it("throws on offsets outside the file", () => {
      expect(() => parserFor(stringToBytes("xref")).parseAt(99)).toThrow(
        "Cross-reference offset 99 is outside the file",
      );
    });

    it("records the offset of the section it could not read", () => {
      expect(() => parserFor(stringToBytes("xref")).parseAt(99)).toThrow(
        expect.objectContaining({ name: "XRefParseError", offset: 99 }),
      );
    });

    it("throws on a bad entry type", () => {
      const text = "xref\n0 1\n0000000000 65535 x\ntrailer << >>";

      expect(() => parserFor(stringToBytes(text)).parseAt(0)).toThrow(XRefParseError);
    });
  });
});
