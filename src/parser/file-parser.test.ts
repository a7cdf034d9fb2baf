import { describe, expect, it } from "vitest";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { buildPdf, bytesToString, stringToBytes } from "#src/test-utils";
import { ObjectParseError, StructureError } from "./errors";
import { FileParser } from "./file-parser";

describe("FileParser", () => {
  describe("header", () => {
    it("reads the version", () => {
      expect(new FileParser(buildPdf([{}], "1.4")).headerVersion).toBe("1.4");
    });

    it("tolerates leading garbage with a warning", () => {
      const parser = new FileParser(stringToBytes("junk%PDF-1.6\n"));

      expect(parser.headerVersion).toBe("1.6");
      expect(parser.warnings).toEqual(["PDF header found at offset 4 (expected 0)"]);
    });

    it("falls back to 1.7 in lenient mode", () => {
      const parser = new FileParser(stringToBytes("no header here"));

      expect(parser.headerVersion).toBe("1.7");
      expect(parser.warnings).toEqual(["PDF header not found, using 1.7"]);
    });

    it("throws in strict mode", () => {
      expect(() => new FileParser(stringToBytes("%PDF-x"), { lenient: false })).toThrow(StructureError);
    });
  });

  describe("objects", () => {
    it("parses an object at its offset", () => {
      const bytes = buildPdf([{ objects: [{ num: 3, gen: 2, body: "<< /A 1 >>" }] }]);
      const parser = new FileParser(bytes);

      const parsed = parser.parseObjectAt(bytesToString(bytes).indexOf("3 2 obj"));

      expect(parsed.ref).toBe(PdfRef.of(3, 2));
      expect(parsed.value).toBeInstanceOf(PdfDict);
    });

    it("reads stream data using an indirect /Length", () => {
      const bytes = buildPdf([
        {
          objects: [
            { num: 1, body: "<< /Length 2 0 R >>\nstream\nhello\nendstream" },
            { num: 2, body: "5" },
          ],
        },
      ]);
      const parser = new FileParser(bytes);
      const offset = bytesToString(bytes).indexOf("1 0 obj");

      const parsed = parser.parseObjectAt(offset, ref => (ref === PdfRef.of(2) ? 5 : null));

      expect(parsed.value).toBeInstanceOf(PdfStream);
      expect(parsed.value instanceof PdfStream ? bytesToString(parsed.value.data) : "").toBe("hello");
      expect(() => parser.parseObjectAt(offset)).toThrow("Could not resolve /Length reference 2 0 R");
    });

    it("throws when there is no object definition at the offset", () => {
      const parser = new FileParser(buildPdf([{}]));

      expect(() => parser.parseObjectAt(0)).toThrow(ObjectParseError);
    });
  });

  it("parses the newest section at startxref", () => {
    const bytes = buildPdf([{ objects: [{ num: 1, body: "null" }], trailer: "/Root 1 0 R" }]);
    const parser = new FileParser(bytes);

    expect(parser.parseRevisionAt(parser.startXRef).trailer.getRef("Root")).toBe(PdfRef.of(1));
  });
});
