import { describe, expect, it } from "vitest";
import { UsageError } from "#src/document/errors";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfRef } from "#src/objects/pdf-ref";
import { buildPdf, bytesToString } from "#src/test-utils";
import { PDF } from "./pdf";

function twoRevisions(catalog = "<< /Type /Catalog >>"): Uint8Array {
  return buildPdf(
    [
      {
        objects: [
          { num: 1, body: catalog },
          { num: 2, body: "10" },
          { num: 3, body: "<< /Orphan true >>" },
        ],
        trailer: "/Root 1 0 R",
      },
      { objects: [{ num: 2, body: "20" }], trailer: "/Root 1 0 R" },
    ],
    "1.4",
  );
}

describe("PDF", () => {
  describe("loading", () => {
    it("resolves the newest binding", () => {
      const pdf = PDF.load(twoRevisions());

      expect(pdf.revisions.size).toBe(2);
      expect(pdf.getObject(PdfRef.of(2))).toEqual(PdfNumber.of(20));
      expect(pdf.catalog.getName("Type")).toBe(PdfName.Catalog);
      expect(pdf.warnings).toEqual([]);
    });

    it("visits every binding when asked for all revisions", () => {
      const pdf = PDF.load(twoRevisions());

      const values = [...pdf.each({ onlyCurrent: false })].filter(({ ref }) => ref.objectNumber === 2);

      expect(values.map(({ value }) => value)).toEqual([PdfNumber.of(20), PdfNumber.of(10)]);
    });
  });

  describe("version", () => {
    it("prefers a newer catalog /Version over the header", () => {
      const pdf = PDF.load(twoRevisions("<< /Type /Catalog /Version /1.6 >>"));

      expect(pdf.version).toBe("1.6");
    });

    it("rejects malformed versions", () => {
      const pdf = PDF.create();

      expect(() => {
        pdf.version = "1.x";
      }).toThrow(UsageError);
      expect(pdf.version).toBe("1.7");
    });

    it("raises the version to what the fields in use need", () => {
      const pdf = PDF.create();

      pdf.version = "1.2";
      pdf.catalog.set("ViewerPreferences", PdfDict.of({ PrintScaling: PdfName.of("None") }));

      expect(pdf.computeMinimumVersion()).toBe("1.6");
      expect(pdf.version).toBe("1.6");
      expect(bytesToString(pdf.save().subarray(0, 9))).toBe("%PDF-1.6\n");
    });

    it("needs 1.5 once objects are packed into object streams", () => {
      const pdf = PDF.create();

      pdf.version = "1.4";
      pdf.optimize({ objectStreams: "generate" });

      expect(pdf.computeMinimumVersion()).toBe("1.5");
      expect(bytesToString(pdf.save().subarray(0, 9))).toBe("%PDF-1.5\n");
    });
  });

  describe("create and save", () => {
    it("writes a minimal document that reads back", () => {
      const pdf = PDF.create();
      const reloaded = PDF.load(pdf.save());

      expect(reloaded.trailer.getRef("Root")).toBe(PdfRef.of(2));
      expect(reloaded.catalog.getRef("Pages")).toBe(PdfRef.of(1));
      expect(reloaded.warnings).toEqual([]);
    });

    it("records deletions as free entries of the current revision", () => {
      const pdf = PDF.load(twoRevisions());

      pdf.revisions.add();
      pdf.delete(PdfRef.of(2));

      const reloaded = PDF.load(pdf.save());

      expect(reloaded.revisions.size).toBe(3);
      expect(reloaded.getObject(PdfRef.of(2))).toBeNull();
    });
  });

  describe("tasks", () => {
    it("reports unreachable objects and compacts them away", () => {
      const pdf = PDF.load(twoRevisions("<< /Type /Catalog /Count 2 0 R >>"));

      expect(pdf.dereference().map(({ ref }) => ref)).toEqual([PdfRef.of(3)]);

      pdf.optimize({ compact: true });

      const reloaded = PDF.load(pdf.save());

      expect(reloaded.revisions.size).toBe(1);
      expect(reloaded.getObject(PdfRef.of(2))).toEqual(PdfNumber.of(20));
      expect(reloaded.getObject(PdfRef.of(3))).toBeNull();
    });
  });
});
