import { describe, expect, it } from "vitest";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfRef } from "#src/objects/pdf-ref";
import { FileParser } from "#src/parser/file-parser";
import { buildPdf } from "#src/test-utils";
import { UsageError } from "./errors";
import { Revision } from "./revision";

describe("Revision", () => {
  it("binds added objects", () => {
    const revision = new Revision();
    const value = PdfNumber.of(1);

    revision.add(PdfRef.of(3), value);

    expect(revision.object(PdfRef.of(3))).toBe(value);
    expect(revision.object(PdfRef.of(3, 1))).toBeUndefined();
    expect(revision.contains(PdfRef.of(3))).toBe(true);
  });

  it("rejects adding a number that is already in use", () => {
    const revision = new Revision();

    revision.add(PdfRef.of(3), PdfNumber.of(1));

    expect(() => revision.add(PdfRef.of(3, 1), PdfNumber.of(2))).toThrow(UsageError);
  });

  it("reuses a freed number", () => {
    const revision = new Revision();

    revision.xref.addFree(3, 1);
    revision.add(PdfRef.of(3, 1), PdfNumber.of(2));

    expect(revision.location(PdfRef.of(3, 1))).toBeUndefined();
    expect(revision.refs()).toEqual([PdfRef.of(3, 1)]);
  });

  it("leaves a free entry one generation higher when deleting", () => {
    const revision = new Revision();

    revision.add(PdfRef.of(4, 2), PdfNumber.of(1));
    revision.delete(PdfRef.of(4, 2));

    expect(revision.object(PdfRef.of(4, 2))).toBeUndefined();
    expect(revision.location(PdfRef.of(4, 2))).toEqual({ type: "free" });
    expect(revision.xref.get(4)?.ref).toBe(PdfRef.of(4, 3));
    expect(revision.freeRefs()).toEqual([PdfRef.of(4, 3)]);
  });

  it("forgets the number entirely without markAsFree", () => {
    const revision = new Revision();

    revision.add(PdfRef.of(4), PdfNumber.of(1));
    revision.delete(PdfRef.of(4), { markAsFree: false });

    expect(revision.contains(PdfRef.of(4))).toBe(false);
  });

  it("refuses to update an object it does not bind", () => {
    expect(() => new Revision().update(PdfRef.of(1), PdfNumber.of(1))).toThrow(UsageError);
  });

  it("lists in-use identities in order", () => {
    const revision = new Revision();

    revision.xref.addUncompressed(5, 0, 500);
    revision.xref.addFree(2, 1);
    revision.add(PdfRef.of(3), PdfNumber.of(3));

    expect(revision.refs()).toEqual([PdfRef.of(3), PdfRef.of(5)]);
    expect(revision.maxObjectNumber).toBe(5);
    expect(revision.nextFreeObjectNumber).toBe(6);
  });

  describe("loading", () => {
    it("reads a table section and its trailer", () => {
      const bytes = buildPdf([{ objects: [{ num: 1, body: "<< /Type /Catalog >>" }], trailer: "/Root 1 0 R" }]);
      const source = new FileParser(bytes);
      const revision = Revision.unparsed(source.startXRef);

      expect(revision.loadState).toBe("unparsed");
      expect(revision.load(source, [])).toBeUndefined();
      expect(revision.loadState).toBe("loaded");
      expect(revision.trailer.getRef("Root")).toBe(PdfRef.of(1));
      expect(revision.location(PdfRef.of(1))?.type).toBe("uncompressed");
      expect(revision.isModified()).toBe(false);
    });

    it("keeps only document keys of an xref stream trailer", () => {
      const bytes = buildPdf([
        { objects: [{ num: 1, body: "<< /Type /Catalog >>" }], trailer: "/Root 1 0 R", xrefStream: 2 },
      ]);
      const source = new FileParser(bytes);
      const revision = Revision.unparsed(source.startXRef);

      revision.load(source, []);

      expect([...revision.trailer.keys()].map(key => key.value).sort()).toEqual(["Root", "Size"]);
      expect(revision.location(PdfRef.of(2))?.type).toBe("uncompressed");
    });

    it("can only be loaded once", () => {
      const source = new FileParser(buildPdf([{}]));
      const revision = Revision.unparsed(source.startXRef);

      revision.load(source, []);

      expect(() => revision.load(source, [])).toThrow(UsageError);
    });

    it("counts an added object as a modification", () => {
      const source = new FileParser(buildPdf([{ objects: [{ num: 1, body: "1" }] }]));
      const revision = Revision.unparsed(source.startXRef);

      revision.load(source, []);
      revision.add(PdfRef.of(2), new PdfDict());

      expect(revision.isModified()).toBe(true);
    });
  });

  it("starts out loaded and modified when created in memory", () => {
    const revision = new Revision();

    expect(revision.loadState).toBe("loaded");
    expect(revision.hasXRefSource).toBe(false);
    expect(revision.isModified()).toBe(true);
  });
});
