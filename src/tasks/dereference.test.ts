import { describe, expect, it } from "vitest";
import { ObjectResolver } from "#src/document/object-resolver";
import { RevisionChain } from "#src/document/revision-chain";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfNull } from "#src/objects/pdf-constant";
import { PdfDict } from "#src/objects/pdf-dict";
import { isInterned, type PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { FileParser } from "#src/parser/file-parser";
import { buildPdf } from "#src/test-utils";
import { dereferenceAll, dereferenceObject, findUnusedObjects } from "./dereference";

function openSample(): ObjectResolver {
  const source = new FileParser(
    buildPdf([
      {
        objects: [
          { num: 1, body: "<< /Type /Catalog /Pages 2 0 R /Extra 20 0 R /Zero 0 0 R /Named 5 0 R >>" },
          { num: 2, body: "<< /Type /Pages /Kids [3 0 R] /Count 1 >>" },
          { num: 3, body: "<< /Type /Page /Parent 2 0 R /Contents 4 0 R >>" },
          { num: 4, body: "<< /Length 6 0 R >>\nstream\nabc\nendstream" },
          { num: 5, body: "/Shared" },
          { num: 6, body: "3" },
          { num: 7, body: "<< /Orphan true >>" },
        ],
        objectStream: { num: 9, members: [{ num: 10, body: "<< /Kind /Packed >>" }] },
        trailer: "/Root 1 0 R",
        xrefStream: 8,
      },
    ]),
  );

  return new ObjectResolver(RevisionChain.load(source, []), source);
}

/** Every value below `root`, each composite entered once, in walk order. */
function graphValues(root: PdfObject): PdfObject[] {
  const values: PdfObject[] = [];
  const entered = new Set<PdfObject>();
  const pending = [root];

  for (let item = pending.shift(); item !== undefined; item = pending.shift()) {
    if (entered.has(item)) {
      continue;
    }

    entered.add(item);

    const children = item instanceof PdfArray ? item.toArray() : item instanceof PdfDict ? [...item.values()] : [];

    values.push(...children);
    pending.push(...children);
  }

  return values;
}

describe("dereferenceAll", () => {
  it("reports unreached objects and indirect lengths, but not file structure", () => {
    const resolver = openSample();

    const unused = dereferenceAll(resolver);

    expect(unused.map(({ ref }) => ref)).toEqual([PdfRef.of(6), PdfRef.of(7), PdfRef.of(10)]);
  });

  it("replaces references by shared instances", () => {
    const resolver = openSample();

    dereferenceAll(resolver);

    const catalog = resolver.revisions.current.trailer.get("Root");
    const pages = resolver.resolve(PdfRef.of(2));
    const page = resolver.resolve(PdfRef.of(3));

    expect(catalog).toBe(resolver.resolve(PdfRef.of(1)));
    expect(catalog instanceof PdfDict ? catalog.get("Pages") : undefined).toBe(pages);
    expect(page instanceof PdfDict ? page.get("Parent") : undefined).toBe(pages);
    expect(page instanceof PdfDict ? page.get("Contents") : undefined).toBeInstanceOf(PdfStream);
  });

  it("turns missing and reserved targets into null and keeps references to names", () => {
    const resolver = openSample();

    dereferenceAll(resolver);

    const catalog = resolver.resolve(PdfRef.of(1));

    expect(catalog instanceof PdfDict ? catalog.get("Extra") : undefined).toBe(PdfNull.instance);
    expect(catalog instanceof PdfDict ? catalog.get("Zero") : undefined).toBe(PdfNull.instance);
    expect(catalog instanceof PdfDict ? catalog.get("Named") : undefined).toBe(PdfRef.of(5));
  });

  it("leaves only references to interned values reachable from the trailer", () => {
    const resolver = openSample();

    dereferenceAll(resolver);

    const refs = graphValues(resolver.revisions.current.trailer).filter(value => value instanceof PdfRef);

    expect(refs).toEqual([PdfRef.of(5)]);
    expect(refs.every(ref => ref instanceof PdfRef && isInterned(resolver.resolve(ref) ?? new PdfDict()))).toBe(true);
  });

  it("does not change the graph when run again", () => {
    const resolver = openSample();
    const trailer = resolver.revisions.current.trailer;

    dereferenceAll(resolver);
    const before = graphValues(trailer);

    dereferenceAll(resolver);
    const after = graphValues(trailer);

    expect(after).toHaveLength(before.length);
    expect(after.every((value, i) => value === before[i])).toBe(true);
  });

  it("gives the same answer when run again", () => {
    const resolver = openSample();

    const first = dereferenceAll(resolver).map(({ ref }) => ref);
    const second = dereferenceAll(resolver).map(({ ref }) => ref);

    expect(second).toEqual(first);
  });
});

describe("findUnusedObjects", () => {
  it("reports what dereferenceAll would, leaving references in place", () => {
    const resolver = openSample();

    const unused = findUnusedObjects(resolver);
    const catalog = resolver.resolve(PdfRef.of(1));

    expect(unused.map(({ ref }) => ref)).toEqual([PdfRef.of(6), PdfRef.of(7), PdfRef.of(10)]);
    expect(resolver.revisions.current.trailer.get("Root")).toBe(PdfRef.of(1));
    expect(catalog instanceof PdfDict ? catalog.get("Pages") : undefined).toBe(PdfRef.of(2));
  });
});

describe("dereferenceObject", () => {
  it("handles cycles", () => {
    const resolver = new ObjectResolver(new RevisionChain(), null);
    const a = new PdfDict();
    const b = new PdfDict();
    const refA = resolver.add(a);
    const refB = resolver.add(b);

    a.set("Next", refB);
    b.set("Prev", refA);
    b.set("Items", PdfArray.of(refA, refB));

    expect(dereferenceObject(resolver, refA)).toBe(a);
    expect(a.get("Next")).toBe(b);
    expect(b.get("Prev")).toBe(a);
    expect(b.getArray("Items")?.at(0)).toBe(a);
    expect(b.getArray("Items")?.at(1)).toBe(b);
  });

  it("returns null for object 0", () => {
    const resolver = new ObjectResolver(new RevisionChain(), null);

    expect(dereferenceObject(resolver, PdfRef.of(0, 65535))).toBe(PdfNull.instance);
  });
});
