import { describe, expect, it } from "vitest";
import { serialize } from "#src/test-utils";
import { escapeName, PdfName } from "./pdf-name";

describe("PdfName", () => {
  it("is interned", () => {
    expect(PdfName.of("Type")).toBe(PdfName.Type);
  });

  it("escapes whitespace, delimiters and #", () => {
    expect(escapeName("A B")).toBe("A#20B");
    expect(escapeName("a/b#c")).toBe("a#2Fb#23c");
  });

  it("writes a name read from bytes back as the same bytes", () => {
    expect(serialize(PdfName.of("Café"))).toBe("/Caf#E9");
  });

  it("takes wider characters as UTF-8", () => {
    expect(escapeName("€")).toBe("#E2#82#AC");
  });
});
