import { describe, expect, it } from "vitest";
import { stringToBytes } from "#src/test-utils";
import { Scanner } from "./scanner";

describe("Scanner", () => {
  it("peeks without consuming", () => {
    const scanner = new Scanner(stringToBytes("ab"));

    expect(scanner.peek()).toBe(0x61);
    expect(scanner.peek()).toBe(0x61);
    expect(scanner.position).toBe(0);
  });

  it("advances and reports EOF as -1", () => {
    const scanner = new Scanner(stringToBytes("a"));

    expect(scanner.advance()).toBe(0x61);
    expect(scanner.isAtEnd).toBe(true);
    expect(scanner.advance()).toBe(-1);
    expect(scanner.position).toBe(1);
  });

  it("clamps moveTo to the buffer bounds", () => {
    const scanner = new Scanner(stringToBytes("abc"));

    scanner.moveTo(10);
    expect(scanner.position).toBe(3);

    scanner.moveTo(-5);
    expect(scanner.position).toBe(0);
  });

  it("peekAt returns -1 outside the buffer", () => {
    const scanner = new Scanner(stringToBytes("abc"));

    expect(scanner.peekAt(2)).toBe(0x63);
    expect(scanner.peekAt(3)).toBe(-1);
    expect(scanner.peekAt(-1)).toBe(-1);
  });
});
