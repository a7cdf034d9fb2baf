import { MAX_GENERATION, PdfRef } from "#src/objects/pdf-ref";
import type { XRefEntry } from "#src/parser/xref-parser";
import { UsageError } from "./errors";

/**
 * Where an indirect object is stored, as far as callers are concerned.
 */
export type XRefLocation =
  | { type: "free" }
  | { type: "uncompressed"; offset: number }
  | { type: "compressed"; streamObjNum: number; indexInStream: number };

interface SectionEntry {
  generation: number;
  location: XRefLocation;
  /** Raw free-list pointer, kept for free entries read from a file */
  nextFree?: number;
}

/**
 * A free entry linked into the list the writer emits.
 */
export interface FreeListEntry {
  objectNumber: number;
  generation: number;
  nextFree: number;
}

const FREE: XRefLocation = { type: "free" };

/** Generation written for object 0, the head of the free list. */
export const FREE_LIST_HEAD_GENERATION = MAX_GENERATION;

/**
 * Cross-reference section of one revision: object number → location.
 *
 * At most one entry per object number. A free entry is a tombstone for
 * every generation of its number. Object 0 never has an entry; it only
 * heads the free list in the file format.
 *
 * In-use entries are write-once. A free entry may be replaced, since free
 * numbers are eligible for reuse. `delete` and `merge` exist for building
 * sections and for rewrite tasks; a real edit goes into a newer revision.
 */
export class XRefSection {
  private byNumber = new Map<number, SectionEntry>();

  /** Object 0's free-list pointer, if the section came from a file */
  private freeListHead: number | null = null;

  /**
   * Build a section from parsed entries.
   */
  static fromEntries(entries: Map<number, XRefEntry>): XRefSection {
    const section = new XRefSection();

    for (const [objNum, entry] of entries) {
      section.setParsed(objNum, entry);
    }

    return section;
  }

  get size(): number {
    return this.byNumber.size;
  }

  /** Highest object number with an entry, or 0 for an empty section. */
  get maxObjectNumber(): number {
    let max = 0;

    for (const objNum of this.byNumber.keys()) {
      max = Math.max(max, objNum);
    }

    return max;
  }

  has(objNum: number): boolean {
    return this.byNumber.has(objNum);
  }

  /**
   * Entry for an object number regardless of generation.
   */
  get(objNum: number): { ref: PdfRef; location: XRefLocation } | undefined {
    const entry = this.byNumber.get(objNum);

    return entry && { ref: PdfRef.of(objNum, entry.generation), location: entry.location };
  }

  /**
   * Location of `ref`, or undefined when the section says nothing about it.
   *
   * A free entry answers for every generation of its number. An in-use
   * entry with another generation does not match.
   */
  lookup(ref: PdfRef): XRefLocation | undefined {
    const entry = this.byNumber.get(ref.objectNumber);

    if (entry === undefined) {
      return undefined;
    }

    if (entry.location.type === "free" || entry.generation === ref.generation) {
      return entry.location;
    }

    return undefined;
  }

  addUncompressed(objNum: number, generation: number, offset: number): void {
    this.add(objNum, { generation, location: { type: "uncompressed", offset } });
  }

  /**
   * Objects inside object streams always have generation 0.
   */
  addCompressed(objNum: number, streamObjNum: number, indexInStream: number): void {
    this.add(objNum, { generation: 0, location: { type: "compressed", streamObjNum, indexInStream } });
  }

  /**
   * @param generation - generation a future object with this number would get
   */
  addFree(objNum: number, generation: number, nextFree = 0): void {
    this.add(objNum, { generation, location: FREE, nextFree });
  }

  delete(objNum: number): boolean {
    return this.byNumber.delete(objNum);
  }

  /**
   * Copy every entry of `other` over this section's entries.
   */
  merge(other: XRefSection): void {
    for (const [objNum, entry] of other.byNumber) {
      this.byNumber.set(objNum, entry);
    }
  }

  /**
   * Entries in ascending object-number order.
   */
  *entries(): IterableIterator<[PdfRef, XRefLocation]> {
    for (const objNum of [...this.byNumber.keys()].sort((a, b) => a - b)) {
      const entry = this.byNumber.get(objNum);

      if (entry) {
        yield [PdfRef.of(objNum, entry.generation), entry.location];
      }
    }
  }

  [Symbol.iterator](): Iterator<[PdfRef, XRefLocation]> {
    return this.entries();
  }

  /** Runs of consecutive object numbers, each in ascending order. */
  *subsections(): IterableIterator<Array<[PdfRef, XRefLocation]>> {
    let run: Array<[PdfRef, XRefLocation]> = [];

    for (const entry of this.entries()) {
      const last = run.at(-1);

      if (last && entry[0].objectNumber !== last[0].objectNumber + 1) {
        yield run;
        run = [];
      }

      run.push(entry);
    }

    if (run.length > 0) {
      yield run;
    }
  }

  /**
   * Free object numbers in list order.
   *
   * Sections read from a file follow the stored pointers starting at
   * object 0's, stopping at a repeat. Free entries the pointers miss, and
   * all free entries of sections built in memory, follow in ascending order.
   */
  freeList(): number[] {
    const list: number[] = [];
    const seen = new Set<number>();
    let next = this.freeListHead ?? 0;

    while (next !== 0 && !seen.has(next)) {
      const entry = this.byNumber.get(next);

      if (entry?.location.type !== "free") {
        break;
      }

      seen.add(next);
      list.push(next);
      next = entry.nextFree ?? 0;
    }

    for (const [ref, location] of this) {
      if (location.type === "free" && !seen.has(ref.objectNumber)) {
        list.push(ref.objectNumber);
      }
    }

    return list;
  }

  /**
   * Free entries relinked as a list, headed by object 0 and ending at 0,
   * in the form the writer emits.
   */
  linkedFreeEntries(): FreeListEntry[] {
    const list = this.freeList();
    const linked: FreeListEntry[] = [
      { objectNumber: 0, generation: FREE_LIST_HEAD_GENERATION, nextFree: list[0] ?? 0 },
    ];

    list.forEach((objNum, i) => {
      linked.push({
        objectNumber: objNum,
        generation: this.byNumber.get(objNum)?.generation ?? 0,
        nextFree: list[i + 1] ?? 0,
      });
    });

    return linked;
  }

  private add(objNum: number, entry: SectionEntry): void {
    if (objNum <= 0) {
      throw new UsageError(`Object number ${objNum} cannot have a cross-reference entry`);
    }

    const existing = this.byNumber.get(objNum);

    if (existing !== undefined && existing.location.type !== "free") {
      throw new UsageError(`Object number ${objNum} already has an entry in this section`);
    }

    this.byNumber.set(objNum, entry);
  }

  private setParsed(objNum: number, entry: XRefEntry): void {
    if (objNum === 0) {
      if (entry.type === "free") {
        this.freeListHead = entry.nextFree;
      }

      return;
    }

    switch (entry.type) {
      case "free":
        this.byNumber.set(objNum, { generation: entry.generation, location: FREE, nextFree: entry.nextFree });
        break;
      case "uncompressed":
        this.byNumber.set(objNum, {
          generation: entry.generation,
          location: { type: "uncompressed", offset: entry.offset },
        });
        break;
      case "compressed":
        this.byNumber.set(objNum, {
          generation: 0,
          location: {
            type: "compressed",
            streamObjNum: entry.streamObjNum,
            indexInStream: entry.indexInStream,
          },
        });
        break;
    }
  }
}
