import { PdfName } from "#src/objects/pdf-name";
import { RecoverableParseError, UnrecoverableParseError } from "#src/parser/errors";
import type { ObjectSource } from "#src/parser/object-source";
import { UsageError } from "./errors";
import { Revision } from "./revision";

/**
 * Trailer keys that only make sense for the section they were read with.
 */
const SECTION_POINTER_KEYS = [PdfName.Prev, PdfName.XRefStm];

/**
 * Ordered revisions of a document, oldest first. Never empty.
 *
 * A lookup walks newest to oldest; the first revision that says anything
 * about an identity decides, a free entry included.
 */
export class RevisionChain implements Iterable<Revision> {
  private revisions: Revision[];

  constructor(revisions: Revision[] = []) {
    this.revisions = revisions.length > 0 ? [...revisions] : [new Revision()];
  }

  /**
   * Discover every revision of a file by following /Prev from the newest
   * section.
   *
   * Damage in an older section ends discovery there with a warning, and so
   * does a /Prev loop. The revisions found up to that point are kept.
   *
   * @throws {UnrecoverableParseError} if the newest section cannot be read
   */
  static load(source: ObjectSource, warnings: string[]): RevisionChain {
    const revisions: Revision[] = [];
    const visited = new Set<number>();
    let offset: number | undefined = RevisionChain.startOffset(source);

    while (offset !== undefined) {
      if (visited.has(offset)) {
        warnings.push(`Circular xref chain at offset ${offset}`);
        break;
      }

      visited.add(offset);

      const revision = Revision.unparsed(offset);

      try {
        offset = revision.load(source, warnings);
      } catch (error) {
        if (!(error instanceof RecoverableParseError)) {
          throw error;
        }

        if (revisions.length === 0) {
          throw new UnrecoverableParseError(`Cannot read the newest cross-reference section: ${error.message}`, {
            cause: error,
          });
        }

        warnings.push(`Ignoring revisions from offset ${revision.offset} on: ${error.message}`);
        break;
      }

      revisions.unshift(revision);

      // Already read as part of this revision; a /Prev to it is a loop
      if (revision.hybridOffset !== undefined) {
        visited.add(revision.hybridOffset);
      }
    }

    return new RevisionChain(revisions);
  }

  private static startOffset(source: ObjectSource): number {
    try {
      return source.startXRef;
    } catch (error) {
      if (error instanceof RecoverableParseError) {
        throw new UnrecoverableParseError(error.message, { cause: error });
      }

      throw error;
    }
  }

  get size(): number {
    return this.revisions.length;
  }

  /** The newest revision; edits go here. */
  get current(): Revision {
    return this.revisions[this.revisions.length - 1];
  }

  /**
   * Revision at `index`, oldest first. Negative indices count from the newest.
   */
  at(index: number): Revision | undefined {
    return this.revisions.at(index);
  }

  indexOf(revision: Revision): number {
    return this.revisions.indexOf(revision);
  }

  /**
   * Append an empty revision whose trailer copies the current one's,
   * without the section pointers.
   */
  add(): Revision {
    const trailer = this.current.trailer.clone();

    for (const key of SECTION_POINTER_KEYS) {
      trailer.delete(key);
    }

    const revision = new Revision(trailer);

    this.revisions.push(revision);

    return revision;
  }

  /**
   * Remove a revision, given by position or by value. Negative positions
   * count from the newest, as in `at`.
   *
   * @returns the removed revision, or undefined if there was no such revision
   * @throws {UsageError} if it is the only revision
   */
  delete(target: number | Revision): Revision | undefined {
    if (this.revisions.length === 1) {
      throw new UsageError("A document must have at least one revision");
    }

    let index = typeof target === "number" ? target : this.revisions.indexOf(target);

    if (typeof target === "number" && target < 0) {
      index = this.revisions.length + target;
    }

    if (index < 0 || index >= this.revisions.length) {
      return undefined;
    }

    const [removed] = this.revisions.splice(index, 1);

    return removed;
  }

  /**
   * Collapse all revisions into the oldest one, newest bindings winning.
   * The merged revision carries the newest trailer.
   */
  merge(): Revision {
    const [oldest, ...newer] = this.revisions;

    for (const revision of newer) {
      oldest.absorb(revision);
    }

    for (const key of SECTION_POINTER_KEYS) {
      oldest.trailer.delete(key);
    }

    this.revisions = [oldest];

    return oldest;
  }

  /** Oldest first. */
  [Symbol.iterator](): Iterator<Revision> {
    return this.revisions[Symbol.iterator]();
  }

  /** Newest first. */
  reversed(): Revision[] {
    return this.revisions.toReversed();
  }
}
