/**
 * Replace references by the objects they point to, in place.
 */

import type { IndirectObject, ObjectResolver } from "#src/document/object-resolver";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfNull } from "#src/objects/pdf-constant";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { isInterned, type PdfObject, typeNameOf } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";

/**
 * Object types that hold the file's structure rather than document content.
 */
const HOUSEKEEPING_TYPES = new Set(["ObjStm", "XRef"]);

/**
 * Walks an object graph once, swapping references for their targets.
 * With `inPlace` off the walk only records what it reaches.
 *
 * Composites are tracked by instance, identities by key, so a second walk
 * over an already dereferenced graph finds the same identities.
 */
class Dereferencer {
  private readonly walked = new Set<PdfObject>();
  readonly visited = new Set<string>();

  constructor(
    private readonly resolver: ObjectResolver,
    private readonly inPlace = true,
  ) {}

  /**
   * The value that should stand where `obj` stands.
   */
  replacement(obj: PdfObject): PdfObject {
    if (!(obj instanceof PdfRef)) {
      this.walk(obj);

      return obj;
    }

    if (obj.isSentinel) {
      return PdfNull.instance;
    }

    const target = this.resolver.resolve(obj);

    if (target === null || target instanceof PdfNull) {
      return PdfNull.instance;
    }

    this.visited.add(obj.key);

    // An interned value cannot remember which identity it came from
    if (isInterned(target)) {
      return obj;
    }

    this.walk(target);

    return target;
  }

  walk(obj: PdfObject): void {
    if (this.walked.has(obj)) {
      return;
    }

    const ref = this.resolver.getRef(obj);

    if (ref !== null) {
      this.visited.add(ref.key);
    }

    if (obj instanceof PdfArray) {
      this.walked.add(obj);

      if (this.inPlace) {
        obj.replaceEach(item => this.replacement(item));
      } else {
        for (const item of obj) {
          this.replacement(item);
        }
      }
    } else if (obj instanceof PdfDict) {
      this.walked.add(obj);

      const isStream = obj instanceof PdfStream;
      const next = (value: PdfObject, key: PdfName): PdfObject =>
        isStream && key === PdfName.Length ? this.lengthValue(value) : this.replacement(value);

      if (this.inPlace) {
        obj.replaceEach(next);
      } else {
        for (const [key, value] of obj) {
          next(value, key);
        }
      }
    }
  }

  /**
   * A stream's length is followed but does not count as a use.
   */
  private lengthValue(value: PdfObject): PdfObject {
    if (!(value instanceof PdfRef)) {
      return value;
    }

    const target = value.isSentinel ? null : this.resolver.resolve(value);

    return target === null || isInterned(target) ? value : target;
  }
}

/**
 * Dereference everything reachable from `root`.
 *
 * References to missing, free or reserved identities become null, and so
 * do references to a null object.
 * References whose target is a name, boolean or null stay in place.
 *
 * @returns `root` itself, or its target when `root` is a reference
 */
export function dereferenceObject(resolver: ObjectResolver, root: PdfObject): PdfObject {
  return new Dereferencer(resolver).replacement(root);
}

/**
 * Dereference the whole document, starting at the current trailer.
 *
 * @returns every object of every revision that the walk did not reach,
 *   leaving out object streams and cross-reference streams
 */
export function dereferenceAll(resolver: ObjectResolver): IndirectObject[] {
  return unusedObjects(resolver, new Dereferencer(resolver));
}

/**
 * What `dereferenceAll` would report, leaving every reference in place.
 */
export function findUnusedObjects(resolver: ObjectResolver): IndirectObject[] {
  return unusedObjects(resolver, new Dereferencer(resolver, false));
}

function unusedObjects(resolver: ObjectResolver, dereferencer: Dereferencer): IndirectObject[] {
  dereferencer.walk(resolver.revisions.current.trailer);

  const unused: IndirectObject[] = [];
  const reported = new Set<string>();

  for (const { ref, value } of resolver.each({ onlyCurrent: false })) {
    if (dereferencer.visited.has(ref.key) || reported.has(ref.key)) {
      continue;
    }

    const type = typeNameOf(value);

    if (type !== undefined && HOUSEKEEPING_TYPES.has(type)) {
      continue;
    }

    reported.add(ref.key);
    unused.push({ ref, value });
  }

  return unused;
}
