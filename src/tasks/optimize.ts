/**
 * Document rewrites: compaction, object and xref stream conversion, and
 * pruning of entries that restate a default.
 */

import { z } from "zod";
import { IntegrityError } from "#src/document/errors";
import type { IndirectObject, ObjectResolver } from "#src/document/object-resolver";
import type { Revision } from "#src/document/revision";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfNull } from "#src/objects/pdf-constant";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { isInterned, isPdfDict, type PdfObject, pdfEquals, typeNameOf } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { isStreamOfType, PdfStream } from "#src/objects/pdf-stream";
import { defaultValueOf, fieldOf, schemaTypeOf } from "#src/schema/field-schema";
import { createObjectStream, type ObjectStreamMember, packObjectStream } from "#src/writer/object-stream-writer";
import { dereferenceAll, findUnusedObjects } from "./dereference";

const streamMode = z.enum(["preserve", "generate", "delete"]);

export const optimizeOptionsSchema = z
  .object({
    /** Merge revisions, drop unreachable objects and renumber the rest */
    compact: z.boolean().default(false),
    objectStreams: streamMode.default("preserve"),
    xrefStreams: streamMode.default("preserve"),
    /** Most objects packed into one object stream */
    objectsPerStream: z.number().int().positive().default(200),
    /** /Type values whose objects are never packed */
    excludeFromObjectStreams: z.array(z.string()).default([]),
  })
  .strict()
  .refine(options => !(options.objectStreams === "generate" && options.xrefStreams === "delete"), {
    message: "Object streams need cross-reference streams; xrefStreams cannot be 'delete'",
    path: ["xrefStreams"],
  });

export type OptimizeOptions = z.input<typeof optimizeOptionsSchema>;

type ResolvedOptions = z.output<typeof optimizeOptionsSchema>;

/**
 * Rewrite the document in place.
 *
 * Compaction runs first, so a failed one leaves the document as it was,
 * and the packed objects are the renumbered survivors. Default pruning
 * always runs.
 *
 * @throws {ZodError} for invalid options
 * @throws {IntegrityError} if compaction would leave a dangling reference
 */
export function optimize(resolver: ObjectResolver, options: OptimizeOptions = {}): void {
  const resolved = optimizeOptionsSchema.parse(options);

  if (resolved.compact) {
    compact(resolver, resolved.xrefStreams === "preserve");
  }

  deleteFieldsWithDefaults(resolver);

  if (resolved.objectStreams === "generate") {
    generateObjectStreams(resolver, resolved);
  } else if (resolved.objectStreams === "delete" || resolved.xrefStreams === "delete") {
    deleteObjectStreams(resolver, resolved.xrefStreams === "delete");
  }

  if (resolved.xrefStreams === "generate") {
    for (const revision of resolver.revisions) {
      ensureXRefStream(resolver, revision);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Compaction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Collapse the chain into one revision holding only reachable objects,
 * numbered 1..n with generation 0.
 *
 * @param keepXRefStreams - keep cross-reference stream objects as survivors
 * @throws {IntegrityError} before the document is touched, if a surviving
 *   reference would point at a dropped object
 */
export function compact(resolver: ObjectResolver, keepXRefStreams = false): void {
  const chain = resolver.revisions;
  const preview = selectSurvivors(resolver, findUnusedObjects(resolver), keepXRefStreams);

  checkCompactable(resolver, chain.current.trailer, preview);

  const merged = chain.merge();
  const survivors = selectSurvivors(resolver, dereferenceAll(resolver), keepXRefStreams);
  const renumbered = new Map<string, PdfRef>();

  survivors.forEach(({ ref }, i) => renumbered.set(ref.key, PdfRef.of(i + 1, 0)));

  for (const { value } of survivors) {
    if (value instanceof PdfStream) {
      value.set(PdfName.Length, PdfNumber.of(value.data.length));
    }
  }

  const fresh = chain.add();

  chain.delete(merged);
  resolver.forgetAll();

  const rewritten = new Set<PdfObject>();

  for (const item of [fresh.trailer, ...survivors.map(({ value }) => value)]) {
    replaceRefs(item, renumbered, rewritten);
  }

  for (const { ref, value } of survivors) {
    const target = renumbered.get(ref.key);

    if (target !== undefined) {
      resolver.register(target, value, fresh);
    }
  }

  fresh.trailer.set(PdfName.Size, PdfNumber.of(survivors.length + 1));
}

/**
 * Current bindings that compaction keeps, in ascending number order.
 */
function selectSurvivors(
  resolver: ObjectResolver,
  unused: IndirectObject[],
  keepXRefStreams: boolean,
): ObjectStreamMember[] {
  const unusedKeys = new Set(unused.map(({ ref }) => ref.key));
  const survivors: ObjectStreamMember[] = [];

  for (const { ref, value } of resolver.each()) {
    const type = typeNameOf(value);

    if (unusedKeys.has(ref.key) || value.type === "null" || type === "ObjStm" || (type === "XRef" && !keepXRefStreams)) {
      continue;
    }

    survivors.push({ ref, value });
  }

  return survivors;
}

/**
 * Look at the graph as dereferencing will leave it and fail if anything
 * kept would point at a dropped object. Changes nothing.
 *
 * References stay only where the target is interned; those need a
 * surviving identity. Every other target becomes the value itself, and a
 * stream among those must survive or it would be written inline.
 */
function checkCompactable(resolver: ObjectResolver, trailer: PdfDict, survivors: ObjectStreamMember[]): void {
  const keys = new Set(survivors.map(({ ref }) => ref.key));
  const kept = new Set(survivors.map(({ value }) => value));
  const pending: PdfObject[] = [trailer, ...kept];
  const entered = new Set<PdfObject>();

  const settle = (value: PdfObject): void => {
    let target: PdfObject | null = value;

    if (value instanceof PdfRef) {
      target = value.isSentinel ? null : resolver.resolve(value);

      if (target === null || target instanceof PdfNull) {
        return;
      }

      if (isInterned(target)) {
        if (!keys.has(value.key)) {
          throw new IntegrityError(`Reference ${value} points to an object that compaction removes`);
        }

        return;
      }
    }

    if (target instanceof PdfStream && !kept.has(target)) {
      const ref = resolver.getRef(target);

      throw new IntegrityError(`Stream ${ref?.key ?? "(direct)"} is still in use but compaction removes it`);
    }

    pending.push(target);
  };

  for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
    if (entered.has(item)) {
      continue;
    }

    entered.add(item);

    if (item instanceof PdfArray) {
      for (const value of item) {
        settle(value);
      }
    } else if (item instanceof PdfDict) {
      for (const [key, value] of item) {
        // Lengths are made direct
        if (!(item instanceof PdfStream && key === PdfName.Length)) {
          settle(value);
        }
      }
    }
  }
}

/**
 * Swap references for their new identities everywhere below `item`.
 */
function replaceRefs(item: PdfObject, renumbered: Map<string, PdfRef>, seen: Set<PdfObject>): void {
  if (seen.has(item)) {
    return;
  }

  seen.add(item);

  const swap = (value: PdfObject): PdfObject => {
    const target = value instanceof PdfRef ? renumbered.get(value.key) : undefined;

    if (target === undefined) {
      replaceRefs(value, renumbered, seen);
    }

    return target ?? value;
  };

  if (item instanceof PdfArray) {
    item.replaceEach(swap);
  } else if (item instanceof PdfDict) {
    item.replaceEach(swap);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Object and xref streams
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Objects that must stay outside object streams: the encryption
 * dictionary, and the catalog of an encrypted document.
 */
function pinnedObjects(resolver: ObjectResolver): Set<PdfObject> {
  const trailer = resolver.revisions.current.trailer;
  const pinned = new Set<PdfObject>();
  const encrypt = trailer.get(PdfName.Encrypt, resolver.resolver);

  if (encrypt !== undefined) {
    pinned.add(encrypt);

    const catalog = trailer.get(PdfName.Root, resolver.resolver);

    if (catalog !== undefined) {
      pinned.add(catalog);
    }
  }

  return pinned;
}

/**
 * Materialize every object bound in `revision`.
 */
function loadRevision(resolver: ObjectResolver, revision: Revision): ObjectStreamMember[] {
  const objects: ObjectStreamMember[] = [];

  for (const ref of revision.refs()) {
    const value = resolver.loadFrom(revision, ref);

    if (value !== null) {
      objects.push({ ref, value });
    }
  }

  return objects;
}

/**
 * Add an empty cross-reference stream object unless the revision has one;
 * the writer fills it.
 */
function ensureXRefStream(resolver: ObjectResolver, revision: Revision): void {
  const hasXRef = revision.refs().some(ref => {
    const value = resolver.loadFrom(revision, ref);

    return isStreamOfType(value, "XRef");
  });

  if (!hasXRef) {
    resolver.register(
      PdfRef.of(resolver.nextObjectNumber, 0),
      PdfStream.fromDict({ Type: PdfName.XRef }),
      revision,
    );
  }
}

/**
 * Repack every revision's eligible objects into fresh object streams.
 *
 * Eligible are in-use, generation-0, non-stream objects that are not
 * pinned and whose /Type is not excluded. Old containers are freed.
 */
function generateObjectStreams(resolver: ObjectResolver, options: ResolvedOptions): void {
  const pinned = pinnedObjects(resolver);
  const excluded = new Set(options.excludeFromObjectStreams);
  const refs = (obj: PdfObject) => resolver.getRef(obj);

  for (const revision of resolver.revisions) {
    const candidates: ObjectStreamMember[] = [];

    for (const { ref, value } of loadRevision(resolver, revision)) {
      if (isStreamOfType(value, "ObjStm")) {
        revision.delete(ref);
        continue;
      }

      const type = typeNameOf(value);
      const eligible =
        ref.generation === 0 &&
        !(value instanceof PdfStream) &&
        value.type !== "null" &&
        !pinned.has(value) &&
        (type === undefined || !excluded.has(type));

      if (eligible) {
        candidates.push({ ref, value });
      } else {
        revision.detach(ref);
      }
    }

    const count = Math.ceil(candidates.length / options.objectsPerStream);
    const groupSize = Math.ceil(candidates.length / Math.max(count, 1));

    for (let start = 0; start < candidates.length; start += groupSize) {
      const members = candidates.slice(start, start + groupSize);
      const container = createObjectStream();
      const containerRef = PdfRef.of(resolver.nextObjectNumber, 0);

      resolver.register(containerRef, container, revision);

      members.forEach(({ ref }, index) => {
        revision.xref.delete(ref.objectNumber);
        revision.xref.addCompressed(ref.objectNumber, containerRef.objectNumber, index);
      });

      packObjectStream(container, members, refs);
    }

    ensureXRefStream(resolver, revision);
  }
}

/**
 * Unpack every object stream into plain objects. With `xrefStreams`,
 * cross-reference stream objects are removed as well.
 */
function deleteObjectStreams(resolver: ObjectResolver, xrefStreams: boolean): void {
  for (const revision of resolver.revisions) {
    for (const { ref, value } of loadRevision(resolver, revision)) {
      if (isStreamOfType(value, "ObjStm") || (xrefStreams && isStreamOfType(value, "XRef"))) {
        revision.delete(ref);
      } else {
        revision.detach(ref);
      }
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Default pruning
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Remove dictionary entries whose value equals the field's documented
 * default. Required fields are kept. Directly nested dictionaries are
 * pruned by the schema their field names.
 */
export function deleteFieldsWithDefaults(resolver: ObjectResolver): void {
  const seen = new Set<PdfDict>();

  const prune = (dict: PdfDict, schema: string | undefined): void => {
    if (seen.has(dict)) {
      return;
    }

    seen.add(dict);

    for (const [key, value] of [...dict]) {
      const field = schema === undefined ? undefined : fieldOf(schema, key.value);

      if (field !== undefined && !field.required) {
        const fallback = defaultValueOf(field);

        if (fallback !== undefined && pdfEquals(value, fallback)) {
          dict.delete(key);
          continue;
        }
      }

      if (isPdfDict(value) && resolver.getRef(value) === null) {
        prune(value, schemaTypeOf(value) ?? field?.schema);
      }
    }
  };

  for (const { value } of resolver.each({ onlyCurrent: false })) {
    if (isPdfDict(value)) {
      prune(value, schemaTypeOf(value));
    }
  }
}
