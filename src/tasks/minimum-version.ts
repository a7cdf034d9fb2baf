import type { ObjectResolver } from "#src/document/object-resolver";
import type { PdfDict } from "#src/objects/pdf-dict";
import { isPdfDict } from "#src/objects/pdf-object";
import { fieldOf, schemaTypeOf, TRAILER_SCHEMA } from "#src/schema/field-schema";
import { maxVersion } from "#src/schema/version";

/**
 * A document whose header version can be raised.
 */
export interface VersionedDocument {
  readonly resolver: ObjectResolver;
  version: string;
}

const BASE_VERSION = "1.0";

/**
 * The lowest PDF version that knows every field the document uses.
 *
 * Looks at live objects and the trailer, recursing only into directly
 * nested dictionaries. Raises `doc.version` when it is lower; never lowers it.
 */
export function computeMinimumVersion(doc: VersionedDocument): string {
  const seen = new Set<PdfDict>();
  let minimum = BASE_VERSION;

  const scan = (dict: PdfDict, schema: string | undefined): void => {
    if (seen.has(dict)) {
      return;
    }

    seen.add(dict);

    for (const [key, value] of dict) {
      const field = schema === undefined ? undefined : fieldOf(schema, key.value);

      if (field !== undefined) {
        minimum = maxVersion(minimum, field.version);
      }

      if (isPdfDict(value) && doc.resolver.getRef(value) === null) {
        scan(value, schemaTypeOf(value) ?? field?.schema);
      }
    }
  };

  scan(doc.resolver.revisions.current.trailer, TRAILER_SCHEMA);

  for (const { value } of doc.resolver.each()) {
    if (isPdfDict(value)) {
      scan(value, schemaTypeOf(value));
    }
  }

  doc.version = maxVersion(doc.version, minimum);

  return minimum;
}
