/**
 * Field-schema registry: what the PDF format says about the entries of
 * each dictionary type, loaded from `fields.json`.
 *
 * Used by default-value pruning and by the minimum-version computation.
 */

import { z } from "zod";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfBool } from "#src/objects/pdf-constant";
import type { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import fieldData from "./fields.json";
import { VERSION_PATTERN } from "./version";

/**
 * A default as written in the JSON data; `{ "name": "X" }` stands for `/X`.
 */
export type DefaultValue = number | boolean | { name: string } | DefaultValue[];

const defaultValueSchema: z.ZodType<DefaultValue> = z.lazy(() =>
  z.union([z.number(), z.boolean(), z.object({ name: z.string() }).strict(), z.array(defaultValueSchema)]),
);

const fieldSchema = z
  .object({
    name: z.string().min(1),
    required: z.boolean().default(false),
    default: defaultValueSchema.optional(),
    /** First PDF version that defines the field */
    version: z.string().regex(VERSION_PATTERN).default("1.0"),
    /** Schema of a dictionary stored directly in this field */
    schema: z.string().optional(),
  })
  .strict();

const registrySchema = z.record(z.string(), z.array(fieldSchema));

export type FieldDefinition = z.infer<typeof fieldSchema>;

export type FieldRegistry = Map<string, Map<string, FieldDefinition>>;

/**
 * Schema name for trailer dictionaries, which have no /Type.
 */
export const TRAILER_SCHEMA = "Trailer";

/**
 * Validate raw field data and index it by type and key.
 *
 * @throws {ZodError} if the data does not match the field schema
 */
export function loadFieldRegistry(data: unknown): FieldRegistry {
  const parsed = registrySchema.parse(data);
  const registry: FieldRegistry = new Map();

  for (const [typeName, fields] of Object.entries(parsed)) {
    registry.set(typeName, new Map(fields.map(field => [field.name, field])));
  }

  return registry;
}

const registry = loadFieldRegistry(fieldData);

export function fieldsFor(typeName: string): FieldDefinition[] {
  return [...(registry.get(typeName)?.values() ?? [])];
}

export function fieldOf(typeName: string, key: string): FieldDefinition | undefined {
  return registry.get(typeName)?.get(key);
}

/**
 * Schema that applies to `dict`: its /Type, if the registry knows it.
 */
export function schemaTypeOf(dict: PdfDict): string | undefined {
  const type = dict.getName("Type")?.value;

  return type !== undefined && registry.has(type) ? type : undefined;
}

/**
 * The field's default as a fresh PDF object, or undefined if it has none.
 */
export function defaultValueOf(field: FieldDefinition): PdfObject | undefined {
  return field.default === undefined ? undefined : toPdfObject(field.default);
}

function toPdfObject(value: DefaultValue): PdfObject {
  if (typeof value === "number") {
    return PdfNumber.of(value);
  }

  if (typeof value === "boolean") {
    return PdfBool.of(value);
  }

  if (Array.isArray(value)) {
    return new PdfArray(value.map(toPdfObject));
  }

  return PdfName.of(value.name);
}
