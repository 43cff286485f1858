/**
 * @fileoverview ArkType schema provider.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { type Type, type } from "arktype";
import * as v from "valibot";
import { standard } from "./standard";
import type { SchemaInput } from "./types";

type ArktypeObjectType = Type<object, object>;

const PropListSchema = v.optional(
  v.array(v.looseObject({ key: v.string() })),
  [],
);

const ObjectJsonSchema = v.looseObject({
  required: PropListSchema,
  optional: PropListSchema,
});

/**
 * Creates an ArkType schema provider.
 *
 * @param schema - An object `type()` describing the attributes, `id` included
 *
 * @returns A schema provider for `defineSchema`
 *
 * @remarks
 * Declared attribute names are read from the type's JSON representation,
 * required and optional keys alike. ArkType natively implements Standard
 * Schema V1, so validation goes through {@link standard}.
 *
 * @example
 * ```typescript
 * import { defineSchema } from 'repokit';
 * import { arktype, type } from 'repokit/arktype';
 *
 * const publisherSchema = defineSchema("publisher", {
 *   schema: arktype(
 *     type({
 *       id: "string",
 *       name: "string",
 *       city: "string",
 *     }),
 *   ),
 * });
 * ```
 */
export function arktype<$$Schema extends ArktypeObjectType>(
  schema: $$Schema,
): SchemaInput<$$Schema["infer"]> {
  const json = v.parse(ObjectJsonSchema, schema.json);
  const attributeNames = [...json.required, ...json.optional].map(
    (prop) => prop.key,
  );

  return standard({
    // ArkType natively implements Standard Schema V1
    schema: schema as unknown as StandardSchemaV1<unknown, $$Schema["infer"]>,
    attributeNames,
  });
}

export { type } from "arktype";
