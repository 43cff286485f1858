/**
 * @fileoverview TypeBox schema provider.
 */

import type { Static, TObject } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { formatIssue, invalidAttributes } from "./standard";
import type { SchemaInput } from "./types";

/**
 * Creates a TypeBox schema provider.
 *
 * @param schema - A `Type.Object()` schema describing the attributes, `id` included
 *
 * @returns A schema provider for `defineSchema`
 *
 * @remarks
 * The schema is compiled once with `TypeCompiler`. TypeBox checks values
 * without transforming them, so the parsed attributes are the input object.
 *
 * @example
 * ```typescript
 * import { defineSchema } from 'repokit';
 * import { typebox, Type } from 'repokit/typebox';
 *
 * const genreSchema = defineSchema("genre", {
 *   schema: typebox(
 *     Type.Object({
 *       id: Type.Integer(),
 *       name: Type.String(),
 *       description: Type.String(),
 *     }),
 *   ),
 * });
 * ```
 */
export function typebox<$$Schema extends TObject>(
  schema: $$Schema,
): SchemaInput<Static<$$Schema>> {
  const attributeNames = Object.keys(schema.properties);
  const compiled = TypeCompiler.Compile(schema);

  return (context) => ({
    attributeNames,
    parseAttributes(input) {
      if (compiled.Check(input)) {
        return input;
      }

      throw invalidAttributes(
        context.entityName,
        [...compiled.Errors(input)].map((error) =>
          formatIssue(error.path.split("/").filter(Boolean), error.message),
        ),
      );
    },
  });
}

export { Type } from "@sinclair/typebox";
