/**
 * @fileoverview Valibot schema provider.
 */

import * as v from "valibot";
import { formatIssue, invalidAttributes } from "./standard";
import type { SchemaInput } from "./types";

type ValibotObjectSchema = v.ObjectSchema<v.ObjectEntries, undefined>;

/**
 * Creates a Valibot schema provider.
 *
 * @param schema - A `v.object()` schema describing the attributes, `id` included
 *
 * @returns A schema provider for `defineSchema`
 *
 * @remarks
 * The declared attribute names are the keys of the object's entries.
 * Unknown keys are stripped, as `v.object()` does.
 *
 * @example
 * ```typescript
 * import { defineSchema } from 'repokit';
 * import { valibot, v } from 'repokit/valibot';
 *
 * const authorSchema = defineSchema("author", {
 *   schema: valibot(
 *     v.object({
 *       id: v.string(),
 *       firstName: v.string(),
 *       lastName: v.string(),
 *       country: v.pipe(v.string(), v.length(2)),
 *     }),
 *   ),
 * });
 * ```
 */
export function valibot<$$Schema extends ValibotObjectSchema>(
  schema: $$Schema,
): SchemaInput<v.InferOutput<$$Schema>, v.InferInput<$$Schema>> {
  const attributeNames = Object.keys(schema.entries);

  return (context) => ({
    attributeNames,
    parseAttributes(input) {
      const result = v.safeParse(schema, input);

      if (!result.success) {
        throw invalidAttributes(
          context.entityName,
          result.issues.map((issue) =>
            formatIssue(v.getDotPath(issue)?.split("."), issue.message),
          ),
        );
      }

      return result.output;
    },
  });
}

export * as v from "valibot";
