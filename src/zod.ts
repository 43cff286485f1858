/**
 * @fileoverview Zod schema provider.
 */

import { z } from "zod";
import { formatIssue, invalidAttributes } from "./standard";
import type { SchemaInput } from "./types";

type ZodObjectSchema = z.ZodObject<z.ZodRawShape>;

/**
 * Creates a Zod schema provider.
 *
 * @param schema - A `z.object()` schema describing the attributes, `id` included
 *
 * @returns A schema provider for `defineSchema`
 *
 * @example
 * ```typescript
 * import { defineSchema } from 'repokit';
 * import { zod, z } from 'repokit/zod';
 *
 * const bookSchema = defineSchema("book", {
 *   schema: zod(
 *     z.object({
 *       id: z.number().int(),
 *       title: z.string().min(1),
 *       summary: z.string(),
 *     }),
 *   ),
 * });
 * ```
 */
export function zod<$$Schema extends ZodObjectSchema>(
  schema: $$Schema,
): SchemaInput<z.output<$$Schema>, z.input<$$Schema>> {
  const attributeNames = Object.keys(schema.shape);

  return (context) => ({
    attributeNames,
    parseAttributes(input) {
      const result = schema.safeParse(input);

      if (!result.success) {
        throw invalidAttributes(
          context.entityName,
          result.error.issues.map((issue) =>
            formatIssue(issue.path, issue.message),
          ),
        );
      }

      return result.data;
    },
  });
}

export { z } from "zod";
