import { defineSchema, Entity } from "../../src";
import { z, zod } from "../../src/zod";

/**
 * Tag entity schema definition
 *
 * `labels` is accepted as a comma-separated string and stored as a list.
 */
export const tagSchema = defineSchema("tag", {
  schema: zod(
    z.object({
      id: z.string().min(1),
      labels: z.string().transform((value) => value.split(",")),
    }),
  ),
});

export class Tag extends Entity(tagSchema) {}
