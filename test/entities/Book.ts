import { defineSchema, Entity } from "../../src";
import { z, zod } from "../../src/zod";

/**
 * Book entity schema definition (numeric identifiers numbered on add)
 */
export const bookSchema = defineSchema("book", {
  schema: zod(
    z.object({
      id: z.number().int(),
      title: z.string().min(1),
      summary: z.string(),
      releasedYear: z.number().int(),
      authorId: z.string().optional(),
    }),
  ),
  autoIncrement: true,
});

export class Book extends Entity(bookSchema) {
  isReleasedBefore(year: number): boolean {
    return this.state.releasedYear < year;
  }
}
