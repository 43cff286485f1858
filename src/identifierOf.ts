import * as v from "valibot";
import { InvalidEntityError } from "./errors";
import type { EntityId } from "./types";

const EntityIdSchema = v.union([
  v.pipe(v.string(), v.nonEmpty()),
  v.pipe(v.number(), v.safeInteger()),
]);

const EntityEnvelopeSchema = v.object({
  entityName: v.pipe(v.string(), v.nonEmpty()),
  state: v.looseObject({
    id: EntityIdSchema,
  }),
});

/**
 * Whether a value is usable as an entity identifier: a non-empty string or a
 * safe integer.
 */
export function isEntityId(value: unknown): value is EntityId {
  return v.is(EntityIdSchema, value);
}

/**
 * Returns the identifier of an entity.
 *
 * @throws {InvalidEntityError} If the value is not an entity, or its `id` is
 * missing or malformed
 *
 * @example
 * ```typescript
 * const author = new Author({ id: "0", firstName: "Brandon", ... });
 * identifierOf(author); // "0"
 * ```
 */
export function identifierOf(entity: unknown): EntityId {
  const result = v.safeParse(EntityEnvelopeSchema, entity);

  if (!result.success) {
    throw new InvalidEntityError(
      `Value is not an entity with a valid identifier: ${v.summarize(result.issues)}`,
      { issues: result.issues.map((issue) => issue.message) },
    );
  }

  return result.output.state.id;
}
