import type { BaseAttributes, EntityId, Schema, SchemaInput } from "./types";

const defaultGenerateId = (): EntityId => crypto.randomUUID();

/**
 * Identifier of an auto-increment entity that has not been added yet.
 */
export const AUTO_INCREMENT_PLACEHOLDER = -1;

/**
 * Defines the schema of an entity type with pluggable validation.
 *
 * @param entityName - The canonical name for this entity type (e.g., "author", "book")
 * @param options - Schema configuration options
 * @param options.schema - Schema provider function (e.g., `valibot()`) that validates the attributes
 * @param options.generateId - Optional ID generator used when an entity is created without `id` (defaults to crypto.randomUUID)
 * @param options.autoIncrement - Optional flag: the repository numbers entities with a negative integer id when they are added
 *
 * @returns A fully-typed schema object for use with Entity and Repository
 *
 * @remarks
 * The attribute record must declare `id`, either a string or an integer.
 * Entities of different names never share storage, even with equal ids.
 *
 * The default generator yields strings; entity types with numeric ids should
 * pass their own `generateId`, set `autoIncrement`, or always supply `id`.
 *
 * With `autoIncrement`, an entity created without `id` gets the placeholder
 * `-1`. `add` replaces any negative integer id with the next one after the
 * greatest integer id committed or staged for the type, starting at `0`.
 *
 * @example
 * Using the Valibot provider:
 * ```typescript
 * import { defineSchema } from 'repokit';
 * import { valibot, v } from 'repokit/valibot';
 *
 * const authorSchema = defineSchema("author", {
 *   schema: valibot(
 *     v.object({
 *       id: v.string(),
 *       firstName: v.pipe(v.string(), v.minLength(1)),
 *       lastName: v.pipe(v.string(), v.minLength(1)),
 *       country: v.pipe(v.string(), v.length(2)),
 *     }),
 *   ),
 * });
 * ```
 *
 * @example
 * Numeric identifiers assigned by the repository:
 * ```typescript
 * import { defineSchema } from 'repokit';
 * import { zod, z } from 'repokit/zod';
 *
 * const bookSchema = defineSchema("book", {
 *   schema: zod(
 *     z.object({
 *       id: z.number().int(),
 *       title: z.string(),
 *       summary: z.string(),
 *     }),
 *   ),
 *   autoIncrement: true,
 * });
 * ```
 */
export function defineSchema<
  $$EntityName extends string,
  $$Attributes extends BaseAttributes,
  $$Input extends Partial<BaseAttributes> = $$Attributes,
>(
  entityName: $$EntityName,
  options: {
    schema: SchemaInput<$$Attributes, $$Input>;
    generateId?: () => $$Attributes["id"];
    autoIncrement?: boolean;
  },
): Schema<$$EntityName, $$Attributes, $$Input> {
  if (entityName.length === 0) {
    throw new Error("Entity name must not be empty");
  }

  const autoIncrement = options.autoIncrement ?? false;
  const generateId =
    options.generateId ??
    (autoIncrement ? () => AUTO_INCREMENT_PLACEHOLDER : defaultGenerateId);

  const { attributeNames, parseAttributes } = options.schema({ entityName });

  if (!attributeNames.includes("id")) {
    throw new Error(`Entity "${entityName}" must declare an "id" attribute`);
  }

  return {
    attributeNames,
    parseAttributes,
    " $$entityName": entityName,
    " $$generateId": generateId,
    " $$autoIncrement": autoIncrement,
  };
}
