import type { SchemaInput } from "./SchemaInput";

/**
 * Identifier of an entity. Numbers must be safe integers.
 *
 * @remarks
 * `1` and `"1"` are different identifiers.
 */
export type EntityId = string | number;

/**
 * The attributes every entity type must declare.
 */
export type BaseAttributes = {
  id: EntityId;
};

/**
 * Type definition for a complete entity schema.
 * @internal
 */
export type Schema<
  $$EntityName extends string,
  $$Attributes extends BaseAttributes,
  $$Input = $$Attributes,
> = ReturnType<SchemaInput<$$Attributes, $$Input>> & {
  " $$entityName": $$EntityName;
  " $$generateId": () => EntityId;
  " $$autoIncrement": boolean;
};

/**
 * Infer the attribute type from a schema.
 * @internal
 */
export type InferAttributesFromSchema<T> = T extends {
  parseAttributes: (input: unknown) => infer Attributes;
}
  ? Attributes
  : never;

/**
 * Infer the entity name from a schema.
 * @internal
 */
export type InferEntityNameFromSchema<T> = T extends {
  " $$entityName": infer EntityName;
}
  ? EntityName
  : never;
