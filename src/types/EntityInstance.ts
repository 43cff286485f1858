import type { BaseAttributes, Schema } from "./Schema";

/**
 * Internal interface defining the structure of an Entity instance.
 *
 * @internal
 *
 * @remarks
 * Use the `Entity()` factory function to create entity classes.
 * Properties prefixed with ` $$` are implementation details.
 */
export interface EntityInstance<
  $$EntityName extends string = string,
  $$Attributes extends BaseAttributes = BaseAttributes,
> {
  /**
   * The canonical name of this entity type. Storage is partitioned by it.
   */
  readonly entityName: $$EntityName;

  /**
   * The `id` attribute.
   */
  readonly entityId: $$Attributes["id"];

  /**
   * The validated attributes.
   */
  readonly state: Readonly<$$Attributes>;

  /** @internal */
  readonly " $$schema": Schema<$$EntityName, $$Attributes, unknown>;

  /**
   * Structural equality: same entity name and equal attributes.
   */
  equals(other: unknown): boolean;
}

/**
 * Constructor input: the attributes as the schema accepts them, with `id`
 * optional.
 */
export type EntityInput<$$Input extends Partial<BaseAttributes>> = Omit<
  $$Input,
  "id"
> & {
  id?: $$Input["id"];
};
