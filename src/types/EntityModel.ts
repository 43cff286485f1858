import type { EntityInstance } from "./EntityInstance";
import type { EntityState } from "./StagedChange";

/**
 * An entity class as the repository sees it: the value passed to `get`,
 * `all`, `search`, `first` and `last` to name the entity type.
 */
export interface EntityModel<$$Entity extends EntityInstance> {
  readonly schema: {
    readonly " $$entityName": $$Entity["entityName"];
    readonly attributeNames: readonly string[];
    parseAttributes(input: unknown): $$Entity["state"];
  };

  new (attributes: never): $$Entity;

  /**
   * Adopts state read from an adapter without parsing it again.
   * @internal
   */
  " $$load"(state: EntityState): unknown;
}

/**
 * Equality criteria over the attributes of an entity type.
 */
export type Criteria<$$Entity extends EntityInstance> = {
  readonly [key in keyof $$Entity["state"]]?: $$Entity["state"][key];
};
