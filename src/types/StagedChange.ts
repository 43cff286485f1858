import type { EntityId } from "./Schema";

/**
 * Attributes of an entity as backends see them.
 */
export type EntityState = Readonly<Record<string, unknown>>;

/**
 * One committed entity as returned by an adapter.
 */
export type EntityRecord = {
  readonly entityName: string;
  readonly entityId: EntityId;
  readonly state: EntityState;
};

/**
 * A pending operation on the staged list.
 *
 * @remarks
 * `add` upserts the record on commit; `delete` removes it.
 */
export type StagedChange =
  | {
      readonly type: "add";
      readonly entityName: string;
      readonly entityId: EntityId;
      readonly state: EntityState;
    }
  | {
      readonly type: "delete";
      readonly entityName: string;
      readonly entityId: EntityId;
    };
