import type { EntityId } from "./Schema";
import type { EntityRecord, StagedChange } from "./StagedChange";

/**
 * Adapter interface for persisting and querying entities.
 *
 * @remarks
 * The Adapter is the storage half of a repository. `createRepository()`
 * layers staging, validation and plugins on top, so every backend built on
 * an Adapter shares the same transaction semantics.
 *
 * ## Key Requirements
 *
 * - **Isolation**: records are partitioned by `entityName`; a query for one
 *   entity name never returns records of another
 * - **Ordering**: `getEntities` and `searchEntities` return records in the
 *   order they were first inserted into the store; an upsert keeps the
 *   original position, a delete followed by an add moves it to the end
 * - **Atomicity**: a batch passed to `commitChanges` is applied entirely, in
 *   order, or not at all
 * - **Copy semantics**: returned records must not alias stored state
 *
 * ## Implementation Guide
 *
 * ```typescript
 * import { defineAdapter } from 'repokit';
 *
 * export const createSQLiteAdapter = (db: Database.Database) =>
 *   defineAdapter({
 *     async getEntity({ entityName, entityId }) { ... },
 *     async getEntities({ entityName }) { ... },
 *     async searchEntities({ entityName, criteria }) { ... },
 *     async commitChanges({ changes }) {
 *       db.transaction(() => { ... })();
 *     },
 *   });
 * ```
 *
 * Empty batches are never passed to `commitChanges`.
 */
export type Adapter = {
  /**
   * Retrieves one committed record, or `null` when the key is absent.
   */
  getEntity: (args: {
    entityName: string;
    entityId: EntityId;
  }) => Promise<EntityRecord | null>;

  /**
   * Retrieves every committed record of an entity type in insertion order.
   */
  getEntities: (args: { entityName: string }) => Promise<EntityRecord[]>;

  /**
   * Retrieves the committed records of an entity type whose attributes are
   * structurally equal to every criterion. Empty criteria match everything.
   *
   * @remarks
   * Criteria keys are already checked against the entity schema.
   */
  searchEntities: (args: {
    entityName: string;
    criteria: Readonly<Record<string, unknown>>;
  }) => Promise<EntityRecord[]>;

  /**
   * Applies a batch of staged changes atomically and in order.
   *
   * @throws Any backend error; the repository wraps it in `CommitFailedError`
   */
  commitChanges(args: { changes: readonly StagedChange[] }): Promise<void>;

  /**
   * What happens to the staged changes when `commitChanges` rejects.
   *
   * - `"retain"` (default): put back on the staged list for another commit
   * - `"discard"`: dropped
   */
  commitFailurePolicy?: "retain" | "discard";
};
