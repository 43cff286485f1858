import type { EntityInstance } from "./EntityInstance";
import type { Criteria, EntityModel } from "./EntityModel";
import type { StagedChange } from "./StagedChange";

/**
 * Repository interface every backend exposes identically.
 *
 * @remarks
 * `add` and `delete` only stage changes. Reads (`get`, `all`, `search`,
 * `first`, `last`) observe the committed store and never see staged changes
 * until `commit()` folds them in.
 *
 * Calls must be awaited one at a time; a repository does no locking.
 */
export type Repository = {
  /**
   * Stages an addition. On commit the record is inserted, or replaces the
   * record with the same key.
   *
   * The entity's state is staged as constructed; it is not parsed again. When
   * the schema sets `autoIncrement` and the id is negative, the change is
   * staged under the next integer id of the type. The passed entity keeps
   * its id; read the assigned one back with `getStagedChanges` or `last`.
   *
   * @throws {InvalidEntityError} If the value is not an entity with a valid
   * identifier
   * @throws {AutoIncrementError} If the next integer id cannot be assigned
   * @throws {StagingConflictError} If a delete of the same key is pending and
   * the staging policy is `"strict"`
   *
   * @example
   * ```typescript
   * await repository.add(new Author({ id: "0", firstName: "Brandon", ... }));
   * await repository.commit();
   * ```
   */
  add: (entity: EntityInstance) => Promise<void>;

  /**
   * Stages a removal. Deleting a key that only has staged additions cancels
   * them instead.
   *
   * @throws {EntityNotFoundError} If neither the committed store nor the
   * staged additions contain the key
   */
  delete: {
    (entity: EntityInstance): Promise<void>;
    <$$Entity extends EntityInstance>(
      model: EntityModel<$$Entity>,
      entityId: $$Entity["entityId"],
    ): Promise<void>;
  };

  /**
   * Retrieves a committed entity by its identifier.
   *
   * @throws {EntityNotFoundError} If the key is not committed
   */
  get: <$$Entity extends EntityInstance>(
    model: EntityModel<$$Entity>,
    entityId: $$Entity["entityId"],
  ) => Promise<$$Entity>;

  /**
   * Retrieves every committed entity of a type, in insertion order.
   */
  all: <$$Entity extends EntityInstance>(
    model: EntityModel<$$Entity>,
  ) => Promise<$$Entity[]>;

  /**
   * Retrieves the committed entities of a type whose attributes equal every
   * criterion.
   *
   * @throws {InvalidAttributeError} If a criterion names an undeclared attribute
   *
   * @example
   * ```typescript
   * const brandons = await repository.search(Author, { firstName: "Brandon" });
   * ```
   */
  search: <$$Entity extends EntityInstance>(
    model: EntityModel<$$Entity>,
    criteria: Criteria<$$Entity>,
  ) => Promise<$$Entity[]>;

  /**
   * Retrieves the committed entity with the smallest identifier.
   *
   * @throws {EntityNotFoundError} If the type has no committed entities
   */
  first: <$$Entity extends EntityInstance>(
    model: EntityModel<$$Entity>,
  ) => Promise<$$Entity>;

  /**
   * Retrieves the committed entity with the greatest identifier.
   *
   * @throws {EntityNotFoundError} If the type has no committed entities
   */
  last: <$$Entity extends EntityInstance>(
    model: EntityModel<$$Entity>,
  ) => Promise<$$Entity>;

  /**
   * Folds every staged change into the committed store, in staging order,
   * and clears the staged list.
   *
   * @throws {CommitFailedError} If the adapter fails to persist the batch
   */
  commit: () => Promise<void>;

  /**
   * Copy of the staged list. Changing it does not affect what `commit` folds in.
   */
  getStagedChanges: () => readonly StagedChange[];
};
