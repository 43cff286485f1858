import type { EntityId } from "./types/Schema";
import type { StagedChange } from "./types/StagedChange";

/**
 * Base class for every error raised by a repository or an entity model.
 *
 * @remarks
 * `code` is stable across releases and safe to branch on; messages are not.
 */
export class RepositoryError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RepositoryError";
    this.code = code;
  }
}

/**
 * Raised by `get`, `delete`, `first` and `last` when the key is absent from
 * the committed store (and, for `delete`, from the staged additions).
 */
export class EntityNotFoundError extends RepositoryError {
  readonly entityName: string;
  readonly entityId?: EntityId;

  constructor(
    message: string,
    details: { entityName: string; entityId?: EntityId },
  ) {
    super("ENTITY_NOT_FOUND", message);
    this.name = "EntityNotFoundError";
    this.entityName = details.entityName;
    this.entityId = details.entityId;
  }
}

/**
 * The value is not an entity, lacks a valid identifier, or its attributes
 * do not satisfy the entity schema.
 */
export class InvalidEntityError extends RepositoryError {
  readonly entityName?: string;
  readonly issues: readonly string[];

  constructor(
    message: string,
    details?: { entityName?: string; issues?: readonly string[] },
    options?: ErrorOptions,
  ) {
    super("INVALID_ENTITY", message, options);
    this.name = "InvalidEntityError";
    this.entityName = details?.entityName;
    this.issues = details?.issues ?? [];
  }
}

/**
 * A search criterion names an attribute the entity schema does not declare.
 */
export class InvalidAttributeError extends RepositoryError {
  readonly entityName: string;
  readonly attribute: string;

  constructor(entityName: string, attribute: string) {
    super(
      "INVALID_ATTRIBUTE",
      `Entity "${entityName}" has no attribute "${attribute}"`,
    );
    this.name = "InvalidAttributeError";
    this.entityName = entityName;
    this.attribute = attribute;
  }
}

/**
 * Two staged operations on the same key cannot be reconciled under the
 * repository's staging policy.
 */
export class StagingConflictError extends RepositoryError {
  readonly entityName: string;
  readonly entityId: EntityId;

  constructor(entityName: string, entityId: EntityId) {
    super(
      "STAGING_CONFLICT",
      `Cannot stage ${entityName} with id ${String(entityId)}: a delete for the same entity is pending`,
    );
    this.name = "StagingConflictError";
    this.entityName = entityName;
    this.entityId = entityId;
  }
}

/**
 * The repository could not number an auto-increment entity: the type already
 * holds a string identifier, or the next integer is not a safe integer.
 */
export class AutoIncrementError extends RepositoryError {
  readonly entityName: string;

  constructor(entityName: string, reason: string) {
    super(
      "AUTO_INCREMENT_FAILED",
      `Unable to assign the next ${entityName} id: ${reason}`,
    );
    this.name = "AutoIncrementError";
    this.entityName = entityName;
  }
}

/**
 * The backend failed to persist a batch of staged changes.
 *
 * @remarks
 * `retained` tells whether the changes were put back on the staged list for
 * another `commit()` or dropped; the adapter's `commitFailurePolicy` decides.
 */
export class CommitFailedError extends RepositoryError {
  readonly changes: readonly StagedChange[];
  readonly retained: boolean;

  constructor(
    changes: readonly StagedChange[],
    retained: boolean,
    options?: ErrorOptions,
  ) {
    super(
      "COMMIT_FAILED",
      `Failed to commit ${changes.length} staged change(s); changes were ${retained ? "retained" : "discarded"}`,
      options,
    );
    this.name = "CommitFailedError";
    this.changes = changes;
    this.retained = retained;
  }
}
