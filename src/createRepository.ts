import sortBy from "just-sort-by";
import {
  AutoIncrementError,
  CommitFailedError,
  EntityNotFoundError,
  InvalidAttributeError,
  InvalidEntityError,
  StagingConflictError,
} from "./errors";
import { entityKey } from "./entityKey";
import { identifierOf } from "./identifierOf";
import { createLogger, type Logger } from "./logger";
import type {
  Adapter,
  EntityId,
  EntityInstance,
  EntityModel,
  EntityRecord,
  Plugin,
  Repository,
  StagedChange,
} from "./types";

/**
 * How `add` treats a key whose delete is still staged.
 *
 * - `"supersede"`: the add is staged after the delete; the commit replaces
 *   the record
 * - `"strict"`: the add is rejected with `StagingConflictError`
 */
export type StagingPolicy = "supersede" | "strict";

export type RepositoryOptions = {
  adapter: Adapter;
  plugins?: Plugin[];
  onPluginError?: (error: unknown, plugin: Plugin) => void;
  logger?: Logger;
  stagingPolicy?: StagingPolicy;
};

/**
 * Only the entity name is needed to delete by identifier.
 */
type ModelReference = {
  readonly schema: { readonly " $$entityName": string };
};

/**
 * Creates a repository over an adapter.
 *
 * @param options - Repository configuration
 * @param options.adapter - The adapter implementation for persistence
 * @param options.plugins - Optional array of plugins run after every commit
 * @param options.onPluginError - Optional callback to handle plugin execution errors
 * @param options.logger - Optional logger (defaults to a console logger, see `LOG_LEVEL`)
 * @param options.stagingPolicy - Optional handling of an add after a staged delete (default: `"supersede"`)
 *
 * @returns A repository instance with type-safe operations
 *
 * @remarks
 * The repository keeps the staged list; the adapter only ever sees committed
 * state and whole batches.
 *
 * ```
 * add()/delete() → stagedChanges → commit() → Adapter → Plugins
 * ```
 *
 * ## Staging
 *
 * Per key (entity name and id), in program order:
 * - `add` stages an addition; a later add for the same key wins on commit
 * - `delete` of a key that is only staged cancels every staged change for it
 * - `delete` of a committed key drops its staged adds and stages one delete;
 *   deleting it again is a no-op
 * - `add` after a staged delete follows the staging policy
 * - `add` of an auto-increment entity with a negative id stages it under the
 *   next integer id of its type
 *
 * ## Commit Failures
 *
 * When the adapter rejects a batch, the changes are put back in front of
 * anything staged meanwhile, or dropped if the adapter declares
 * `commitFailurePolicy: "discard"`. A `CommitFailedError` is thrown either way.
 *
 * ## Plugin Execution
 *
 * Plugins run after a non-empty batch is committed:
 * - All plugins execute in parallel using Promise.allSettled
 * - Plugin failures don't affect the commit operation (changes are already saved)
 * - Plugin failures don't prevent other plugins from running
 * - Use `onPluginError` to handle plugin failures; otherwise they are logged
 *
 * @example
 * ```typescript
 * import { createRepository, defineAdapter } from 'repokit';
 *
 * const repository = createRepository({
 *   adapter: createSQLiteAdapter(db),
 *   plugins: [auditPlugin],
 *   onPluginError: (error) => {
 *     reportError(error);
 *   },
 * });
 *
 * await repository.add(new Author({ id: "0", ... }));
 * await repository.commit();
 *
 * const author = await repository.get(Author, "0");
 * ```
 */
export function createRepository(options: RepositoryOptions): Repository {
  const { adapter } = options;
  const plugins = options.plugins ?? [];
  const logger = options.logger ?? createLogger("[repository] ");
  const stagingPolicy = options.stagingPolicy ?? "supersede";
  const commitFailurePolicy = adapter.commitFailurePolicy ?? "retain";

  let stagedChanges: StagedChange[] = [];

  const isSameKey = (change: StagedChange, entityName: string, key: string) =>
    change.entityName === entityName && entityKey(change.entityId) === key;

  const stagedChangesFor = (entityName: string, key: string) =>
    stagedChanges.filter((change) => isSameKey(change, entityName, key));

  const unstage = (entityName: string, key: string) => {
    stagedChanges = stagedChanges.filter(
      (change) => !isSameKey(change, entityName, key),
    );
  };

  const toEntity = <$$Entity extends EntityInstance>(
    model: EntityModel<$$Entity>,
    record: EntityRecord,
  ): $$Entity => {
    const entity = model[" $$load"](record.state);

    if (!(entity instanceof model)) {
      throw new InvalidEntityError(
        `Stored ${record.entityName} ${String(record.entityId)} did not load as an entity`,
        { entityName: record.entityName },
      );
    }

    return entity;
  };

  const loadAll = async <$$Entity extends EntityInstance>(
    model: EntityModel<$$Entity>,
  ): Promise<EntityRecord[]> =>
    adapter.getEntities({ entityName: model.schema[" $$entityName"] });

  const nextId = async (entityName: string): Promise<number> => {
    const ids = [
      ...(await adapter.getEntities({ entityName })).map(
        (record) => record.entityId,
      ),
      ...stagedChanges
        .filter((change) => change.entityName === entityName)
        .map((change) => change.entityId),
    ];

    const stringId = ids.find((id) => typeof id === "string");
    if (stringId !== undefined) {
      throw new AutoIncrementError(
        entityName,
        `the type already holds the string id "${stringId}"`,
      );
    }

    const next = ids.reduce<number>((max, id) => Math.max(max, Number(id)), -1) + 1;
    if (!Number.isSafeInteger(next)) {
      throw new AutoIncrementError(entityName, `${next} is not a safe integer`);
    }

    return next;
  };

  const stageDelete = async (entityName: string, entityId: EntityId) => {
    const key = entityKey(entityId);
    const committed = await adapter.getEntity({ entityName, entityId });
    const pending = stagedChangesFor(entityName, key);

    // 1. never committed: cancel the staged adds
    if (committed === null) {
      if (!pending.some((change) => change.type === "add")) {
        throw new EntityNotFoundError(
          `Unable to delete ${entityName} with id ${String(entityId)} because it is not in the repository`,
          { entityName, entityId },
        );
      }

      unstage(entityName, key);
      logger.debug(`Cancelled staged ${entityName} ${String(entityId)}`);
      return;
    }

    // 2. already pending
    if (pending.at(-1)?.type === "delete") {
      return;
    }

    // 3. committed: replace staged adds with a single delete
    unstage(entityName, key);
    stagedChanges.push({ type: "delete", entityName, entityId });
    logger.debug(`Staged delete of ${entityName} ${String(entityId)}`);
  };

  const runPlugins = async (changes: readonly StagedChange[]) => {
    if (plugins.length === 0) {
      return;
    }

    const pluginResults = await Promise.allSettled(
      plugins.map((plugin) =>
        // Wrap in async function to catch both sync and async errors
        (async () => {
          await plugin.onCommitted?.({ changes });
        })(),
      ),
    );

    pluginResults.forEach((pluginResult, i) => {
      const plugin = plugins[i];

      if (pluginResult.status !== "rejected" || !plugin) {
        return;
      }
      if (options.onPluginError) {
        options.onPluginError(pluginResult.reason, plugin);
      } else {
        logger.warn("Plugin failed after commit", pluginResult.reason);
      }
    });
  };

  return {
    async add(entity) {
      const { entityName } = entity;
      let entityId = identifierOf(entity);

      // 1. number auto-increment entities
      if (
        entity[" $$schema"][" $$autoIncrement"] &&
        typeof entityId === "number" &&
        entityId < 0
      ) {
        entityId = await nextId(entityName);
      }

      const key = entityKey(entityId);

      if (
        stagingPolicy === "strict" &&
        stagedChangesFor(entityName, key).at(-1)?.type === "delete"
      ) {
        throw new StagingConflictError(entityName, entityId);
      }

      // 2. stage a copy of the validated state
      stagedChanges.push({
        type: "add",
        entityName,
        entityId,
        state: { ...structuredClone(entity.state), id: entityId },
      });
      logger.debug(`Staged add of ${entityName} ${String(entityId)}`);
    },

    async delete(...args: [EntityInstance] | [ModelReference, EntityId]) {
      if (args.length === 1) {
        const [entity] = args;
        return stageDelete(entity.entityName, identifierOf(entity));
      }

      const [model, entityId] = args;
      return stageDelete(model.schema[" $$entityName"], entityId);
    },

    async get(model, entityId) {
      const entityName = model.schema[" $$entityName"];
      const record = await adapter.getEntity({ entityName, entityId });

      if (record === null) {
        throw new EntityNotFoundError(
          `No ${entityName} with id ${String(entityId)} in the repository`,
          { entityName, entityId },
        );
      }

      return toEntity(model, record);
    },

    async all(model) {
      const records = await loadAll(model);
      return records.map((record) => toEntity(model, record));
    },

    async search(model, criteria) {
      const entityName = model.schema[" $$entityName"];
      const { attributeNames } = model.schema;

      for (const attribute of Object.keys(criteria)) {
        if (!attributeNames.includes(attribute)) {
          throw new InvalidAttributeError(entityName, attribute);
        }
      }

      const records = await adapter.searchEntities({
        entityName,
        criteria: Object.fromEntries(Object.entries(criteria)),
      });

      return records.map((record) => toEntity(model, record));
    },

    async first(model) {
      const [record] = byEntityId(await loadAll(model));

      if (!record) {
        throw noEntities(model.schema[" $$entityName"]);
      }

      return toEntity(model, record);
    },

    async last(model) {
      const record = byEntityId(await loadAll(model)).at(-1);

      if (!record) {
        throw noEntities(model.schema[" $$entityName"]);
      }

      return toEntity(model, record);
    },

    async commit() {
      if (stagedChanges.length === 0) {
        logger.debug("Nothing to commit");
        return;
      }

      // 1. take the staged list
      const changes = stagedChanges;
      stagedChanges = [];

      // 2. commit changes to adapter
      try {
        await adapter.commitChanges({ changes });
      } catch (error) {
        const retained = commitFailurePolicy === "retain";
        if (retained) {
          stagedChanges = [...changes, ...stagedChanges];
        }

        logger.error(`Failed to commit ${changes.length} change(s)`, error);
        throw new CommitFailedError(changes, retained, { cause: error });
      }
      logger.debug(`Committed ${changes.length} change(s)`);

      // 3. run plugins in parallel
      await runPlugins(changes);
    },

    getStagedChanges() {
      return structuredClone(stagedChanges);
    },
  };
}

function noEntities(entityName: string): EntityNotFoundError {
  return new EntityNotFoundError(
    `There are no ${entityName} entities in the repository`,
    { entityName },
  );
}

/**
 * Orders records by identifier: numeric ids ascending, then string ids
 * ascending without regard to case.
 */
function byEntityId(records: EntityRecord[]): EntityRecord[] {
  const numeric = records.filter((record) => typeof record.entityId === "number");
  const named = records.filter((record) => typeof record.entityId === "string");

  return [...sortBy(numeric, "entityId"), ...sortBy(named, "entityId")];
}
