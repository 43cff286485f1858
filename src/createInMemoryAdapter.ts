import { defineAdapter } from "./defineAdapter";
import { entityKey } from "./entityKey";
import { isEqual } from "./isEqual";
import type { Adapter, EntityRecord } from "./types";

export type InMemoryAdapter = Adapter & {
  /**
   * Removes every committed record.
   */
  clear(): void;

  /**
   * Counts committed records, of one entity type or of all.
   */
  count(entityName?: string): number;
};

/**
 * In-memory adapter: the reference backend.
 *
 * @remarks
 * Records live in one `Map` per entity name, keyed by identifier, so a `Map`'s
 * insertion order is the order `getEntities` reports. Stored and returned
 * records are deep copies. Search is a linear scan of the queried type.
 *
 * Nothing here can fail halfway through a batch, so a failed commit has
 * nothing to retain: the adapter declares `commitFailurePolicy: "discard"`.
 */
export const createInMemoryAdapter = (): InMemoryAdapter => {
  const partitions = new Map<string, Map<string, EntityRecord>>();

  const partitionOf = (entityName: string) => {
    let partition = partitions.get(entityName);
    if (!partition) {
      partition = new Map();
      partitions.set(entityName, partition);
    }
    return partition;
  };

  const recordsOf = (entityName: string): EntityRecord[] => [
    ...(partitions.get(entityName)?.values() ?? []),
  ];

  const adapter = defineAdapter({
    commitFailurePolicy: "discard",

    async getEntity({ entityName, entityId }) {
      const record = partitions.get(entityName)?.get(entityKey(entityId));
      return record ? structuredClone(record) : null;
    },

    async getEntities({ entityName }) {
      return recordsOf(entityName).map((record) => structuredClone(record));
    },

    async searchEntities({ entityName, criteria }) {
      const expected = Object.entries(criteria);

      return recordsOf(entityName)
        .filter((record) => {
          const actual = new Map<string, unknown>(Object.entries(record.state));
          return expected.every(([attribute, value]) =>
            isEqual(actual.get(attribute), value),
          );
        })
        .map((record) => structuredClone(record));
    },

    async commitChanges({ changes }) {
      for (const change of changes) {
        const partition = partitionOf(change.entityName);
        const key = entityKey(change.entityId);

        switch (change.type) {
          case "add": {
            partition.set(key, {
              entityName: change.entityName,
              entityId: change.entityId,
              state: structuredClone(change.state),
            });
            break;
          }
          case "delete": {
            partition.delete(key);
            break;
          }
        }
      }
    },
  });

  return {
    ...adapter,

    clear() {
      partitions.clear();
    },

    count(entityName) {
      if (entityName !== undefined) {
        return partitions.get(entityName)?.size ?? 0;
      }

      let total = 0;
      for (const partition of partitions.values()) {
        total += partition.size;
      }
      return total;
    },
  };
};
