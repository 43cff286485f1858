import type Database from "better-sqlite3";
import * as v from "valibot";
import {
  type Adapter,
  defineAdapter,
  type EntityRecord,
  entityKey,
  isEqual,
} from "../../src";

const RowSchema = v.object({
  entity_name: v.string(),
  entity_id: v.string(),
  id_type: v.picklist(["string", "number"]),
  state: v.string(),
});

const StateSchema = v.record(v.string(), v.unknown());

const CountSchema = v.object({ count: v.number() });

const toRecord = (row: unknown): EntityRecord => {
  const parsed = v.parse(RowSchema, row);

  return {
    entityName: parsed.entity_name,
    entityId:
      parsed.id_type === "number" ? Number(parsed.entity_id) : parsed.entity_id,
    state: v.parse(StateSchema, JSON.parse(parsed.state)),
  };
};

/**
 * SQLite adapter implementation.
 * This adapter stores one row per entity with its attributes as JSON.
 *
 * JSON keeps only JSON values: a `Date` comes back as its ISO string and
 * `NaN` as `null`. The shared suite sticks to JSON-safe attributes; the
 * in-memory adapter keeps both.
 */
export const createSQLiteAdapter = (db: Database.Database): SQLiteAdapter => {
  // Create entities table
  db.exec(`
    CREATE TABLE IF NOT EXISTS entities (
      entity_name TEXT NOT NULL,
      entity_key TEXT NOT NULL,
      entity_id TEXT NOT NULL,
      id_type TEXT NOT NULL,
      state TEXT NOT NULL,
      PRIMARY KEY (entity_name, entity_key)
    )
  `);

  // Prepare statements
  const upsertStmt = db.prepare(`
    INSERT INTO entities (entity_name, entity_key, entity_id, id_type, state)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT (entity_name, entity_key) DO UPDATE SET state = excluded.state
  `);

  const deleteStmt = db.prepare(`
    DELETE FROM entities WHERE entity_name = ? AND entity_key = ?
  `);

  const selectOneStmt = db.prepare(`
    SELECT * FROM entities WHERE entity_name = ? AND entity_key = ?
  `);

  const selectAllStmt = db.prepare(`
    SELECT * FROM entities WHERE entity_name = ? ORDER BY rowid ASC
  `);

  const adapter = defineAdapter({
    async getEntity({ entityName, entityId }) {
      const row = selectOneStmt.get(entityName, entityKey(entityId));
      return row === undefined ? null : toRecord(row);
    },

    async getEntities({ entityName }) {
      return selectAllStmt.all(entityName).map(toRecord);
    },

    async searchEntities({ entityName, criteria }) {
      const expected = Object.entries(criteria);

      return selectAllStmt
        .all(entityName)
        .map(toRecord)
        .filter((record) => {
          const actual = new Map<string, unknown>(Object.entries(record.state));
          return expected.every(([attribute, value]) =>
            isEqual(actual.get(attribute), value),
          );
        });
    },

    async commitChanges({ changes }) {
      const applyAll = db.transaction(() => {
        for (const change of changes) {
          const key = entityKey(change.entityId);

          if (change.type === "delete") {
            deleteStmt.run(change.entityName, key);
            continue;
          }

          upsertStmt.run(
            change.entityName,
            key,
            String(change.entityId),
            typeof change.entityId,
            JSON.stringify(change.state),
          );
        }
      });

      applyAll();
    },
  });

  return {
    ...adapter,
    /**
     * Utility method to clear all entities (useful for test cleanup).
     */
    async clear(): Promise<void> {
      db.exec("DELETE FROM entities");
    },

    /**
     * Utility method to count stored rows (useful for debugging tests).
     */
    async count(): Promise<number> {
      const result = db.prepare("SELECT COUNT(*) AS count FROM entities").get();
      return v.parse(CountSchema, result).count;
    },

    /**
     * Close the database connection (useful for cleanup).
     */
    async close(): Promise<void> {
      db.close();
    },
  };
};

export type SQLiteAdapter = Adapter & {
  clear(): Promise<void>;
  count(): Promise<number>;
  close(): Promise<void>;
};
