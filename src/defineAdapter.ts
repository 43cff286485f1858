import type { Adapter } from "./types";

/**
 * Defines an adapter implementation for repositories.
 *
 * @param adapter - The adapter implementation
 * @returns The same adapter instance with type validation
 *
 * @remarks
 * This function provides type safety for adapter implementations. It ensures
 * that custom storage backends properly implement the required interface.
 *
 * ## Implementation Examples
 *
 * ### SQLite Adapter
 * ```typescript
 * const createSQLiteAdapter = (db: Database.Database) => {
 *   db.exec(`CREATE TABLE IF NOT EXISTS entities (...)`);
 *
 *   return defineAdapter({
 *     async getEntity({ entityName, entityId }) {
 *       const row = db.prepare("SELECT ...").get(entityName, entityKey(entityId));
 *       return row ? toRecord(row) : null;
 *     },
 *
 *     async commitChanges({ changes }) {
 *       db.transaction(() => {
 *         for (const change of changes) {
 *           // upsert or delete
 *         }
 *       })();
 *     },
 *
 *     // ...
 *   });
 * };
 * ```
 *
 * @see {@link createInMemoryAdapter} for the reference implementation
 */
export function defineAdapter<$$Adapter extends Adapter>(
  adapter: $$Adapter,
): $$Adapter {
  return adapter;
}
