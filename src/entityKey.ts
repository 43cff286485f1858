import type { EntityId } from "./types";

/**
 * Map key for an identifier. Keeps `1` and `"1"` apart.
 */
export function entityKey(entityId: EntityId): string {
  return typeof entityId === "number" ? `n:${entityId}` : `s:${entityId}`;
}
