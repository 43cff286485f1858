/**
 * Structural equality for attribute values.
 *
 * Handles primitives (`NaN` equals `NaN`), `Date` by timestamp, arrays
 * element-wise and objects key-wise. Key order is irrelevant; a missing key
 * differs from a key set to `undefined`.
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Number.isNaN(a) && Number.isNaN(b)) return true;
  if (a === null || b === null) return false;
  if (typeof a !== "object" || typeof b !== "object") return false;

  if (a instanceof Date || b instanceof Date) {
    return (
      a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
    );
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    return a.every((item, i) => isEqual(item, b[i]));
  }

  const aEntries = Object.entries(a);
  const bEntries = new Map<string, unknown>(Object.entries(b));

  if (aEntries.length !== bEntries.size) return false;

  return aEntries.every(
    ([key, value]) => bEntries.has(key) && isEqual(value, bEntries.get(key)),
  );
}
