/**
 * modules/common/src/core/canonical.ts
 *
 * @file Canonical JSON text for plain data trees. Object keys are sorted and `undefined` members are skipped, so
 * two structurally equal values always produce the same string.
 */

/**
 * Serialize a plain data value (objects, arrays, strings, finite numbers, booleans, null) canonically.
 *
 * @param value - The value to serialize.
 * @returns The canonical JSON text.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalJson(item)).join(',')}]`;
  }
  const members = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);
  return `{${members.join(',')}}`;
}
