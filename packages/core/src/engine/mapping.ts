/** Objects accepted as key→value input: plain objects and `Map`s. */
export function isPlainMapping(value: unknown): value is Record<string, unknown> | Map<unknown, unknown> {
  if (value instanceof Map) return true;
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function toEntries(value: Record<string, unknown> | Map<unknown, unknown>): [string, unknown][] {
  if (value instanceof Map) {
    return [...value.entries()].map(([key, element]): [string, unknown] => [String(key), element]);
  }
  return Object.entries(value);
}

export function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

/**
 * Defines an own enumerable property. Plain assignment would treat a
 * `__proto__` key as a prototype change.
 */
export function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
