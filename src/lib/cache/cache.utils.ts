/**
 * Cache Utilities
 */

/**
 * Freeze arrays and plain objects recursively so a cached value cannot be
 * changed by a reader. Dates and class instances are left as they are.
 */
export function freezeValue<T>(value: T): T {
  if (Array.isArray(value)) {
    for (const item of value) {
      freezeValue(item);
    }
    Object.freeze(value);
    return value;
  }

  if (typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype) {
    for (const item of Object.values(value)) {
      freezeValue(item);
    }
    Object.freeze(value);
    return value;
  }

  return value;
}

/**
 * Copy of a cached value for one reader. Freezing cannot stop `Date#setTime`,
 * so every read gets its own Dates.
 */
export function snapshotValue<T>(value: T): T {
  return freezeValue(structuredClone(value));
}
