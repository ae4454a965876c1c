/**
 * Recursively freeze a value in place. Typed arrays and buffers cannot be
 * frozen and are left as they are.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value) && !ArrayBuffer.isView(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Deep-frozen structured clone; the caller keeps ownership of the original.
 * Throws a DataCloneError for functions and other uncloneable values.
 */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
