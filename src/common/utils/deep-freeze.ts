/** Freezes an object graph in place. Dates keep their internal time slot mutable. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  if (value instanceof Date || value instanceof RegExp) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return value;
}
