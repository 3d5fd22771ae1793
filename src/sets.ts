/**
 * Order-preserving set operations over plain arrays.
 * Elements are compared by value (`Array.prototype.includes`).
 */

/** True when `item` equals some element of `set`. */
export function contains<T>(set: ReadonlyArray<T>, item: T): boolean {
  return set.includes(item);
}

/** Elements of `a` that are not in `b`, in `a`'s order. */
export function difference<T>(a: ReadonlyArray<T>, b: ReadonlyArray<T>): T[] {
  return a.filter((item) => !contains(b, item));
}

/**
 * Every element of `a`, followed by the elements of `b` not already in the
 * result. `a` itself is copied as-is, so `union(a, [])` equals `a`.
 * Elements of `b` are checked against the result built so far rather than
 * against `b`, so an element of `b` already in `a` is not appended again.
 */
export function union<T>(a: ReadonlyArray<T>, b: ReadonlyArray<T>): T[] {
  const result = [...a];
  for (const item of b) {
    if (!contains(result, item)) {
      result.push(item);
    }
  }
  return result;
}
