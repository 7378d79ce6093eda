// Order-preserving set helpers over plain arrays

/**
 * Drop repeated values, keeping the first occurrence of each.
 * Values are compared by `key`, so structured values compare by content.
 */
export function distinct<T>(values: readonly T[], key: (value: T) => unknown = (value) => value): T[] {
  const seen = new Set<unknown>();
  const result: T[] = [];
  for (const value of values) {
    const k = key(value);
    if (!seen.has(k)) {
      seen.add(k);
      result.push(value);
    }
  }
  return result;
}

/**
 * Values of `from` that are not in `without`, in `from` order.
 */
export function difference<T>(from: readonly T[], without: readonly T[]): T[] {
  const excluded = new Set(without);
  return from.filter((value) => !excluded.has(value));
}
