// Key name rewriting: store convention (snake_case, any case) to the
// application convention (lower-case words joined by hyphens).

const kebabKeyCache = new Map<string, string>();

function isLowerCase(char: string): boolean {
  return char !== char.toUpperCase() && char === char.toLowerCase();
}

function isUpperCase(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

function computeKebabKey(key: string): string {
  let split = '';
  for (const char of key) {
    const last = split.at(-1);
    if (last !== undefined && isLowerCase(last) && isUpperCase(char)) {
      split += `-${char}`;
    } else {
      split += char;
    }
  }
  return split.replace(/[\s_]+/g, '-').toLowerCase();
}

/**
 * Rewrite a single key, e.g. `support_issue_id` or `supportIssueId` to
 * `support-issue-id`.
 *
 * Results are memoized for the life of the process. The key vocabulary is
 * fixed by the schema, so the cache never needs eviction.
 */
export function toKebabKey(key: string): string {
  const cached = kebabKeyCache.get(key);
  if (cached !== undefined) {
    return cached;
  }
  const kebab = computeKebabKey(key);
  kebabKeyCache.set(key, kebab);
  return kebab;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Rewrite the keys of one mapping and, recursively, of every mapping
 * nested in its values.
 */
export function transformRecordKeys(
  record: Record<string, unknown>,
  transform: (key: string) => string = toKebabKey
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[transform(key)] = transformKeys(value, transform);
  }
  return result;
}

/**
 * Deep-walk a value and rewrite every mapping key with `transform`.
 *
 * Only plain objects are treated as mappings. Arrays are walked element by
 * element; dates, buffers and scalars come back as they went in.
 */
export function transformKeys(
  value: unknown,
  transform: (key: string) => string = toKebabKey
): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => transformKeys(item, transform));
  }
  if (isPlainObject(value)) {
    return transformRecordKeys(value, transform);
  }
  return value;
}
