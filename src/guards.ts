/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript type guard
 * (`value is T[]`). `T` is not validated at runtime.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Checks that the value is a non-null object so properties can be read
 * without type assertions. Arrays pass; pair with {@link isArray} to exclude
 * them.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
