/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 *
 * Using this instead of `Array.isArray` directly keeps `unknown` inputs from
 * widening to `any[]` at the narrowing site.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Checks whether a value is a `Map` instance.
 *
 * Same rationale as {@link isArray}: `instanceof Map` narrows to
 * `Map<any, any>`, this guard narrows to `Map<unknown, unknown>`.
 */
export function isMap(value: unknown): value is Map<unknown, unknown> {
  return value instanceof Map;
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read and
 * written without runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / `new Object()`), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * As a result, this returns `false` for arrays, Maps, Sets, Dates and class
 * instances.
 *
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}
