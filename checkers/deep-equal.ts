import type { Failure } from "./checker.ts";
import { describe, typeName } from "./format.ts";

/**
 * The first place two values differ.
 */
export interface Mismatch extends Failure {
  /**
   * Accessor chain from the root of the comparison, e.g. `.user["tags"][2]`,
   * or `top level` when the roots themselves differ.
   */
  readonly path: string;
  readonly obtained: unknown;
  readonly expected: unknown;
}

export type DeepEqualResult =
  | { equal: true }
  | { equal: false; mismatch: Mismatch };

type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

export function isTypedArray(value: unknown): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Structural comparison. Plain objects and maps are compared key by key,
 * arrays and typed arrays index by index, sets by membership, and class
 * instances field by field once their prototypes agree, including
 * enumerable symbol keys. Primitive wrappers compare by the value they
 * wrap. Everything else is compared with `===`, except that `NaN` equals
 * `NaN`.
 */
export function deepEqual(
  obtained: unknown,
  expected: unknown,
): DeepEqualResult {
  let mismatch = compare([], obtained, expected, new Map());
  return mismatch ? { equal: false, mismatch } : { equal: true };
}

type Visited = Map<object, Set<object>>;

function compare(
  path: string[],
  obtained: unknown,
  expected: unknown,
  visited: Visited,
): Mismatch | undefined {
  if (obtained === expected) {
    return undefined;
  }
  if (Number.isNaN(obtained) && Number.isNaN(expected)) {
    return undefined;
  }

  let obtainedType = typeName(obtained);
  let expectedType = typeName(expected);
  if (
    obtainedType !== expectedType ||
    (isObject(obtained) && isObject(expected) &&
      Object.getPrototypeOf(obtained) !== Object.getPrototypeOf(expected))
  ) {
    return mismatch(
      path,
      `type mismatch ${obtainedType} vs ${expectedType}`,
      obtained,
      expected,
    );
  }

  if (!isObject(obtained) || !isObject(expected)) {
    return mismatch(path, "unequal", obtained, expected);
  }

  let seen = visited.get(obtained);
  if (seen?.has(expected)) {
    return undefined;
  }
  visited.set(obtained, (seen ?? new Set()).add(expected));

  if (Array.isArray(obtained) && Array.isArray(expected)) {
    return compareIndexed(path, obtained, expected, visited);
  }
  if (isTypedArray(obtained) && isTypedArray(expected)) {
    return compareIndexed(path, obtained, expected, visited);
  }
  if (obtained instanceof Date && expected instanceof Date) {
    return obtained.getTime() === expected.getTime() ||
        (Number.isNaN(obtained.getTime()) && Number.isNaN(expected.getTime()))
      ? undefined
      : mismatch(path, "unequal", obtained, expected);
  }
  if (obtained instanceof RegExp && expected instanceof RegExp) {
    return String(obtained) === String(expected)
      ? undefined
      : mismatch(path, "unequal", obtained, expected);
  }
  if (obtained instanceof Map && expected instanceof Map) {
    return compareMaps(path, obtained, expected, visited);
  }
  if (obtained instanceof Set && expected instanceof Set) {
    return compareSets(path, obtained, expected, visited);
  }
  if (isBoxed(obtained) && isBoxed(expected)) {
    return compare(path, obtained.valueOf(), expected.valueOf(), visited);
  }
  if (obtained instanceof Error && expected instanceof Error) {
    let message = compare(
      [...path, ".message"],
      obtained.message,
      expected.message,
      visited,
    );
    if (message) {
      return message;
    }
  }
  return compareFields(path, obtained, expected, visited);
}

function compareIndexed(
  path: string[],
  obtained: ArrayLike<unknown>,
  expected: ArrayLike<unknown>,
  visited: Visited,
): Mismatch | undefined {
  if (obtained.length !== expected.length) {
    return mismatch(
      path,
      `length mismatch, ${obtained.length} vs ${expected.length}`,
      obtained,
      expected,
    );
  }
  for (let i = 0; i < obtained.length; i++) {
    let found = compare([...path, `[${i}]`], obtained[i], expected[i], visited);
    if (found) {
      return found;
    }
  }
  return undefined;
}

function compareMaps(
  path: string[],
  obtained: Map<unknown, unknown>,
  expected: Map<unknown, unknown>,
  visited: Visited,
): Mismatch | undefined {
  if (obtained.size !== expected.size) {
    return mismatch(
      path,
      `length mismatch, ${obtained.size} vs ${expected.size}`,
      obtained,
      expected,
    );
  }
  for (let [key, value] of obtained) {
    let keyPath = [...path, `[${describe(key)}]`];
    if (!expected.has(key)) {
      return mismatch(keyPath, "missing from expected", value, undefined);
    }
    let found = compare(keyPath, value, expected.get(key), visited);
    if (found) {
      return found;
    }
  }
  return undefined;
}

function compareSets(
  path: string[],
  obtained: Set<unknown>,
  expected: Set<unknown>,
  visited: Visited,
): Mismatch | undefined {
  if (obtained.size !== expected.size) {
    return mismatch(
      path,
      `length mismatch, ${obtained.size} vs ${expected.size}`,
      obtained,
      expected,
    );
  }
  for (let element of obtained) {
    if (expected.has(element)) {
      continue;
    }
    let candidates = [...expected];
    if (!candidates.some((other) => !compare([], element, other, new Map()))) {
      return mismatch(
        path,
        `element ${describe(element)} missing from expected`,
        obtained,
        expected,
      );
    }
  }
  return undefined;
}

function compareFields(
  path: string[],
  obtained: object,
  expected: object,
  visited: Visited,
): Mismatch | undefined {
  let plain = isPlain(obtained);
  let segment = (key: string | symbol) =>
    typeof key === "symbol"
      ? `[${String(key)}]`
      : plain
      ? `[${describe(key)}]`
      : `.${key}`;
  let expectedKeys = new Set(enumerableKeys(expected));

  for (let key of enumerableKeys(obtained)) {
    let value: unknown = Reflect.get(obtained, key);
    if (!expectedKeys.has(key)) {
      return mismatch(
        [...path, segment(key)],
        "missing from expected",
        value,
        undefined,
      );
    }
    expectedKeys.delete(key);
    let found = compare(
      [...path, segment(key)],
      value,
      Reflect.get(expected, key),
      visited,
    );
    if (found) {
      return found;
    }
  }
  let [missing] = expectedKeys;
  if (missing !== undefined) {
    return mismatch(
      [...path, segment(missing)],
      "missing from obtained",
      undefined,
      Reflect.get(expected, missing),
    );
  }
  return undefined;
}

function enumerableKeys(value: object): (string | symbol)[] {
  let symbols = Object.getOwnPropertySymbols(value).filter((symbol) =>
    Object.prototype.propertyIsEnumerable.call(value, symbol)
  );
  return [...Object.keys(value), ...symbols];
}

/**
 * Primitive wrappers such as `new Number(1)`, which hold their value in
 * an internal slot rather than a field.
 */
function isBoxed(
  value: object,
): value is Number | Boolean | String | BigInt | Symbol {
  return value instanceof Number || value instanceof Boolean ||
    value instanceof String || value instanceof BigInt ||
    value instanceof Symbol;
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function isPlain(value: object): boolean {
  let prototype: object | null = Object.getPrototypeOf(value);
  return prototype === null || prototype === Object.prototype;
}

function mismatch(
  path: string[],
  how: string,
  obtained: unknown,
  expected: unknown,
): Mismatch {
  let at = path.length === 0 ? "top level" : path.join("");
  return {
    path: at,
    obtained,
    expected,
    message: `mismatch at ${at}: ${how}; obtained ${describe(obtained)}; expected ${
      describe(expected)
    }`,
  };
}
