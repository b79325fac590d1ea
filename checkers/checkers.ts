import { type Checker, type Failure, fail, missingExpected } from "./checker.ts";
import { deepEqual, isTypedArray } from "./deep-equal.ts";
import { show, typed, typeName } from "./format.ts";
import { checkMatch, notAPattern } from "./match.ts";

/**
 * Holds when the obtained value is `null` or `undefined`.
 */
export const IsNil: Checker = {
  name: "IsNil",
  check(obtained) {
    if (obtained === null || obtained === undefined) {
      return undefined;
    }
    return fail("obtained value is non-nil");
  },
};

/**
 * Scalar equality for booleans, strings, numbers and bigints. Both values
 * must have the same runtime type; a number never equals a bigint.
 */
export const Equals: Checker = {
  name: "Equals",
  check(obtained, ...extras) {
    if (extras.length === 0) {
      return missingExpected;
    }
    let [expected] = extras;
    if (typeName(obtained) !== typeName(expected)) {
      return fail(
        `obtained type ${typeName(obtained)} does not match expected type ${
          typeName(expected)
        }`,
      );
    }
    switch (typeof obtained) {
      case "boolean":
      case "string":
      case "number":
      case "bigint":
        if (obtained === expected) {
          return undefined;
        }
        break;
      default:
        return fail(`Equals checker does not support type ${typeName(obtained)}`);
    }
    return fail(
      `expected ${typeName(expected)} value ${show(expected)}, got ${
        show(obtained)
      }`,
    );
  },
};

/**
 * Structural equality, see {@link deepEqual}.
 */
export const DeepEquals: Checker = {
  name: "DeepEquals",
  check(obtained, ...extras) {
    if (extras.length === 0) {
      return missingExpected;
    }
    let result = deepEqual(obtained, extras[0]);
    return result.equal ? undefined : result.mismatch;
  },
};

export const IsTrue: Checker = {
  name: "IsTrue",
  check(obtained) {
    return checkBoolean("IsTrue", obtained, true);
  },
};

export const IsFalse: Checker = {
  name: "IsFalse",
  check(obtained) {
    return checkBoolean("IsFalse", obtained, false);
  },
};

/**
 * Holds when an array, typed array, map, set or string has the expected
 * length. Strings are measured in UTF-16 code units.
 */
export const HasLen: Checker = {
  name: "HasLen",
  check(obtained, ...extras) {
    if (extras.length === 0) {
      return missingExpected;
    }
    let [size] = extras;
    if (
      !(typeof size === "bigint" ||
        (typeof size === "number" && Number.isInteger(size)))
    ) {
      return fail(`expected length must be an integer, got ${typed(size)}`);
    }
    let length = lengthOf(obtained);
    if (length === undefined) {
      return fail(
        `HasLen checker expected array, map, set, string or typed array, obtained was type ${
          typeName(obtained)
        }`,
      );
    }
    if (BigInt(length) !== BigInt(size)) {
      return fail(`expected length ${size}, obtained ${length}`);
    }
    return undefined;
  },
};

/**
 * Matches a string, or the text of a value with its own `toString()`,
 * against a regular expression. The pattern must match the whole text.
 */
export const Matches: Checker = {
  name: "Matches",
  check(obtained, ...extras) {
    if (extras.length === 0) {
      return missingExpected;
    }
    let [pattern] = extras;
    if (typeof pattern !== "string") {
      return notAPattern;
    }
    let text = textOf(obtained);
    if (text === undefined) {
      return fail(
        `${typed(obtained)} is neither a string nor has a 'toString(): string' method`,
      );
    }
    return checkMatch(text, pattern);
  },
};

/**
 * Calls a function that takes no arguments and holds when it throws a
 * string or an `Error` whose message matches the expected pattern. Only
 * synchronous throws count; a function that returns a promise fails.
 */
export const PanicMatches: Checker = {
  name: "PanicMatches",
  check(obtained, ...extras) {
    if (extras.length === 0) {
      return missingExpected;
    }
    let [pattern] = extras;
    if (typeof pattern !== "string") {
      return notAPattern;
    }
    if (typeof obtained !== "function" || obtained.length !== 0) {
      return fail("first arg must be a function that takes no args");
    }
    let result: unknown;
    try {
      result = obtained();
    } catch (thrown) {
      return recovered(thrown, pattern);
    }
    if (isThenable(result)) {
      // reported by the failure below
      Promise.resolve(result).catch(() => {});
      return fail(
        "function returned a Promise; PanicMatches needs a function that throws synchronously",
      );
    }
    return fail("no panic");
  },
};

function recovered(thrown: unknown, pattern: string): Failure | undefined {
  if (thrown instanceof Error) {
    return checkMatch(thrown.message, pattern);
  }
  if (typeof thrown === "string") {
    return checkMatch(thrown, pattern);
  }
  return fail(
    `recovered panic value ${typed(thrown)} is not a string nor an error`,
  );
}

function checkBoolean(
  name: string,
  obtained: unknown,
  polarity: boolean,
): Failure | undefined {
  if (typeof obtained !== "boolean") {
    return fail(
      `${name} checker expected boolean, obtained was type ${typeName(obtained)}`,
    );
  }
  if (obtained === polarity) {
    return undefined;
  }
  return fail(`obtained value is ${obtained}`);
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value &&
    typeof value.then === "function";
}

function lengthOf(value: unknown): number | undefined {
  if (typeof value === "string" || Array.isArray(value)) {
    return value.length;
  }
  if (isTypedArray(value)) {
    return value.length;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size;
  }
  return undefined;
}

const builtinToString = new Set<unknown>([
  Object.prototype.toString,
  Array.prototype.toString,
  Function.prototype.toString,
]);

function textOf(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (
    typeof value === "object" && value !== null &&
    typeof value.toString === "function" &&
    !builtinToString.has(value.toString)
  ) {
    let text: unknown = value.toString();
    return typeof text === "string" ? text : undefined;
  }
  return undefined;
}
