import { format, type Plugin } from "pretty-format";

/**
 * The runtime type name of a value as it appears in failure messages:
 * `typeof` for primitives and functions, `null` for null, and the
 * constructor name for objects (`Object` when there is none).
 */
export function typeName(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value !== "object") {
    return typeof value;
  }
  let prototype: object | null = Object.getPrototypeOf(value);
  if (prototype === null) {
    return "Object";
  }
  let constructor: unknown = prototype.constructor;
  if (typeof constructor === "function" && constructor.name !== "") {
    return constructor.name;
  }
  return "Object";
}

// pretty-format leaves newlines and control characters in strings as they are
const escapedString: Plugin = {
  test: (value: unknown) => typeof value === "string",
  serialize: (value: unknown) => JSON.stringify(String(value)),
};

/**
 * Renders a value the way it would be written as a literal, always on one
 * line: strings are quoted with control characters escaped, bigints carry
 * their `n` suffix and objects print their contents inline.
 */
export function describe(value: unknown): string {
  return format(value, { min: true, plugins: [escapedString] });
}

/**
 * Renders a scalar without any quoting, e.g. `something` for the string
 * "something" and `10` for `10n`.
 */
export function show(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return describe(value);
  }
  return String(value);
}

/**
 * `{type}({literal})`, as used when a value has the wrong shape for a
 * checker.
 */
export function typed(value: unknown): string {
  return `${typeName(value)}(${describe(value)})`;
}
