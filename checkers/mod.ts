export * from "./checker.ts";
export * from "./checkers.ts";
export { type DeepEqualResult, deepEqual, type Mismatch } from "./deep-equal.ts";
export { describe, typeName } from "./format.ts";
export { anchor } from "./match.ts";
