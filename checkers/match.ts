import { type Failure, fail } from "./checker.ts";
import { describe } from "./format.ts";

export const notAPattern: Failure = fail(
  "expected value must be a string containing a regexp pattern",
);

/**
 * Adds the `^` and `$` anchors a pattern is missing so that it can only
 * match a whole string.
 */
export function anchor(pattern: string): string {
  let anchored = pattern.startsWith("^") ? pattern : `^${pattern}`;
  return anchored.endsWith("$") ? anchored : `${anchored}$`;
}

export function checkMatch(
  obtained: string,
  pattern: string,
): Failure | undefined {
  let anchored = anchor(pattern);
  let regexp: RegExp;
  try {
    regexp = new RegExp(anchored);
  } catch (error) {
    let reason = error instanceof Error ? error.message : String(error);
    return fail(`unable to compile regexp: ${reason}`);
  }
  if (regexp.test(obtained)) {
    return undefined;
  }
  return fail(
    `${describe(obtained)} did not match pattern ${describe(anchored)}`,
  );
}
