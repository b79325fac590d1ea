import type { Checker } from "@assay/checkers";
import type { TestHandle } from "./handle.ts";

/**
 * Assertions bound to a running test. A suite either extends `Test` or
 * holds one in a field; `runSuite()` finds it and points it at the test
 * that is currently running.
 *
 * @example
 * ```ts
 * class ParserSuite extends Test {
 *   TestEmptyInput() {
 *     this.assert(parse(""), HasLen, 0);
 *   }
 * }
 * ```
 */
export class Test {
  handle?: TestHandle;

  constructor(handle?: TestHandle) {
    this.handle = handle;
  }

  get t(): TestHandle {
    if (!this.handle) {
      throw new Error(
        "Test handle has not been initialized; pass a handle to the constructor or run the suite with runSuite()",
      );
    }
    return this.handle;
  }

  /**
   * Report a failure if `checker` does not hold. The test continues.
   *
   * @returns true if the check held
   */
  check(obtained: unknown, checker: Checker, ...extras: unknown[]): boolean {
    let failure = checker.check(obtained, ...extras);
    if (failure) {
      this.t.error(`${checker.name}: ${failure.message}`);
      return false;
    }
    return true;
  }

  /**
   * Like {@link check}, but a failure ends the test on the spot.
   */
  assert(obtained: unknown, checker: Checker, ...extras: unknown[]): void {
    if (!this.check(obtained, checker, ...extras)) {
      this.t.failNow();
    }
  }
}
