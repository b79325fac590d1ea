/**
 * Why a check did not hold. Checkers hand failures back as values, they
 * never throw them.
 */
export interface Failure {
  readonly message: string;
}

/**
 * A stateless comparison between an obtained value and, for most
 * checkers, an expected value.
 */
export interface Checker {
  /**
   * Used to label reported failures, e.g. `Equals`.
   */
  readonly name: string;

  /**
   * Compare `obtained` against the expectation. When the checker needs an
   * expected value, it is the first of `extras`; the rest are ignored.
   *
   * @returns `undefined` when the check holds, the failure otherwise.
   */
  check(obtained: unknown, ...extras: unknown[]): Failure | undefined;
}

export function fail(message: string): Failure {
  return { message };
}

export const missingExpected: Failure = fail("missing 'expected' value");
