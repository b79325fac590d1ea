import type { Operation } from "effection";
import { box } from "./box.ts";

export interface TestBody {
  (t: TestHandle): Operation<void>;
}

/**
 * The part of a host test runner that suites and assertions talk to. One
 * handle exists per running test; subtests get handles of their own.
 */
export interface TestHandle {
  /**
   * The name of the test as the host reports it.
   */
  readonly name: string;

  /**
   * Whether anything has failed this test so far, including its subtests.
   */
  readonly failed: boolean;

  /**
   * Record a failure and let the test continue.
   */
  error(message: string): void;

  /**
   * Record a failure and abort the test immediately.
   */
  fatal(message: string): never;

  /**
   * Mark the test failed and abort it immediately. Any reason has already
   * been reported with `error()`.
   */
  failNow(): never;

  /**
   * Run `body` as a named subtest of this test.
   *
   * @returns true if the subtest passed
   */
  run(name: string, body: TestBody): Operation<boolean>;
}

/**
 * Thrown by {@link TestHandle.failNow} to unwind the body of the test
 * that failed. Hosts catch it at the boundary of that test.
 */
export class FailNow extends Error {
  constructor(readonly test: string) {
    super(`test "${test}" was aborted`);
  }

  override name = "FailNow";
}

/**
 * The error a host raises at the end of a test that recorded failures.
 */
export class TestFailure extends Error {
  constructor(readonly test: string, readonly failures: readonly string[]) {
    super(failures.join("\n"));
  }

  override name = "TestFailure";
}

/**
 * Runs `body` as the test `t`. An abort ends the body without escaping
 * it, and any other error becomes a failure of `t`, so neither reaches
 * sibling or parent tests.
 *
 * @returns true if the test passed
 */
export function* runTest(t: TestHandle, body: TestBody): Operation<boolean> {
  let result = yield* box(() => body(t));
  if (!result.ok && !(result.error instanceof FailNow)) {
    t.error(`${result.error.name}: ${result.error.message}`);
  }
  return !t.failed;
}
