import process from "node:process";
import type { TestContext } from "node:test";
import { call, run, useScope } from "effection";
import { readConfig, type SuiteOptions } from "./config.ts";
import { FailNow, runTest, TestFailure, type TestHandle } from "./handle.ts";
import { runSuite } from "./suite.ts";

export interface NodeTestHandle extends TestHandle {
  /**
   * Throw a {@link TestFailure} carrying every reported failure, if there
   * were any, so that node:test marks the test failed.
   */
  verdict(): void;
}

/**
 * Adapt a node:test context. node:test has no way to fail a test and keep
 * going, so failures are collected and raised by `verdict()` once the
 * test body is done. Subtests are node:test subtests.
 */
export function createNodeHandle(context: TestContext): NodeTestHandle {
  let failures: string[] = [];
  let aborted = false;
  let subtestFailed = false;

  let handle: NodeTestHandle = {
    name: context.name,
    get failed() {
      return failures.length > 0 || aborted || subtestFailed;
    },
    error(message) {
      failures.push(message);
    },
    fatal(message) {
      handle.error(message);
      return handle.failNow();
    },
    failNow() {
      aborted = true;
      throw new FailNow(context.name);
    },
    *run(name, body) {
      let scope = yield* useScope();
      let passed = false;
      yield* call(() =>
        context.test(name, async (sub) => {
          let child = createNodeHandle(sub);
          passed = await scope.run(() => runTest(child, body));
          child.verdict();
        })
      );
      if (!passed) {
        subtestFailed = true;
      }
      return passed;
    },
    verdict() {
      if (failures.length > 0 || aborted) {
        throw new TestFailure(
          context.name,
          failures.length > 0 ? failures : ["test was aborted"],
        );
      }
    },
  };

  return handle;
}

/**
 * Run a suite as the node:test test `context`, with every test method as
 * a subtest. `ASSAY_RUN` and `ASSAY_VERBOSE` in the environment fill in
 * options that are not given.
 *
 * @example
 * ```ts
 * import { test } from "node:test";
 *
 * test("StackSuite", (t) => testSuite(t, new StackSuite()));
 * ```
 */
export async function testSuite(
  context: TestContext,
  suite: object,
  options: SuiteOptions = {},
): Promise<void> {
  let config = readConfig(process.env, options);
  let t = createNodeHandle(context);
  await run(() => runTest(t, (t) => runSuite(t, suite, config)));
  t.verdict();
}
