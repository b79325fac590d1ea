import type { Operation } from "effection";
import { typeName } from "@assay/checkers";
import type { SuiteOptions } from "./config.ts";
import { FailNow, runTest, type TestHandle } from "./handle.ts";
import { loggerApi } from "./logger.ts";
import { runSuite } from "./suite.ts";

/**
 * What happened to one test run by a recording handle.
 */
export interface TestRecord {
  name: string;
  failed: boolean;
  aborted: boolean;
  messages: string[];
  subtests: TestRecord[];
}

export interface RecordingHandle extends TestHandle {
  readonly record: TestRecord;
}

/**
 * An in-process host that records failures, aborts and subtests instead
 * of reporting them. Subtests run one after another and a failed subtest
 * fails its parent.
 */
export function createRecordingHandle(name: string): RecordingHandle {
  let record: TestRecord = {
    name,
    failed: false,
    aborted: false,
    messages: [],
    subtests: [],
  };

  let handle: RecordingHandle = {
    name,
    record,
    get failed() {
      return record.failed;
    },
    error(message) {
      record.failed = true;
      record.messages.push(message);
    },
    fatal(message) {
      handle.error(message);
      return handle.failNow();
    },
    failNow() {
      record.failed = true;
      record.aborted = true;
      throw new FailNow(name);
    },
    *run(subtest, body) {
      let child = createRecordingHandle(subtest);
      record.subtests.push(child.record);
      let passed = yield* runTest(child, body);
      if (!passed) {
        record.failed = true;
      }
      return passed;
    },
  };

  return handle;
}

/**
 * Run `suite` against a recording handle named after its type.
 */
export function* recordSuite(
  suite: object,
  options?: SuiteOptions,
): Operation<TestRecord> {
  let t = createRecordingHandle(typeName(suite));
  yield* runTest(t, (t) => runSuite(t, suite, options));
  return t.record;
}

export interface LogEvent {
  level: "debug" | "error";
  message: string;
  args: unknown[];
}

/**
 * Capture log output for the rest of the current scope instead of
 * printing it.
 */
export function* captureLogs(): Operation<LogEvent[]> {
  let events: LogEvent[] = [];
  yield* loggerApi.around({
    *debug([message, ...args]) {
      events.push({ level: "debug", message, args });
    },
    *error([message, ...args]) {
      events.push({ level: "error", message, args });
    },
  });
  return events;
}
