import { describe, it } from "node:test";
import { expect } from "expect";
import { type Operation, run, sleep } from "effection";
import { Equals, HasLen, IsTrue } from "@assay/checkers";
import type { SuiteOptions } from "./config.ts";
import { injectHandle } from "./suite.ts";
import { Test } from "./test.ts";
import {
  captureLogs,
  createRecordingHandle,
  recordSuite,
  type TestRecord,
} from "./testing.ts";

function record(suite: object, options?: SuiteOptions): Promise<TestRecord> {
  return run(function* () {
    yield* captureLogs();
    return yield* recordSuite(suite, options);
  });
}

function passed(name: string): TestRecord {
  return { name, failed: false, aborted: false, messages: [], subtests: [] };
}

class EmbeddedSuite extends Test {
  calls: string[] = [];

  SetUpTest() {
    this.calls.push("setup");
  }

  TestAlpha() {
    this.calls.push("alpha");
    this.check(1, Equals, 1);
  }

  TestBeta() {
    this.calls.push("beta");
  }

  Testlower() {
    this.calls.push("lower");
  }

  helper() {
    this.calls.push("helper");
  }
}

class FailingSuite extends Test {
  reached: string[] = [];

  TestContinues() {
    this.check(1, Equals, 2);
    this.reached.push("continues");
  }

  TestAborts() {
    this.assert("a", Equals, "b");
    this.reached.push("aborts");
  }

  TestPasses() {
    this.reached.push("passes");
  }
}

describe("runSuite", () => {
  it("runs setup before every test method, in name order", async () => {
    let suite = new EmbeddedSuite();
    expect(await record(suite)).toEqual({
      ...passed("EmbeddedSuite"),
      subtests: [passed("Alpha"), passed("Beta")],
    });
    expect(suite.calls).toEqual(["setup", "alpha", "setup", "beta"]);
  });

  it("reports failures in the subtest that made them", async () => {
    let suite = new FailingSuite();
    expect(await record(suite)).toEqual({
      name: "FailingSuite",
      failed: true,
      aborted: false,
      messages: [],
      subtests: [
        {
          name: "Aborts",
          failed: true,
          aborted: true,
          messages: ["Equals: expected string value b, got a"],
          subtests: [],
        },
        {
          name: "Continues",
          failed: true,
          aborted: false,
          messages: ["Equals: expected number value 2, got 1"],
          subtests: [],
        },
        passed("Passes"),
      ],
    });
    expect(suite.reached).toEqual(["continues", "passes"]);
  });

  it("fails only the subtest of a test method that takes arguments", async () => {
    class AritySuite extends Test {
      ran: string[] = [];

      TestFoo(x: number) {
        this.ran.push(`foo ${x}`);
      }

      TestBar() {
        this.ran.push("bar");
      }
    }

    let suite = new AritySuite();
    let result = await record(suite);
    expect(result.subtests).toEqual([
      passed("Bar"),
      {
        name: "Foo",
        failed: true,
        aborted: true,
        messages: [`Test method "TestFoo" takes 1 args, should take none`],
        subtests: [],
      },
    ]);
    expect(suite.ran).toEqual(["bar"]);
  });

  it("fails a test method that returns a value", async () => {
    class ReturningSuite extends Test {
      TestValue() {
        return 42;
      }

      async TestAsync() {}
    }

    let result = await record(new ReturningSuite());
    expect(result.subtests.map((subtest) => subtest.messages)).toEqual([
      [`Test method "TestAsync" returns a Promise, should return none`],
      [`Test method "TestValue" returns a value, should return none`],
    ]);
  });

  it("runs generator methods as operations", async () => {
    class OperationSuite extends Test {
      steps: string[] = [];

      *SetUpTest(): Operation<void> {
        yield* sleep(1);
        this.steps.push("setup");
      }

      *TestSleeps(): Operation<void> {
        yield* sleep(1);
        this.steps.push("slept");
        this.check(this.steps, HasLen, 2);
      }
    }

    let suite = new OperationSuite();
    expect(await record(suite)).toEqual({
      ...passed("OperationSuite"),
      subtests: [passed("Sleeps")],
    });
    expect(suite.steps).toEqual(["setup", "slept"]);
  });

  it("rejects a SetUpTest that takes arguments", async () => {
    class BadSetupSuite extends Test {
      ran = false;

      SetUpTest(_: number) {}

      TestNever() {
        this.ran = true;
      }
    }

    let suite = new BadSetupSuite();
    expect(await record(suite)).toEqual({
      name: "BadSetupSuite",
      failed: true,
      aborted: true,
      messages: ["SetUpTest should take no arguments"],
      subtests: [],
    });
    expect(suite.ran).toBe(false);
  });

  it("fails a test method that rejects, keeping the rejection inside it", async () => {
    class RejectingSuite extends Test {
      async TestBoom() {
        throw new Error("kaboom");
      }

      TestCalm() {}
    }

    let result = await record(new RejectingSuite());
    expect(result.subtests).toEqual([
      {
        name: "Boom",
        failed: true,
        aborted: true,
        messages: [`Test method "TestBoom" returns a Promise, should return none`],
        subtests: [],
      },
      passed("Calm"),
    ]);
    await new Promise((resolve) => setTimeout(resolve, 10));
  });

  it("fails every subtest of an async SetUpTest", async () => {
    class AsyncSetupSuite extends Test {
      ran = false;

      async SetUpTest() {
        throw new Error("not ready");
      }

      TestNever() {
        this.ran = true;
      }
    }

    let suite = new AsyncSetupSuite();
    let result = await record(suite);
    expect(result.subtests).toEqual([
      {
        name: "Never",
        failed: true,
        aborted: true,
        messages: ["SetUpTest returns a Promise, should return none"],
        subtests: [],
      },
    ]);
    expect(suite.ran).toBe(false);
    await new Promise((resolve) => setTimeout(resolve, 10));
  });

  it("rejects a class passed in place of an instance", async () => {
    let result = await record(EmbeddedSuite);
    expect(result.messages).toEqual([
      "suite must be an instance, not the class EmbeddedSuite",
    ]);
    expect(result.subtests).toEqual([]);
  });

  it("finds a Test held in a field", async () => {
    class NestedSuite {
      test = new Test();

      TestUsesField() {
        this.test.check(true, IsTrue);
      }
    }

    let suite = new NestedSuite();
    expect(await record(suite)).toEqual({
      ...passed("NestedSuite"),
      subtests: [passed("UsesField")],
    });
    expect(suite.test.handle?.name).toEqual("NestedSuite");
  });

  it("finds a Test behind an optional field that is set", async () => {
    class OptionalSuite {
      inner?: { test: Test } = { test: new Test() };

      TestUsesInner() {
        this.inner?.test.check(1, Equals, 1);
      }
    }

    let suite = new OptionalSuite();
    expect(await record(suite)).toEqual({
      ...passed("OptionalSuite"),
      subtests: [passed("UsesInner")],
    });
    expect(suite.inner?.test.handle?.name).toEqual("OptionalSuite");
  });

  it("fails when the field for the Test is absent", async () => {
    class AbsentSuite {
      test?: Test;

      TestNever() {}
    }

    expect(await record(new AbsentSuite())).toEqual({
      name: "AbsentSuite",
      failed: true,
      aborted: true,
      messages: ["unable to initialize the suite handle"],
      subtests: [],
    });
  });

  it("runs only the test methods that match a filter", async () => {
    let suite = new EmbeddedSuite();
    let result = await record(suite, { filter: "^Al" });
    expect(result.subtests).toEqual([passed("Alpha")]);
    expect(suite.calls).toEqual(["setup", "alpha"]);
  });

  it("runs every match of a global filter", async () => {
    class NumberedSuite extends Test {
      TestA1() {}
      TestA2() {}
      TestA3() {}
    }

    let result = await record(new NumberedSuite(), { filter: /A/g });
    expect(result.subtests).toEqual([passed("A1"), passed("A2"), passed("A3")]);
  });

  it("logs discovery when verbose", async () => {
    let messages = await run(function* () {
      let logs = yield* captureLogs();
      yield* recordSuite(new EmbeddedSuite(), { verbose: true });
      return logs.map((event) => `${event.level} ${event.message}`);
    });
    expect(messages).toEqual([
      "debug found SetUpTest on EmbeddedSuite",
      "debug suite type EmbeddedSuite has 2 test methods: TestAlpha, TestBeta",
      "debug running EmbeddedSuite.TestAlpha",
      "debug running EmbeddedSuite.TestBeta",
    ]);
  });

  it("logs misuse of the suite as an error", async () => {
    let messages = await run(function* () {
      let logs = yield* captureLogs();
      yield* recordSuite(EmbeddedSuite, { verbose: false });
      return logs.map((event) => `${event.level} ${event.message}`);
    });
    expect(messages).toEqual([
      "error suite must be an instance, not the class EmbeddedSuite",
    ]);
  });

  it("keeps discovery quiet otherwise", async () => {
    let messages = await run(function* () {
      let logs = yield* captureLogs();
      yield* recordSuite(new EmbeddedSuite(), { verbose: false });
      return logs;
    });
    expect(messages).toEqual([]);
  });
});

describe("injectHandle", () => {
  it("injects into the suite itself when it is a Test", () => {
    let t = createRecordingHandle("t");
    let suite = new EmbeddedSuite();
    expect(injectHandle(t, suite, new Set())).toBe(true);
    expect(suite.handle).toBe(t);
  });

  it("descends into nested objects", () => {
    let t = createRecordingHandle("t");
    let suite = { settings: new Map(), inner: { test: new Test() } };
    expect(injectHandle(t, suite, new Set())).toBe(true);
    expect(suite.inner.test.handle).toBe(t);
  });

  it("stops at the first Test it finds", () => {
    let t = createRecordingHandle("t");
    let suite = { first: new Test(), second: new Test() };
    expect(injectHandle(t, suite, new Set())).toBe(true);
    expect(suite.first.handle).toBe(t);
    expect(suite.second.handle).toBeUndefined();
  });

  it("skips a frozen Test", () => {
    let t = createRecordingHandle("t");
    let suite = { frozen: Object.freeze(new Test()), live: new Test() };
    expect(injectHandle(t, suite, new Set())).toBe(true);
    expect(suite.frozen.handle).toBeUndefined();
    expect(suite.live.handle).toBe(t);
  });

  it("treats an absent field as not found", () => {
    let t = createRecordingHandle("t");
    let suite: { test?: Test } = { test: undefined };
    expect(injectHandle(t, suite, new Set())).toBe(false);
  });

  it("terminates on cycles", () => {
    let t = createRecordingHandle("t");
    let suite: { self?: object } = {};
    suite.self = suite;
    expect(injectHandle(t, suite, new Set())).toBe(false);
  });
});
