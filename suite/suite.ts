import { call, type Operation } from "effection";
import { typeName } from "@assay/checkers";
import { parseOptions, type SuiteOptions } from "./config.ts";
import type { TestHandle } from "./handle.ts";
import { log, verboseLogging } from "./logger.ts";
import { Test } from "./test.ts";

const testMethodMatch = /^Test([A-Z]\w*)$/;

const SETUP = "SetUpTest";

type Method = (...args: never[]) => unknown;

interface TestMethod {
  name: string;
  short: string;
  method: Method;
}

/**
 * Run every `Test*` method of `suite` as a subtest of `t`.
 *
 * The suite's {@link Test} is found by searching the suite and its fields,
 * and is pointed at each subtest while that subtest runs. If the suite has
 * a `SetUpTest()` method it runs at the start of every subtest. Test
 * methods and `SetUpTest()` may be generator methods, in which case they
 * run as operations.
 *
 * Misuse of the suite (not an instance, no `Test` to inject, a `SetUpTest`
 * that takes arguments) is logged as an error and fails `t` as a whole. A
 * test method that takes arguments or returns a value, or an async
 * `SetUpTest`, fails only the subtest it was running in.
 *
 * @example
 * ```ts
 * class StackSuite extends Test {
 *   stack: number[] = [];
 *
 *   SetUpTest() {
 *     this.stack = [];
 *   }
 *
 *   TestPush() {
 *     this.stack.push(1);
 *     this.assert(this.stack, HasLen, 1);
 *   }
 * }
 *
 * yield* runSuite(t, new StackSuite());
 * ```
 */
export function runSuite(
  t: TestHandle,
  suite: object,
  options: SuiteOptions = {},
): Operation<void> {
  let config = parseOptions(options);

  return call(function* () {
    if (config.verbose !== undefined) {
      yield* verboseLogging(config.verbose);
    }

    function* misuse(message: string): Operation<never> {
      yield* log.error(message);
      return t.fatal(message);
    }

    if (typeof suite === "function") {
      yield* misuse(
        `suite must be an instance, not the class ${suite.name || "(anonymous)"}`,
      );
    }
    if (typeof suite !== "object" || suite === null) {
      yield* misuse(
        `suite must be passed in as an object instance, not ${typeName(suite)}`,
      );
    }

    let type = typeName(suite);

    if (!injectHandle(t, suite, new Set())) {
      yield* misuse("unable to initialize the suite handle");
    }

    let setup = findMethod(suite, SETUP);
    if (setup) {
      yield* log.debug(`found ${SETUP} on ${type}`);
      if (setup.length !== 0) {
        yield* misuse(`${SETUP} should take no arguments`);
      }
    }

    let methods = findTestMethods(suite);
    yield* log.debug(
      `suite type ${type} has ${methods.length} test methods: ${
        methods.map((method) => method.name).join(", ")
      }`,
    );

    for (let { name, short, method } of methods) {
      if (config.filter && !config.filter.test(short)) {
        yield* log.debug(`skipping ${name}: does not match ${config.filter}`);
        continue;
      }

      yield* t.run(short, function* (sub) {
        yield* log.debug(`running ${type}.${name}`);
        if (!injectHandle(sub, suite, new Set())) {
          sub.fatal("unable to initialize the suite handle");
        }
        if (setup) {
          let prepared = yield* invoke(suite, setup);
          if (isThenable(prepared)) {
            abandon(prepared);
            sub.fatal(`${SETUP} returns a Promise, should return none`);
          }
        }
        if (method.length !== 0) {
          sub.fatal(
            `Test method "${name}" takes ${method.length} args, should take none`,
          );
        }
        let result = yield* invoke(suite, method);
        if (isThenable(result)) {
          abandon(result);
          sub.fatal(
            `Test method "${name}" returns a Promise, should return none`,
          );
        }
        if (result !== undefined) {
          sub.fatal(
            `Test method "${name}" returns a value, should return none`,
          );
        }
      });
    }

    injectHandle(t, suite, new Set());
  });
}

/**
 * Depth first search, in field order, for the first unfrozen {@link Test}
 * reachable from `target` through fields holding objects. Absent fields
 * end their branch of the search.
 */
export function injectHandle(
  t: TestHandle,
  target: object,
  visited: Set<object>,
): boolean {
  if (visited.has(target)) {
    return false;
  }
  visited.add(target);

  if (target instanceof Test && !Object.isFrozen(target)) {
    target.handle = t;
    return true;
  }

  for (let value of Object.values(target)) {
    if (isStruct(value) && injectHandle(t, value, visited)) {
      return true;
    }
  }
  return false;
}

/**
 * Objects that can hold fields worth searching: plain objects and class
 * instances, not collections or other built-ins.
 */
function isStruct(value: unknown): value is object {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (value instanceof Test) {
    return true;
  }
  return !(
    Array.isArray(value) ||
    ArrayBuffer.isView(value) ||
    value instanceof Map ||
    value instanceof Set ||
    value instanceof WeakMap ||
    value instanceof WeakSet ||
    value instanceof Date ||
    value instanceof RegExp ||
    value instanceof Promise ||
    value instanceof Error ||
    value instanceof ArrayBuffer
  );
}

/**
 * Look a method up on the suite itself and then along its prototype
 * chain, stopping short of `Object.prototype`. Accessors are not methods.
 */
function findMethod(suite: object, name: string): Method | undefined {
  for (let owner of prototypeChain(suite)) {
    let descriptor = Object.getOwnPropertyDescriptor(owner, name);
    if (descriptor) {
      return typeof descriptor.value === "function"
        ? descriptor.value
        : undefined;
    }
  }
  return undefined;
}

function findTestMethods(suite: object): TestMethod[] {
  let names = new Set<string>();
  for (let owner of prototypeChain(suite)) {
    for (let name of Object.getOwnPropertyNames(owner)) {
      names.add(name);
    }
  }

  let methods: TestMethod[] = [];
  for (let name of [...names].sort()) {
    let match = testMethodMatch.exec(name);
    let method = match ? findMethod(suite, name) : undefined;
    if (match && method) {
      methods.push({ name, short: match[1], method });
    }
  }
  return methods;
}

function prototypeChain(suite: object): object[] {
  let chain: object[] = [];
  for (
    let owner: object | null = suite;
    owner !== null && owner !== Object.prototype;
    owner = Object.getPrototypeOf(owner)
  ) {
    chain.push(owner);
  }
  return chain;
}

function* invoke(suite: object, method: Method): Operation<unknown> {
  let result = method.call(suite);
  if (isGeneratorFunction(method) && isOperation(result)) {
    return yield* result;
  }
  return result;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value &&
    typeof value.then === "function";
}

/**
 * Settle a promise nothing will wait for. Its outcome is already reported
 * as a failure of the test that returned it.
 */
function abandon(promise: PromiseLike<unknown>): void {
  Promise.resolve(promise).catch(() => {});
}

function isGeneratorFunction(fn: Method): boolean {
  return Object.prototype.toString.call(fn) === "[object GeneratorFunction]";
}

function isOperation(value: unknown): value is Operation<unknown> {
  return typeof value === "object" && value !== null &&
    Symbol.iterator in value && typeof value[Symbol.iterator] === "function";
}
