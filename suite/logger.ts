import type { Operation } from "effection";
import { createApi } from "@effectionx/context-api";

/**
 * Where suite diagnostics go. `debug` carries discovery and progress,
 * `error` carries misuse of a suite that stops it from running.
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => Operation<void>;
  error: (message: string, ...args: unknown[]) => Operation<void>;
}

const gray = "\x1b[90m";
const red = "\x1b[31m";
const reset = "\x1b[0m";

const consoleLogger: Logger = {
  *debug(message: string, ...args: unknown[]) {
    console.log(`${gray}[assay]${reset} ${message}`, ...args);
  },
  *error(message: string, ...args: unknown[]) {
    console.error(`${red}[assay]${reset} ${message}`, ...args);
  },
};

export const loggerApi = createApi("assay:logger", consoleLogger);
export const log = loggerApi.operations;

/**
 * Drop debug output for the rest of the current scope unless `verbose`.
 * Errors always pass.
 */
export function* verboseLogging(verbose: boolean): Operation<void> {
  yield* loggerApi.around({
    *debug(args, next) {
      if (verbose) {
        yield* next(...args);
      }
    },
    *error(args, next) {
      yield* next(...args);
    },
  });
}
