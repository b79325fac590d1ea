export * from "./config.ts";
export * from "./handle.ts";
export { log, type Logger, loggerApi, verboseLogging } from "./logger.ts";
export { injectHandle, runSuite } from "./suite.ts";
export * from "./test.ts";
