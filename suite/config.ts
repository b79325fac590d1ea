import { z } from "zod";

export interface SuiteOptions {
  /**
   * Only run test methods whose subtest name (the method name without its
   * `Test` prefix) matches this pattern.
   */
  filter?: string | RegExp;

  /**
   * Print debug output about suite discovery. When left out, the logging
   * already in effect for the caller applies.
   */
  verbose?: boolean;
}

export interface SuiteConfig {
  filter?: RegExp;
  verbose?: boolean;
}

function compile(source: string, ctx: z.RefinementCtx): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid pattern ${JSON.stringify(source)}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    });
    return z.NEVER;
  }
}

/**
 * The filter is tested once per method, so it must not carry `lastIndex`
 * from one test to the next.
 */
function stateless(filter: RegExp): RegExp {
  return filter.global || filter.sticky
    ? new RegExp(filter.source, filter.flags.replace(/[gy]/g, ""))
    : filter;
}

const flag = z.enum(["", "0", "1", "false", "true"])
  .transform((value) => value === "1" || value === "true");

const optionsSchema = z.object({
  filter: z.union([z.string(), z.instanceof(RegExp)])
    .transform((filter, ctx) =>
      typeof filter === "string" ? compile(filter, ctx) : stateless(filter)
    )
    .optional(),
  verbose: z.boolean().optional(),
});

const environmentSchema = z.object({
  ASSAY_RUN: z.string().transform(compile).optional(),
  ASSAY_VERBOSE: flag.optional(),
});

/**
 * Validate options passed in code.
 *
 * @throws ZodError naming the offending option
 */
export function parseOptions(options: SuiteOptions = {}): SuiteConfig {
  return optionsSchema.parse(options);
}

/**
 * Combine options passed in code with `ASSAY_RUN` and `ASSAY_VERBOSE` from
 * the environment. Options passed in code win.
 *
 * @throws ZodError naming the offending option or variable
 */
export function readConfig(
  env: Record<string, string | undefined>,
  options: SuiteOptions = {},
): SuiteConfig {
  let explicit = parseOptions(options);
  let environment = environmentSchema.parse(env);
  return {
    filter: explicit.filter ?? environment.ASSAY_RUN,
    verbose: explicit.verbose ?? environment.ASSAY_VERBOSE ?? false,
  };
}
