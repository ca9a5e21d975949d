// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

function booleanFlag(defaultValue: "true" | "false") {
  return z
    .enum(["true", "false", "1", "0"])
    .default(defaultValue)
    .transform((value) => value === "true" || value === "1");
}

/** A numeric variable. An empty value is an error, never zero. */
function numberVar(schema: z.ZodNumber, defaultValue: string) {
  return z
    .string()
    .trim()
    .min(1, { message: "must not be empty" })
    .pipe(schema)
    .default(defaultValue);
}

const EnvSchema = z.object({
  LENDING_DESK_DATA_FILE: z.string().min(1).default("library_data.json"),
  LENDING_DESK_FINE_RATE: numberVar(
    z.coerce.number().finite().nonnegative(),
    "1.0",
  ),
  LENDING_DESK_LOAN_DAYS: numberVar(z.coerce.number().int().positive(), "14"),
  LENDING_DESK_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LENDING_DESK_LOG_PRETTY: booleanFlag("false"),
  LENDING_DESK_LOG_REDACT: booleanFlag("true"),
});

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a default so the CLI runs with zero configuration.
 *
 * @throws ConfigurationError naming every variable that failed validation.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const values = result.data;

  return {
    dataFile: values.LENDING_DESK_DATA_FILE,
    lending: {
      fineRate: values.LENDING_DESK_FINE_RATE,
      loanPeriodDays: values.LENDING_DESK_LOAN_DAYS,
    },
    logging: {
      level: values.LENDING_DESK_LOG_LEVEL,
      prettyPrint: values.LENDING_DESK_LOG_PRETTY,
      redactPersonalData: values.LENDING_DESK_LOG_REDACT,
    },
  };
}
