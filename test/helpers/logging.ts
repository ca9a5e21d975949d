// ---------------------------------------------------------------------------
// Logger helpers for tests.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { createLogger } from "../../src/logging/logger.js";

export function silentLogger(): Logger {
  return createLogger({
    level: "silent",
    prettyPrint: false,
    redactPersonalData: true,
  });
}

export interface CapturedLogs {
  logger: Logger;
  /** Every line written so far, parsed from JSON. */
  entries: () => Array<Record<string, unknown>>;
}

/** A logger whose output is kept in memory instead of written to stderr. */
export function captureLogs(level = "debug"): CapturedLogs {
  const lines: string[] = [];
  const logger = createLogger(
    { level, prettyPrint: false, redactPersonalData: true },
    { write: (line: string) => lines.push(line) },
  );
  return {
    logger,
    entries: () => lines.map((line) => JSON.parse(line)),
  };
}
