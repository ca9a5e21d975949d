#!/usr/bin/env node
// ---------------------------------------------------------------------------
// lending-desk command-line entrypoint.
// ---------------------------------------------------------------------------

import type { AppConfig } from "../core/types.js";
import { loadConfig } from "../config/config.js";
import { ConfigurationError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { ExitCode, runCli } from "./commands.js";

function main(): number {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(err.message);
      return ExitCode.FAILED;
    }
    throw err;
  }

  return runCli(process.argv.slice(2), {
    config,
    logger: createLogger(config.logging),
    io: {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    },
  });
}

process.exitCode = main();
