// ---------------------------------------------------------------------------
// Lending Desk -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import type { AppConfig } from "./core/types.js";
import { Library } from "./library/library.js";
import { JsonFileSnapshotStore } from "./persistence/json-file-store.js";

/**
 * Open the library stored in `config.dataFile`, creating an empty one in
 * memory if the file does not exist yet.
 */
export function openLibrary(
  config: AppConfig,
  logger: Logger,
  now?: () => Date,
): Library {
  const store = new JsonFileSnapshotStore(config.dataFile, logger);

  return new Library({
    store,
    logger,
    fineRate: config.lending.fineRate,
    loanPeriodDays: config.lending.loanPeriodDays,
    now,
  });
}
