// ---------------------------------------------------------------------------
// Error hierarchy for the Lending Desk.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Lending Desk errors. Lending rule violations are reported
 * through result objects instead; these are reserved for conditions the
 * caller cannot continue from.
 */
export class LendingDeskError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LendingDeskError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Persistence errors ──────────────────────────────────────────────────────

/** Reading or writing the backing file failed. */
export class PersistenceError extends LendingDeskError {
  public readonly location: string;

  constructor(message: string, location: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PersistenceError";
    this.location = location;
  }
}

/**
 * The backing file exists but cannot be turned into a consistent library:
 * malformed JSON, records of the wrong shape, or loans that contradict the
 * membership.
 */
export class CorruptStoreError extends LendingDeskError {
  public readonly location: string;
  public readonly problems: readonly string[];

  constructor(
    location: string,
    problems: readonly string[],
    options?: ErrorOptions,
  ) {
    super(
      `Library data in ${location} is corrupt: ${problems.join("; ")}`,
      options,
    );
    this.name = "CorruptStoreError";
    this.location = location;
    this.problems = problems;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A configuration value is missing or invalid. */
export class ConfigurationError extends LendingDeskError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
