// ---------------------------------------------------------------------------
// Core types for the Lending Desk.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Identifiers ─────────────────────────────────────────────────────────────

/** Caller-assigned identifier of a book copy. */
export type BookId = string;

/** Caller-assigned identifier of a library member. */
export type MemberId = string;

/** A calendar day formatted as `YYYY-MM-DD` (no time, no timezone). */
export type IsoDate = string;

// ── Entities ────────────────────────────────────────────────────────────────

interface BookDetails {
  readonly bookId: BookId;
  readonly title: string;
  readonly author: string;
}

export interface AvailableBook extends BookDetails {
  readonly isAvailable: true;
  readonly borrower: null;
  readonly dueDate: null;
}

export interface BorrowedBook extends BookDetails {
  readonly isAvailable: false;
  readonly borrower: MemberId;
  readonly dueDate: IsoDate;
}

/** A copy in the catalog, discriminated on `isAvailable`. */
export type Book = AvailableBook | BorrowedBook;

export interface Member {
  readonly memberId: MemberId;
  readonly name: string;
  readonly email: string;
  /** Ids of the copies this member holds, in borrow order. */
  readonly borrowedBooks: readonly BookId[];
}

/** The full in-memory state that is persisted after every mutation. */
export interface LibrarySnapshot {
  books: Map<BookId, Book>;
  members: Map<MemberId, Member>;
}

// ── Operation results ───────────────────────────────────────────────────────

export const LendingFailure = {
  DUPLICATE_ID: "duplicate_id",
  UNKNOWN_BOOK: "unknown_book",
  UNKNOWN_MEMBER: "unknown_member",
  BOOK_UNAVAILABLE: "book_unavailable",
  BOOK_NOT_BORROWED: "book_not_borrowed",
} as const;
export type LendingFailure =
  (typeof LendingFailure)[keyof typeof LendingFailure];

export type AddResult =
  | { success: true }
  | { success: false; reason: typeof LendingFailure.DUPLICATE_ID };

export type BorrowResult =
  | { success: true; dueDate: IsoDate }
  | {
      success: false;
      reason:
        | typeof LendingFailure.UNKNOWN_BOOK
        | typeof LendingFailure.UNKNOWN_MEMBER
        | typeof LendingFailure.BOOK_UNAVAILABLE;
    };

export type ReturnResult =
  | { success: true; fine: number }
  | {
      success: false;
      fine: 0;
      reason:
        | typeof LendingFailure.UNKNOWN_BOOK
        | typeof LendingFailure.BOOK_NOT_BORROWED;
    };

// ── Persistence ─────────────────────────────────────────────────────────────

/**
 * Durable home of a {@link LibrarySnapshot}. Implementations acquire and
 * release their underlying resource inside each call.
 */
export interface SnapshotStore {
  /** Human-readable location, used in log lines and error messages. */
  readonly location: string;
  /** Returns `null` when nothing has been stored yet. */
  load(): LibrarySnapshot | null;
  save(snapshot: LibrarySnapshot): void;
}

// ── Configuration ───────────────────────────────────────────────────────────

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactPersonalData: boolean;
}

export interface LendingConfig {
  /** Amount charged per whole overdue day. */
  fineRate: number;
  /** Calendar days between borrowing and the due date. */
  loanPeriodDays: number;
}

export interface AppConfig {
  dataFile: string;
  lending: LendingConfig;
  logging: LoggingConfig;
}
