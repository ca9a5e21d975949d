// ---------------------------------------------------------------------------
// Library: the catalog and membership store with its lending rules.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import type {
  AddResult,
  Book,
  BookId,
  BorrowResult,
  LibrarySnapshot,
  Member,
  MemberId,
  ReturnResult,
  SnapshotStore,
} from "../core/types.js";
import { LendingFailure } from "../core/types.js";
import { CorruptStoreError } from "../core/errors.js";
import { addCalendarDays } from "../domain/lending/calendar.js";
import { computeFine } from "../domain/lending/fines.js";
import { findLendingViolations } from "../domain/lending/invariants.js";
import { searchCatalog } from "../domain/catalog/search.js";

export const DEFAULT_FINE_RATE = 1.0;
export const DEFAULT_LOAN_PERIOD_DAYS = 14;

export interface LibraryOptions {
  store: SnapshotStore;
  logger: Logger;
  /** Amount charged per whole overdue day. Defaults to 1.0. */
  fineRate?: number;
  /** Defaults to 14. */
  loanPeriodDays?: number;
  /** Clock used for due dates and fines. Defaults to the system clock. */
  now?: () => Date;
}

/**
 * Owns every Book and Member record, enforces the lending state machine
 * (available ⇄ borrowed) and writes the full state to its store after every
 * successful mutation.
 *
 * Entities are immutable values; a mutation replaces them in the maps, so a
 * copy of the two maps is a complete snapshot of the library.
 *
 * A store instance assumes it is the only writer of its backing store.
 */
export class Library {
  private booksById = new Map<BookId, Book>();
  private membersById = new Map<MemberId, Member>();

  private readonly store: SnapshotStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  public readonly fineRate: number;
  public readonly loanPeriodDays: number;

  /**
   * Loads the existing state from `options.store`.
   *
   * @throws CorruptStoreError if the stored loans contradict the membership.
   */
  constructor(options: LibraryOptions) {
    this.store = options.store;
    this.logger = options.logger.child({ component: "library" });
    this.fineRate = options.fineRate ?? DEFAULT_FINE_RATE;
    this.loanPeriodDays = options.loanPeriodDays ?? DEFAULT_LOAN_PERIOD_DAYS;
    this.now = options.now ?? (() => new Date());

    this.load();
  }

  // ── Read access ───────────────────────────────────────────────────────

  get books(): ReadonlyMap<BookId, Book> {
    return this.booksById;
  }

  get members(): ReadonlyMap<MemberId, Member> {
    return this.membersById;
  }

  getBook(bookId: BookId): Book | undefined {
    return this.booksById.get(bookId);
  }

  getMember(memberId: MemberId): Member | undefined {
    return this.membersById.get(memberId);
  }

  // ── Catalog & membership ──────────────────────────────────────────────

  addBook(bookId: BookId, title: string, author: string): AddResult {
    if (this.booksById.has(bookId)) {
      this.logger.debug({ bookId }, "add book rejected: duplicate id");
      return { success: false, reason: LendingFailure.DUPLICATE_ID };
    }

    this.commit(() => {
      this.booksById.set(bookId, {
        bookId,
        title,
        author,
        isAvailable: true,
        borrower: null,
        dueDate: null,
      });
    });

    this.logger.info({ bookId }, "book added");
    return { success: true };
  }

  addMember(memberId: MemberId, name: string, email: string): AddResult {
    if (this.membersById.has(memberId)) {
      this.logger.debug({ memberId }, "add member rejected: duplicate id");
      return { success: false, reason: LendingFailure.DUPLICATE_ID };
    }

    this.commit(() => {
      this.membersById.set(memberId, {
        memberId,
        name,
        email,
        borrowedBooks: [],
      });
    });

    this.logger.info({ memberId }, "member added");
    return { success: true };
  }

  // ── Lending ───────────────────────────────────────────────────────────

  borrowBook(bookId: BookId, memberId: MemberId): BorrowResult {
    const book = this.booksById.get(bookId);
    if (!book) {
      this.logger.debug({ bookId, memberId }, "borrow rejected: unknown book");
      return { success: false, reason: LendingFailure.UNKNOWN_BOOK };
    }

    const member = this.membersById.get(memberId);
    if (!member) {
      this.logger.debug({ bookId, memberId }, "borrow rejected: unknown member");
      return { success: false, reason: LendingFailure.UNKNOWN_MEMBER };
    }

    if (!book.isAvailable) {
      this.logger.debug(
        { bookId, memberId, borrower: book.borrower },
        "borrow rejected: book already lent",
      );
      return { success: false, reason: LendingFailure.BOOK_UNAVAILABLE };
    }

    const dueDate = addCalendarDays(this.now(), this.loanPeriodDays);

    this.commit(() => {
      this.booksById.set(bookId, {
        bookId: book.bookId,
        title: book.title,
        author: book.author,
        isAvailable: false,
        borrower: memberId,
        dueDate,
      });
      this.membersById.set(memberId, {
        ...member,
        borrowedBooks: [...member.borrowedBooks, bookId],
      });
    });

    this.logger.info({ bookId, memberId, dueDate }, "book borrowed");
    return { success: true, dueDate };
  }

  returnBook(bookId: BookId): ReturnResult {
    const book = this.booksById.get(bookId);
    if (!book) {
      this.logger.debug({ bookId }, "return rejected: unknown book");
      return { success: false, fine: 0, reason: LendingFailure.UNKNOWN_BOOK };
    }

    if (book.isAvailable) {
      this.logger.debug({ bookId }, "return rejected: book is not lent");
      return {
        success: false,
        fine: 0,
        reason: LendingFailure.BOOK_NOT_BORROWED,
      };
    }

    const fine = computeFine(book, this.now(), this.fineRate);
    const holder = this.membersById.get(book.borrower);

    this.commit(() => {
      if (holder) {
        this.membersById.set(holder.memberId, {
          ...holder,
          borrowedBooks: holder.borrowedBooks.filter((id) => id !== bookId),
        });
      }
      this.booksById.set(bookId, {
        bookId: book.bookId,
        title: book.title,
        author: book.author,
        isAvailable: true,
        borrower: null,
        dueDate: null,
      });
    });

    this.logger.info(
      { bookId, memberId: book.borrower, dueDate: book.dueDate, fine },
      "book returned",
    );
    return { success: true, fine };
  }

  /**
   * Fine accrued so far on `bookId`, at the time of the call. 0 for unknown
   * or available books.
   */
  calculateFine(bookId: BookId): number {
    const book = this.booksById.get(bookId);
    if (!book) return 0;
    return computeFine(book, this.now(), this.fineRate);
  }

  // ── Search ────────────────────────────────────────────────────────────

  /** Books whose title or author contains `query`, ignoring case. */
  searchBooks(query: string): Book[] {
    return searchCatalog(this.booksById.values(), query);
  }

  // ── Persistence ───────────────────────────────────────────────────────

  private snapshot(): LibrarySnapshot {
    return { books: this.booksById, members: this.membersById };
  }

  private load(): void {
    const snapshot = this.store.load();

    if (!snapshot) {
      this.logger.info(
        { location: this.store.location },
        "no existing data found, starting with an empty library",
      );
      return;
    }

    const violations = findLendingViolations(snapshot);
    if (violations.length > 0) {
      throw new CorruptStoreError(this.store.location, violations);
    }

    this.booksById = snapshot.books;
    this.membersById = snapshot.members;

    this.logger.info(
      {
        location: this.store.location,
        books: this.booksById.size,
        members: this.membersById.size,
      },
      "library loaded",
    );
  }

  /**
   * Apply `mutation` and save. If the save throws, the maps are put back as
   * they were and the error is rethrown.
   */
  private commit(mutation: () => void): void {
    const books = new Map(this.booksById);
    const members = new Map(this.membersById);

    mutation();

    try {
      this.store.save(this.snapshot());
    } catch (err) {
      this.booksById = books;
      this.membersById = members;
      throw err;
    }
  }
}
