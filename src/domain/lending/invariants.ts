// ---------------------------------------------------------------------------
// Cross-entity lending invariants.
// ---------------------------------------------------------------------------

import type { LibrarySnapshot } from "../../core/types.js";

/**
 * Check that loans recorded on books agree with the borrowed lists on
 * members. Returns one message per violation; an empty array means the
 * snapshot is consistent.
 *
 * - A borrowed book names an existing member, and appears exactly once in
 *   that member's list.
 * - An available book appears in no member's list.
 * - Every id in a member's list names an existing book lent to that member.
 */
export function findLendingViolations(snapshot: LibrarySnapshot): string[] {
  const { books, members } = snapshot;
  const violations: string[] = [];

  for (const book of books.values()) {
    if (book.isAvailable) continue;

    const holder = members.get(book.borrower);
    if (!holder) {
      violations.push(
        `book "${book.bookId}" is lent to unknown member "${book.borrower}"`,
      );
      continue;
    }

    const occurrences = holder.borrowedBooks.filter(
      (id) => id === book.bookId,
    ).length;
    if (occurrences !== 1) {
      violations.push(
        `book "${book.bookId}" appears ${occurrences} times in the borrowed list of member "${holder.memberId}"`,
      );
    }
  }

  for (const member of members.values()) {
    for (const bookId of member.borrowedBooks) {
      const book = books.get(bookId);
      if (!book) {
        violations.push(
          `member "${member.memberId}" holds unknown book "${bookId}"`,
        );
      } else if (book.isAvailable) {
        violations.push(
          `member "${member.memberId}" holds book "${bookId}" which is marked available`,
        );
      } else if (book.borrower !== member.memberId) {
        violations.push(
          `member "${member.memberId}" holds book "${bookId}" which is lent to "${book.borrower}"`,
        );
      }
    }
  }

  return violations;
}
