// ---------------------------------------------------------------------------
// Overdue fine calculation.
// ---------------------------------------------------------------------------

import type { Book } from "../../core/types.js";
import { daysPastDue } from "./calendar.js";

/**
 * Fine owed on `book` at `now`: whole overdue days times `fineRate`.
 *
 * Returns 0 for available books and for returns on or before the due date.
 * Partial days are truncated, so a book due on the 16th costs nothing until
 * midnight of the 17th.
 */
export function computeFine(book: Book, now: Date, fineRate: number): number {
  if (book.isAvailable) return 0;

  const overdue = daysPastDue(book.dueDate, now);
  return overdue > 0 ? overdue * fineRate : 0;
}
