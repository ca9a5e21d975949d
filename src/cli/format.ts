// ---------------------------------------------------------------------------
// Plain-text tables for the command line.
// ---------------------------------------------------------------------------

import type { Book, Member, MemberId } from "../core/types.js";

export const RULE = "-".repeat(80);

const BOOK_COLUMNS = [5, 20, 15, 35];
const MEMBER_COLUMNS = [5, 20, 25, 25];

/** Cut `text` to `max` characters plus an ellipsis when it is longer. */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Every cell is padded to its column width, the last one included. */
function row(cells: string[], widths: number[]): string {
  return cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(" | ");
}

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export function bookStatus(
  book: Book,
  members: ReadonlyMap<MemberId, Member>,
): string {
  if (book.isAvailable) return "Available";
  const holder = members.get(book.borrower)?.name ?? book.borrower;
  return `Borrowed by ${holder} (Due: ${book.dueDate})`;
}

export function formatBookTable(
  books: Iterable<Book>,
  members: ReadonlyMap<MemberId, Member>,
): string[] {
  const lines = [
    RULE,
    row(["ID", "Title", "Author", "Status"], BOOK_COLUMNS),
    RULE,
  ];

  for (const book of books) {
    lines.push(
      row(
        [
          book.bookId,
          truncate(book.title, 18),
          truncate(book.author, 13),
          truncate(bookStatus(book, members), 33),
        ],
        BOOK_COLUMNS,
      ),
    );
  }

  lines.push(RULE);
  return lines;
}

export function formatSearchResults(
  query: string,
  results: Book[],
  members: ReadonlyMap<MemberId, Member>,
): string[] {
  if (results.length === 0) {
    return [`No books found matching '${query}'`];
  }
  return [
    `Search results for '${query}':`,
    ...formatBookTable(results, members),
  ];
}

export function formatMemberTable(members: Iterable<Member>): string[] {
  const lines = [
    RULE,
    row(["ID", "Name", "Email", "Borrowed"], MEMBER_COLUMNS),
    RULE,
  ];

  for (const member of members) {
    const borrowed =
      member.borrowedBooks.length > 0 ? member.borrowedBooks.join(", ") : "-";
    lines.push(
      row(
        [
          member.memberId,
          truncate(member.name, 18),
          truncate(member.email, 23),
          truncate(borrowed, 23),
        ],
        MEMBER_COLUMNS,
      ),
    );
  }

  lines.push(RULE);
  return lines;
}
