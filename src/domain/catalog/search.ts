// ---------------------------------------------------------------------------
// Title / author search over the catalog.
// ---------------------------------------------------------------------------

import type { Book } from "../../core/types.js";

/** Case-insensitive substring match against title or author. */
export function matchesQuery(book: Book, query: string): boolean {
  const needle = query.toLowerCase();
  return (
    book.title.toLowerCase().includes(needle) ||
    book.author.toLowerCase().includes(needle)
  );
}

/**
 * Every book matching `query`, in catalog order. An empty query matches
 * the whole catalog.
 */
export function searchCatalog(books: Iterable<Book>, query: string): Book[] {
  const results: Book[] = [];
  for (const book of books) {
    if (matchesQuery(book, query)) {
      results.push(book);
    }
  }
  return results;
}
