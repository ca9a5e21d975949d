// ---------------------------------------------------------------------------
// Tests for catalog search.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { matchesQuery, searchCatalog } from "../../../src/domain/catalog/search.js";
import type { Book } from "../../../src/core/types.js";

function book(bookId: string, title: string, author: string): Book {
  return { bookId, title, author, isAvailable: true, borrower: null, dueDate: null };
}

const CATALOG = [
  book("B1", "Python Programming", "John Smith"),
  book("B2", "Data Structures", "Jane Doe"),
  book("B3", "Structured Thinking", "Ann Python"),
];

describe("matchesQuery", () => {
  it("matches the title ignoring case", () => {
    expect(matchesQuery(CATALOG[0], "PROGRAM")).toBe(true);
  });

  it("matches the author ignoring case", () => {
    expect(matchesQuery(CATALOG[1], "doe")).toBe(true);
  });

  it("does not match unrelated text", () => {
    expect(matchesQuery(CATALOG[1], "python")).toBe(false);
  });
});

describe("searchCatalog", () => {
  it("returns matches on title or author in catalog order", () => {
    expect(searchCatalog(CATALOG, "python").map((b) => b.bookId)).toEqual([
      "B1",
      "B3",
    ]);
  });

  it("matches every book for an empty query", () => {
    expect(searchCatalog(CATALOG, "")).toEqual(CATALOG);
  });

  it("returns an empty array when nothing matches", () => {
    expect(searchCatalog(CATALOG, "cookbook")).toEqual([]);
  });

  it("returns the same book objects, not copies", () => {
    const [hit] = searchCatalog(CATALOG, "structures");
    expect(hit).toBe(CATALOG[1]);
  });
});
