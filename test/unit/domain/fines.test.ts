// ---------------------------------------------------------------------------
// Tests for overdue fine calculation.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { computeFine } from "../../../src/domain/lending/fines.js";
import type { Book } from "../../../src/core/types.js";

describe("computeFine", () => {
  const borrowed: Book = {
    bookId: "B1",
    title: "Python Programming",
    author: "John Smith",
    isAvailable: false,
    borrower: "M1",
    dueDate: "2026-03-16",
  };

  it("is 0 for an available book", () => {
    const available: Book = {
      bookId: "B2",
      title: "Data Structures",
      author: "Jane Doe",
      isAvailable: true,
      borrower: null,
      dueDate: null,
    };
    expect(computeFine(available, new Date(2030, 0, 1), 1)).toBe(0);
  });

  it("is 0 for an early return instead of a negative amount", () => {
    expect(computeFine(borrowed, new Date(2026, 2, 3, 9, 0), 1)).toBe(0);
  });

  it("is 0 on the due date", () => {
    expect(computeFine(borrowed, new Date(2026, 2, 16, 18, 0), 1)).toBe(0);
  });

  it("multiplies whole overdue days by the rate", () => {
    expect(computeFine(borrowed, new Date(2026, 2, 19, 12, 0), 0.5)).toBe(1.5);
  });

  it("never decreases as time passes", () => {
    let previous = 0;
    for (let day = 0; day <= 40; day++) {
      const fine = computeFine(borrowed, new Date(2026, 2, 2 + day, 15, 0), 1);
      expect(fine).toBeGreaterThanOrEqual(previous);
      previous = fine;
    }
    expect(previous).toBe(26);
  });
});
