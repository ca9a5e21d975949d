// ---------------------------------------------------------------------------
// Tests for the single-file JSON snapshot store.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { JsonFileSnapshotStore } from "../../../src/persistence/json-file-store.js";
import {
  CorruptStoreError,
  PersistenceError,
} from "../../../src/core/errors.js";
import type {
  Book,
  LibrarySnapshot,
  Member,
} from "../../../src/core/types.js";
import { captureLogs } from "../../helpers/logging.js";

function sampleSnapshot(): LibrarySnapshot {
  return {
    books: new Map<string, Book>([
      [
        "B1",
        {
          bookId: "B1",
          title: "Python Programming",
          author: "John Smith",
          isAvailable: false,
          borrower: "M1",
          dueDate: "2026-03-16",
        },
      ],
      [
        "B2",
        {
          bookId: "B2",
          title: "Data Structures",
          author: "Jane Doe",
          isAvailable: true,
          borrower: null,
          dueDate: null,
        },
      ],
    ]),
    members: new Map<string, Member>([
      [
        "M1",
        {
          memberId: "M1",
          name: "Alice Brown",
          email: "alice@example.com",
          borrowedBooks: ["B1"],
        },
      ],
    ]),
  };
}

describe("JsonFileSnapshotStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lending-desk-"));
    file = path.join(dir, "library_data.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("resolves its location to an absolute path", () => {
    const store = new JsonFileSnapshotStore(file);
    expect(store.location).toBe(path.resolve(file));
  });

  it("returns null when the file does not exist", () => {
    expect(new JsonFileSnapshotStore(file).load()).toBeNull();
  });

  it("loads back exactly what it saved", () => {
    const store = new JsonFileSnapshotStore(file);
    const snapshot = sampleSnapshot();

    store.save(snapshot);

    expect(new JsonFileSnapshotStore(file).load()).toEqual(snapshot);
  });

  it("writes the keyed shape as indented JSON", () => {
    new JsonFileSnapshotStore(file).save(sampleSnapshot());

    const text = fs.readFileSync(file, "utf-8");
    expect(text.startsWith('{\n    "books": {\n        "B1": {\n')).toBe(true);
    expect(JSON.parse(text).members).toEqual({
      M1: {
        member_id: "M1",
        name: "Alice Brown",
        email: "alice@example.com",
        borrowed_books: ["B1"],
      },
    });
  });

  it("overwrites previous content on every save", () => {
    const store = new JsonFileSnapshotStore(file);
    store.save(sampleSnapshot());
    store.save({ books: new Map(), members: new Map() });

    expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual({
      books: {},
      members: {},
    });
  });

  it("keeps a keyed file's id order when ids look like integers", () => {
    const record = (id: string) => ({
      book_id: id,
      title: "Data Structures",
      author: "Jane Doe",
      is_available: true,
      borrower: null,
      due_date: null,
    });
    fs.writeFileSync(
      file,
      `{"books": {"10": ${JSON.stringify(record("10"))}, "2": ${JSON.stringify(record("2"))}}, "members": {}}`,
    );
    const store = new JsonFileSnapshotStore(file);

    const snapshot = store.load();
    expect([...(snapshot?.books.keys() ?? [])]).toEqual(["10", "2"]);

    store.save({ books: snapshot?.books ?? new Map(), members: new Map() });
    expect([...(store.load()?.books.keys() ?? [])]).toEqual(["10", "2"]);
  });

  it("reads a legacy list-shaped file and logs the shape", () => {
    fs.writeFileSync(
      file,
      JSON.stringify({
        books: [
          {
            book_id: "B2",
            title: "Data Structures",
            author: "Jane Doe",
            is_available: true,
            borrower: null,
            due_date: null,
          },
        ],
        members: {},
      }),
    );
    const logs = captureLogs("info");

    const snapshot = new JsonFileSnapshotStore(file, logs.logger).load();

    expect(snapshot?.books.get("B2")?.title).toBe("Data Structures");
    const entry = logs
      .entries()
      .find((e) => e["component"] === "json-file-store");
    expect(entry?.["msg"]).toBe(
      "read legacy list-shaped sections; the next save writes them keyed by id",
    );
    expect(entry?.["shapes"]).toEqual({ books: "legacy-list", members: "keyed" });
  });

  it("rejects malformed JSON as a corrupt store", () => {
    fs.writeFileSync(file, '{"books": {');
    const store = new JsonFileSnapshotStore(file);

    expect(() => store.load()).toThrow(CorruptStoreError);
    try {
      store.load();
    } catch (err) {
      expect(err).toBeInstanceOf(CorruptStoreError);
      if (err instanceof CorruptStoreError) {
        expect(err.problems).toHaveLength(1);
        expect(err.problems[0]).toMatch(/^invalid JSON: /);
        expect(err.location).toBe(path.resolve(file));
      }
    }
  });

  it("wraps read failures other than a missing file", () => {
    const store = new JsonFileSnapshotStore(dir);
    expect(() => store.load()).toThrow(PersistenceError);
  });

  it("wraps write failures", () => {
    const store = new JsonFileSnapshotStore(path.join(dir, "missing", "data.json"));
    expect(() => store.save(sampleSnapshot())).toThrow(PersistenceError);
  });
});
