// ---------------------------------------------------------------------------
// Snapshot codec.
// Translates between the in-memory LibrarySnapshot and the persisted JSON
// document. Each entity's persisted fields are listed once, in its Zod
// schema, and the matching encoder writes exactly those fields back.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type {
  Book,
  BookId,
  LibrarySnapshot,
  Member,
  MemberId,
} from "../core/types.js";
import { CorruptStoreError } from "../core/errors.js";
import { isIsoDate } from "../domain/lending/calendar.js";
import { readSectionKeyOrder } from "./key-order.js";
import type { SectionKeyOrder } from "./key-order.js";

const SECTIONS = ["books", "members"] as const;
const INDENT = "    ";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const BookRecordSchema = z
  .object({
    book_id: z.string().min(1),
    title: z.string(),
    author: z.string(),
    is_available: z.boolean().default(true),
    borrower: z.string().min(1).nullable().default(null),
    due_date: z
      .string()
      .refine(isIsoDate, { message: "must be a YYYY-MM-DD calendar date" })
      .nullable()
      .default(null),
  })
  .strict();

export const MemberRecordSchema = z
  .object({
    member_id: z.string().min(1),
    name: z.string(),
    email: z.string(),
    borrowed_books: z
      .array(z.string())
      .nullish()
      .transform((ids) => ids ?? []),
  })
  .strict();

export type BookRecord = z.infer<typeof BookRecordSchema>;
export type MemberRecord = z.infer<typeof MemberRecordSchema>;

/** The document written to disk. Only the keyed shape is ever produced. */
export interface PersistedLibrary {
  books: Record<BookId, BookRecord>;
  members: Record<MemberId, MemberRecord>;
}

/**
 * How a section was laid out on disk: a mapping keyed by id, or the legacy
 * list of records that each carry their own id.
 */
export type SectionShape = "keyed" | "legacy-list" | "absent";

export interface DecodedSnapshot {
  snapshot: LibrarySnapshot;
  shapes: { books: SectionShape; members: SectionShape };
}

// ── Encoding ────────────────────────────────────────────────────────────────

export function encodeBook(book: Book): BookRecord {
  return {
    book_id: book.bookId,
    title: book.title,
    author: book.author,
    is_available: book.isAvailable,
    borrower: book.borrower,
    due_date: book.dueDate,
  };
}

export function encodeMember(member: Member): MemberRecord {
  return {
    member_id: member.memberId,
    name: member.name,
    email: member.email,
    borrowed_books: [...member.borrowedBooks],
  };
}

/**
 * A keyed section written entry by entry, so ids appear in map order even
 * when they look like integers.
 */
function keyedSection<T, R>(
  entities: ReadonlyMap<string, T>,
  encode: (entity: T) => R,
): string {
  if (entities.size === 0) return "{}";
  const pad = INDENT.repeat(2);
  const entries = Array.from(entities, ([id, entity]) => {
    const record = JSON.stringify(encode(entity), null, INDENT.length);
    return `${pad}${JSON.stringify(id)}: ${record.replaceAll("\n", `\n${pad}`)}`;
  });
  return `{\n${entries.join(",\n")}\n${INDENT}}`;
}

/**
 * The snapshot as keyed JSON text with 4-space indentation and a trailing
 * newline. Books and members are written in map order.
 */
export function serializeSnapshot(snapshot: LibrarySnapshot): string {
  return [
    "{",
    `${INDENT}"books": ${keyedSection(snapshot.books, encodeBook)},`,
    `${INDENT}"members": ${keyedSection(snapshot.members, encodeMember)}`,
    "}",
    "",
  ].join("\n");
}

// ── Decoding ────────────────────────────────────────────────────────────────

interface SectionEntry {
  /** The mapping key, or `null` for entries of a legacy list. */
  key: string | null;
  label: string;
  value: unknown;
}

function detectShape(
  section: string,
  raw: unknown,
  keyOrder: readonly string[],
  problems: string[],
): { shape: SectionShape; entries: SectionEntry[] } {
  if (raw === undefined || raw === null) {
    return { shape: "absent", entries: [] };
  }

  if (Array.isArray(raw)) {
    return {
      shape: "legacy-list",
      entries: raw.map((value, index) => ({
        key: null,
        label: `${section}[${index}]`,
        value,
      })),
    };
  }

  if (typeof raw === "object") {
    const values = new Map(Object.entries(raw));
    const keys = new Set([...keyOrder, ...values.keys()]);
    return {
      shape: "keyed",
      entries: [...keys]
        .filter((key) => values.has(key))
        .map((key) => ({
          key,
          label: `${section}["${key}"]`,
          value: values.get(key),
        })),
    };
  }

  problems.push(`"${section}" must be an object keyed by id or a list`);
  return { shape: "absent", entries: [] };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "record";
      return `${where} ${issue.message}`;
    })
    .join(", ");
}

function decodeSection<R, T>(
  section: string,
  raw: unknown,
  keyOrder: readonly string[],
  schema: z.ZodType<R, z.ZodTypeDef, unknown>,
  idOf: (record: R) => string,
  toEntity: (record: R, label: string, problems: string[]) => T | null,
  problems: string[],
): { shape: SectionShape; entities: Map<string, T> } {
  const { shape, entries } = detectShape(section, raw, keyOrder, problems);
  const entities = new Map<string, T>();

  for (const entry of entries) {
    const parsed = schema.safeParse(entry.value);
    if (!parsed.success) {
      problems.push(`${entry.label}: ${formatIssues(parsed.error)}`);
      continue;
    }

    const id = idOf(parsed.data);
    if (entry.key !== null && entry.key !== id) {
      problems.push(`${entry.label}: carries id "${id}"`);
      continue;
    }
    if (entities.has(id)) {
      problems.push(`${entry.label}: duplicate id "${id}"`);
      continue;
    }

    const entity = toEntity(parsed.data, entry.label, problems);
    if (entity !== null) {
      entities.set(id, entity);
    }
  }

  return { shape, entities };
}

function toBook(
  record: BookRecord,
  label: string,
  problems: string[],
): Book | null {
  const details = {
    bookId: record.book_id,
    title: record.title,
    author: record.author,
  };

  if (record.is_available) {
    if (record.borrower !== null || record.due_date !== null) {
      problems.push(`${label}: available but has a borrower or due date`);
      return null;
    }
    return { ...details, isAvailable: true, borrower: null, dueDate: null };
  }

  if (record.borrower === null || record.due_date === null) {
    problems.push(`${label}: borrowed but missing a borrower or due date`);
    return null;
  }
  return {
    ...details,
    isAvailable: false,
    borrower: record.borrower,
    dueDate: record.due_date,
  };
}

function toMember(record: MemberRecord): Member {
  return {
    memberId: record.member_id,
    name: record.name,
    email: record.email,
    borrowedBooks: record.borrowed_books,
  };
}

/**
 * Decode a parsed JSON document in either the keyed or the legacy list
 * shape into a snapshot keyed by id.
 *
 * @param location Used only in the error message.
 * @param keyOrder Document order of each keyed section's ids. Without it,
 *   entries follow the parsed object's own key order.
 * @throws CorruptStoreError listing every record that could not be decoded.
 */
export function decodeSnapshot(
  raw: unknown,
  location: string,
  keyOrder: SectionKeyOrder = new Map(),
): DecodedSnapshot {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new CorruptStoreError(location, [
      "top level must be an object with \"books\" and \"members\"",
    ]);
  }

  const problems: string[] = [];
  const document = new Map(Object.entries(raw));

  const books = decodeSection(
    "books",
    document.get("books"),
    keyOrder.get("books") ?? [],
    BookRecordSchema,
    (record) => record.book_id,
    toBook,
    problems,
  );
  const members = decodeSection(
    "members",
    document.get("members"),
    keyOrder.get("members") ?? [],
    MemberRecordSchema,
    (record) => record.member_id,
    toMember,
    problems,
  );

  if (problems.length > 0) {
    throw new CorruptStoreError(location, problems);
  }

  return {
    snapshot: { books: books.entities, members: members.entities },
    shapes: { books: books.shape, members: members.shape },
  };
}

/**
 * Parse and decode JSON text, keeping the order in which the text lists each
 * keyed section's ids.
 *
 * @throws CorruptStoreError if the text is not JSON or does not decode.
 */
export function parseSnapshot(text: string, location: string): DecodedSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CorruptStoreError(location, [`invalid JSON: ${reason}`], {
      cause: err,
    });
  }

  return decodeSnapshot(raw, location, readSectionKeyOrder(text, SECTIONS));
}
