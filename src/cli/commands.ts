// ---------------------------------------------------------------------------
// Command dispatch for the lending-desk CLI.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";
import type { Logger } from "pino";
import type { AppConfig } from "../core/types.js";
import { LendingFailure } from "../core/types.js";
import { LendingDeskError } from "../core/errors.js";
import type { Library } from "../library/library.js";
import { openLibrary } from "../app.js";
import {
  formatBookTable,
  formatMemberTable,
  formatMoney,
  formatSearchResults,
} from "./format.js";

export const ExitCode = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliContext {
  config: AppConfig;
  logger: Logger;
  io: CliIo;
  now?: () => Date;
}

interface Command {
  usage: string;
  arity: number;
  run: (library: Library, args: string[], io: CliIo) => ExitCode;
}

// ── Commands ────────────────────────────────────────────────────────────────

function describeFailure(
  reason: LendingFailure,
  bookId: string,
  memberId?: string,
): string {
  switch (reason) {
    case LendingFailure.DUPLICATE_ID:
      return `Id ${memberId ?? bookId} is already in use.`;
    case LendingFailure.UNKNOWN_BOOK:
      return `No book with id ${bookId}.`;
    case LendingFailure.UNKNOWN_MEMBER:
      return `No member with id ${memberId ?? ""}.`;
    case LendingFailure.BOOK_UNAVAILABLE:
      return `Book ${bookId} is already borrowed.`;
    case LendingFailure.BOOK_NOT_BORROWED:
      return `Book ${bookId} is not borrowed.`;
  }
}

function returnBook(library: Library, bookId: string, io: CliIo): ExitCode {
  const result = library.returnBook(bookId);
  if (!result.success) {
    io.err(describeFailure(result.reason, bookId));
    return ExitCode.FAILED;
  }
  io.out(
    result.fine > 0
      ? `Book returned successfully. Fine due: ${formatMoney(result.fine)}`
      : "Book returned successfully. No fine due.",
  );
  return ExitCode.OK;
}

function printCatalog(library: Library, io: CliIo): void {
  io.out("Library Books:");
  formatBookTable(library.books.values(), library.members).forEach(io.out);
}

function printSearch(library: Library, query: string, io: CliIo): void {
  formatSearchResults(query, library.searchBooks(query), library.members).forEach(
    io.out,
  );
}

const COMMANDS = new Map<string, Command>([
  [
    "add-book",
    {
      usage: "add-book <id> <title> <author>",
      arity: 3,
      run: (library, [id = "", title = "", author = ""], io) => {
        const result = library.addBook(id, title, author);
        if (!result.success) {
          io.err(describeFailure(result.reason, id));
          return ExitCode.FAILED;
        }
        io.out(`Added book ${id}.`);
        return ExitCode.OK;
      },
    },
  ],
  [
    "add-member",
    {
      usage: "add-member <id> <name> <email>",
      arity: 3,
      run: (library, [id = "", name = "", email = ""], io) => {
        const result = library.addMember(id, name, email);
        if (!result.success) {
          io.err(describeFailure(result.reason, id));
          return ExitCode.FAILED;
        }
        io.out(`Added member ${id}.`);
        return ExitCode.OK;
      },
    },
  ],
  [
    "borrow",
    {
      usage: "borrow <bookId> <memberId>",
      arity: 2,
      run: (library, [bookId = "", memberId = ""], io) => {
        const result = library.borrowBook(bookId, memberId);
        if (!result.success) {
          io.err(describeFailure(result.reason, bookId, memberId));
          return ExitCode.FAILED;
        }
        io.out(`Book ${bookId} borrowed by ${memberId}. Due: ${result.dueDate}`);
        return ExitCode.OK;
      },
    },
  ],
  [
    "return",
    {
      usage: "return <bookId>",
      arity: 1,
      run: (library, [bookId = ""], io) => returnBook(library, bookId, io),
    },
  ],
  [
    "fine",
    {
      usage: "fine <bookId>",
      arity: 1,
      run: (library, [bookId = ""], io) => {
        if (!library.getBook(bookId)) {
          io.err(describeFailure(LendingFailure.UNKNOWN_BOOK, bookId));
          return ExitCode.FAILED;
        }
        io.out(
          `Fine accrued on ${bookId}: ${formatMoney(library.calculateFine(bookId))}`,
        );
        return ExitCode.OK;
      },
    },
  ],
  [
    "search",
    {
      usage: "search <query>",
      arity: 1,
      run: (library, [query = ""], io) => {
        printSearch(library, query, io);
        return ExitCode.OK;
      },
    },
  ],
  [
    "books",
    {
      usage: "books",
      arity: 0,
      run: (library, _args, io) => {
        printCatalog(library, io);
        return ExitCode.OK;
      },
    },
  ],
  [
    "members",
    {
      usage: "members",
      arity: 0,
      run: (library, _args, io) => {
        io.out("Library Members:");
        formatMemberTable(library.members.values()).forEach(io.out);
        return ExitCode.OK;
      },
    },
  ],
  [
    "demo",
    {
      usage: "demo",
      arity: 0,
      run: (library, _args, io) => {
        library.addBook("B1", "Python Programming", "John Smith");
        library.addBook("B2", "Data Structures", "Jane Doe");
        library.addMember("M1", "Alice Brown", "alice@example.com");
        library.borrowBook("B1", "M1");

        io.out("Searching for 'Python':");
        printSearch(library, "Python", io);

        const code = returnBook(library, "B1", io);
        printCatalog(library, io);
        return code;
      },
    },
  ],
]);

// ── Entry ───────────────────────────────────────────────────────────────────

export function usage(): string[] {
  return [
    "Usage: lending-desk <command> [args] [--data <file>]",
    "",
    "Commands:",
    ...Array.from(COMMANDS.values(), (command) => `  ${command.usage}`),
  ];
}

/**
 * Run one CLI invocation against the configured library and return the
 * process exit code.
 */
export function runCli(argv: string[], context: CliContext): ExitCode {
  const { io, logger } = context;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    usage().forEach(io.err);
    return ExitCode.USAGE;
  }

  const [name, ...args] = parsed.positionals;
  if (parsed.values.help) {
    usage().forEach(io.out);
    return ExitCode.OK;
  }
  if (name === undefined) {
    usage().forEach(io.err);
    return ExitCode.USAGE;
  }

  const command = COMMANDS.get(name);
  if (!command) {
    io.err(`Unknown command: ${name}`);
    usage().forEach(io.err);
    return ExitCode.USAGE;
  }
  if (args.length !== command.arity) {
    io.err(`Usage: lending-desk ${command.usage}`);
    return ExitCode.USAGE;
  }

  const config: AppConfig = {
    ...context.config,
    dataFile: parsed.values.data ?? context.config.dataFile,
  };

  try {
    const library = openLibrary(config, logger, context.now);
    return command.run(library, args, io);
  } catch (err) {
    if (err instanceof LendingDeskError) {
      logger.error({ err, command: name }, "command failed");
      io.err(err.message);
      return ExitCode.FAILED;
    }
    throw err;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      data: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}
