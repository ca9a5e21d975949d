// ---------------------------------------------------------------------------
// Single-file JSON snapshot store.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import type { LibrarySnapshot, SnapshotStore } from "../core/types.js";
import { PersistenceError } from "../core/errors.js";
import { parseSnapshot, serializeSnapshot } from "./snapshot-codec.js";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Keeps the whole library in one human-readable JSON file. Every `save`
 * rewrites the file from scratch; every `load` reads it in full. The file is
 * never held open between calls.
 */
export class JsonFileSnapshotStore implements SnapshotStore {
  public readonly location: string;
  private readonly logger: Logger | undefined;

  constructor(filePath: string, logger?: Logger) {
    this.location = path.resolve(filePath);
    this.logger = logger?.child({ component: "json-file-store" });
  }

  load(): LibrarySnapshot | null {
    let text: string;
    try {
      text = fs.readFileSync(this.location, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new PersistenceError(
        `Could not read library data from ${this.location}`,
        this.location,
        { cause: err },
      );
    }

    const { snapshot, shapes } = parseSnapshot(text, this.location);

    if (shapes.books === "legacy-list" || shapes.members === "legacy-list") {
      this.logger?.info(
        { file: this.location, shapes },
        "read legacy list-shaped sections; the next save writes them keyed by id",
      );
    }

    return snapshot;
  }

  save(snapshot: LibrarySnapshot): void {
    const text = serializeSnapshot(snapshot);
    try {
      fs.writeFileSync(this.location, text, "utf-8");
    } catch (err) {
      throw new PersistenceError(
        `Could not write library data to ${this.location}`,
        this.location,
        { cause: err },
      );
    }

    this.logger?.debug(
      {
        file: this.location,
        books: snapshot.books.size,
        members: snapshot.members.size,
      },
      "library saved",
    );
  }
}
