// ---------------------------------------------------------------------------
// In-process SnapshotStore for tests.
// Keeps the encoded JSON text so loads go through the same codec as files.
// ---------------------------------------------------------------------------

import type { LibrarySnapshot, SnapshotStore } from "../../src/core/types.js";
import { PersistenceError } from "../../src/core/errors.js";
import {
  parseSnapshot,
  serializeSnapshot,
} from "../../src/persistence/snapshot-codec.js";
import type { PersistedLibrary } from "../../src/persistence/snapshot-codec.js";

export class MemorySnapshotStore implements SnapshotStore {
  public readonly location = "memory://library";
  public saves = 0;
  public failSaves = false;
  private text: string | null;

  /** @param initial A document to start from, in any shape the codec reads. */
  constructor(initial?: unknown) {
    this.text = initial === undefined ? null : JSON.stringify(initial);
  }

  load(): LibrarySnapshot | null {
    if (this.text === null) return null;
    return parseSnapshot(this.text, this.location).snapshot;
  }

  save(snapshot: LibrarySnapshot): void {
    if (this.failSaves) {
      throw new PersistenceError("simulated write failure", this.location);
    }
    this.text = serializeSnapshot(snapshot);
    this.saves++;
  }

  /** The last saved document, or `null` if nothing was written. */
  persisted(): PersistedLibrary | null {
    return this.text === null ? null : JSON.parse(this.text);
  }
}
