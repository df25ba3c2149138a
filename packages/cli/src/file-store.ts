/**
 * meshid: JSON file store.
 *
 * An in-memory store loaded from, and saved back to, a snapshot file.
 * Saving writes a temporary file beside the target and renames it over the
 * original, so readers never see a half-written store.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { InMemoryDIDStore, SnapshotInvalidError } from "@meshid/core";

export class JsonFileDIDStore extends InMemoryDIDStore {
  private constructor(readonly path: string) {
    super();
  }

  /**
   * Open the store at `path`; a missing file is an empty store.
   * @throws {SnapshotInvalidError} If the file is not a valid snapshot.
   */
  static open(path: string): JsonFileDIDStore {
    const store = new JsonFileDIDStore(path);
    if (!existsSync(path)) {
      return store;
    }

    const text = readFileSync(path, "utf8");
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new SnapshotInvalidError(`Identity store ${path} is not valid JSON`, {
        path,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
    store.loadSnapshot(data);
    return store;
  }

  save(): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    writeFileSync(tmp, JSON.stringify(this.exportSnapshot(), null, 2) + "\n", "utf8");
    renameSync(tmp, this.path);
  }
}
