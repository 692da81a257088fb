// =============================================================================
// @rss-courier/shared — Seen-item tracker
// =============================================================================
// Persisted set of entry ids that have already been delivered. Loaded once
// at startup; every markSeen() flushes so a crash loses at most the entry in
// flight. Writes go through a single promise chain (one writer at a time)
// and land atomically via temp file + rename.
// =============================================================================

import fs from "node:fs/promises";
import path from "node:path";
import { StorageError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { SeenStoreFileSchema, type SeenStoreFile } from "../schemas.js";

export interface SeenStoreOptions {
  path: string;
  /** Load the file but never write it (dry runs). */
  readOnly?: boolean;
  logger?: Logger;
}

export interface SeenStoreLoadResult {
  count: number;
  /** Set when the file existed but could not be used; the store starts empty. */
  error?: StorageError;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class SeenStore {
  readonly path: string;
  private readonly readOnly: boolean;
  private readonly logger: Logger;
  private readonly ids = new Set<string>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: SeenStoreOptions) {
    this.path = options.path;
    this.readOnly = options.readOnly ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.ids.size;
  }

  /**
   * Reads the persisted set. A missing file is an empty store. An unreadable
   * or corrupt file is reported and also treated as empty: a duplicate DM is
   * preferable to delivering nothing.
   */
  async load(): Promise<SeenStoreLoadResult> {
    this.ids.clear();

    let raw: string;
    try {
      raw = await fs.readFile(this.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.info("No seen store yet, starting empty", {
          path: this.path,
        });
        return { count: 0 };
      }
      return this.loadFailed(`Cannot read seen store: ${errorMessage(err)}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      return this.loadFailed(`Seen store is not valid JSON: ${errorMessage(err)}`, err);
    }

    const parsed = SeenStoreFileSchema.safeParse(json);
    if (!parsed.success) {
      return this.loadFailed(
        `Seen store has an unexpected shape: ${parsed.error.issues
          .map((i) => `${i.path.join(".") || "(root)"} ${i.message}`)
          .join("; ")}`,
        parsed.error,
      );
    }

    for (const id of parsed.data.ids) this.ids.add(id);
    this.logger.info("Seen store loaded", { path: this.path, count: this.ids.size });
    return { count: this.ids.size };
  }

  private loadFailed(message: string, cause: unknown): SeenStoreLoadResult {
    const error = new StorageError(this.path, message, { cause });
    this.logger.warn("Seen store unusable, treating as empty", {
      path: this.path,
      error: error.message,
    });
    return { count: 0, error };
  }

  isNew(id: string): boolean {
    return !this.ids.has(id);
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  /** Adds the id and persists the set. Rejects with StorageError on write failure. */
  async markSeen(id: string): Promise<void> {
    this.ids.add(id);
    await this.flush();
  }

  /**
   * Queues a write of the current set behind any write already in flight.
   * The snapshot is taken when the write runs, so the last flush always
   * persists every id added before it.
   */
  flush(): Promise<void> {
    if (this.readOnly) return Promise.resolve();

    const next = this.writeChain.then(() => this.writeSnapshot());
    // Keep the chain alive after a failed write; the failure itself is
    // delivered to whoever awaited this flush.
    this.writeChain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async writeSnapshot(): Promise<void> {
    const snapshot: SeenStoreFile = {
      version: 1,
      updatedAt: new Date().toISOString(),
      ids: [...this.ids],
    };
    const tmp = `${this.path}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(snapshot, null, 2) + "\n", "utf-8");
      await fs.rename(tmp, this.path);
    } catch (err) {
      throw new StorageError(
        this.path,
        `Cannot write seen store: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}
