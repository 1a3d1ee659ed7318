/**
 * @potledger/ledger — File-based JSONL LedgerStore.
 *
 * Each committed unit of work is one JSON line:
 * {"seq":1,"committedAt":"...","sequences":{...},"changes":[{"op":"insert","table":"accounts","record":{...}}]}
 *
 * Crash safety:
 * - A unit is written in full and fsynced before it is applied in memory,
 *   so a reader never sees a transaction without its legs
 * - A failed write is truncated back off the file
 * - A torn final line (crash mid-write) is dropped on open
 * - A corrupt line anywhere else fails the open with STORAGE_FAILURE
 * - The file is the source of truth; in-memory state is derived
 */

import {
  closeSync,
  existsSync,
  fstatSync,
  fsyncSync,
  ftruncateSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import { CommitLineSchema } from "./schemas.js";
import type { CommitLine } from "./schemas.js";
import { LedgerTables } from "./tables.js";
import type {
  ChangeRecord,
  LedgerReader,
  LedgerSession,
  LedgerStore,
  Sequences,
} from "./types.js";
import { LedgerError } from "./types.js";

export interface JsonlLedgerStoreOptions {
  /** Path to the JSONL file. Created on first commit if missing. */
  readonly filePath: string;
}

interface CommitRecord {
  readonly seq: number;
  readonly committedAt: string;
  readonly sequences: Sequences;
  readonly changes: readonly ChangeRecord[];
}

export class JsonlLedgerStore implements LedgerStore {
  private readonly _filePath: string;
  private readonly _tables = new LedgerTables();
  private _fd: number | undefined;
  private _seq = 0;
  private _busy = false;

  /**
   * Open (or create) the ledger file and replay it.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlLedgerStoreOptions) {
    this._filePath = options.filePath;

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      this._loadFromFile();
      this._fd = openSync(this._filePath, "a");
    } catch (err: unknown) {
      if (err instanceof LedgerError) throw err;
      throw new LedgerError(
        "STORAGE_FAILURE",
        `Cannot open ledger file "${this._filePath}"`,
        { filePath: this._filePath },
        { cause: err },
      );
    }
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Number of committed units in the file. */
  get commitCount(): number {
    return this._seq;
  }

  read<T>(fn: (reader: LedgerReader) => T): T {
    this._assertOpen();
    return fn(this._tables.reader());
  }

  transaction<T>(fn: (session: LedgerSession) => T): T {
    const fd = this._assertOpen();
    if (this._busy) {
      throw new LedgerError("STORE_BUSY", "A unit of work is already active on this store");
    }

    this._busy = true;
    try {
      const session = this._tables.openSession();
      const result = fn(session);

      if (session.changes.length > 0) {
        const line: CommitRecord = {
          seq: this._seq + 1,
          committedAt: new Date().toISOString(),
          sequences: session.sequences,
          changes: session.changes,
        };
        this._write(fd, `${JSON.stringify(line)}\n`);
        this._seq = line.seq;
        this._tables.commit(session);
      }

      return result;
    } finally {
      this._busy = false;
    }
  }

  close(): void {
    if (this._fd !== undefined) {
      closeSync(this._fd);
      this._fd = undefined;
    }
  }

  // ─── Private ───────────────────────────────────────────────────────────

  private _assertOpen(): number {
    if (this._fd === undefined) {
      throw new LedgerError("STORE_CLOSED", "Ledger store has been closed", {
        filePath: this._filePath,
      });
    }
    return this._fd;
  }

  /**
   * Append the whole line or nothing. writeSync may accept fewer bytes than
   * asked, so keep writing until the buffer is drained; on failure cut the
   * file back to its length before the write.
   */
  private _write(fd: number, data: string): void {
    const bytes = Buffer.from(data, "utf-8");
    let start: number | undefined;
    try {
      start = fstatSync(fd).size;
      let offset = 0;
      while (offset < bytes.length) {
        offset += writeSync(fd, bytes, offset, bytes.length - offset);
      }
      fsyncSync(fd);
    } catch (err: unknown) {
      if (start !== undefined) {
        this._rollback(fd, start);
      }
      throw new LedgerError(
        "STORAGE_FAILURE",
        `Failed to append to ledger file "${this._filePath}"`,
        { filePath: this._filePath },
        { cause: err },
      );
    }
  }

  /**
   * Drop a partially written line. If even that fails the file may end in
   * garbage, so the store closes rather than append after it.
   */
  private _rollback(fd: number, length: number): void {
    try {
      ftruncateSync(fd, length);
      fsyncSync(fd);
    } catch (err: unknown) {
      this.close();
      throw new LedgerError(
        "STORAGE_FAILURE",
        `Failed to roll back a partial append to "${this._filePath}"; store closed`,
        { filePath: this._filePath, length },
        { cause: err },
      );
    }
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    const lines = content.split("\n");
    // Everything after the last newline was never fully written.
    const tail = lines.pop() ?? "";

    lines.forEach((line, index) => {
      if (line.trim().length === 0) {
        return;
      }
      const commit = this._parseLine(line);
      if (commit === undefined) {
        throw new LedgerError(
          "STORAGE_FAILURE",
          `Corrupt record on line ${String(index + 1)} of "${this._filePath}"`,
          { filePath: this._filePath, line: index + 1 },
        );
      }
      this._tables.apply(commit.changes, commit.sequences);
      this._seq = commit.seq;
    });

    if (tail.length > 0) {
      const intact = content.length - tail.length;
      truncateSync(this._filePath, Buffer.byteLength(content.slice(0, intact), "utf-8"));
    }
  }

  private _parseLine(line: string): CommitLine | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return undefined;
    }
    const parsed = CommitLineSchema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  }
}
