/**
 * @potledger/ledger — In-memory LedgerStore.
 *
 * Committed state lives in Maps. Each unit of work is staged in a
 * session and applied in one step when the callback returns.
 * Suitable for tests, development, and as the base of snapshot persistence.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { LedgerTables } from "./tables.js";
import type {
  LedgerReader,
  LedgerSession,
  LedgerSnapshot,
  LedgerState,
  LedgerStore,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a state.
 */
export function computeStateHash(state: LedgerState): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/**
 * Verify that a snapshot's stateHash matches its state.
 */
export function verifySnapshotIntegrity(snapshot: LedgerSnapshot): boolean {
  if (snapshot.stateHash === "") {
    return false;
  }
  return snapshot.stateHash === computeStateHash(snapshot.state);
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly _tables = new LedgerTables();
  private _busy = false;
  private _closed = false;

  read<T>(fn: (reader: LedgerReader) => T): T {
    this._assertOpen();
    return fn(this._tables.reader());
  }

  transaction<T>(fn: (session: LedgerSession) => T): T {
    this._assertOpen();
    if (this._busy) {
      throw new LedgerError("STORE_BUSY", "A unit of work is already active on this store");
    }

    this._busy = true;
    try {
      const session = this._tables.openSession();
      const result = fn(session);
      this._tables.commit(session);
      return result;
    } finally {
      this._busy = false;
    }
  }

  close(): void {
    this._closed = true;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the committed state.
   * Can be restored with InMemoryLedgerStore.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    this._assertOpen();
    const state = this._tables.toState();
    return {
      version: 1,
      state,
      stateHash: computeStateHash(state),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a store from a snapshot. The state hash must match.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): InMemoryLedgerStore {
    if (!verifySnapshotIntegrity(snapshot)) {
      throw new LedgerError(
        "SNAPSHOT_INTEGRITY",
        "Snapshot state does not match its stateHash",
        { stateHash: snapshot.stateHash },
      );
    }

    const store = new InMemoryLedgerStore();
    store._tables.load(snapshot.state);
    return store;
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new LedgerError("STORE_CLOSED", "Ledger store has been closed");
    }
  }
}
