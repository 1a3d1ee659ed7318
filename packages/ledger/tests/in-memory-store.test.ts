/**
 * Tests for InMemoryLedgerStore.
 *
 * Covers:
 * - Atomic units of work (commit on return, discard on throw)
 * - Serialised units and closed-store errors
 * - Record conflicts
 * - Snapshot round trip and tamper detection
 */

import { beforeEach, describe, expect, it } from "vitest";
import { accountBalance } from "../src/balance-calculator.js";
import { InMemoryLedgerStore, verifySnapshotIntegrity } from "../src/in-memory-store.js";
import { appendTransaction, legCount } from "../src/journal.js";
import { LedgerError } from "../src/types.js";
import { GBP, TS, credit, debit, seedChart } from "./fixtures.js";

let store: InMemoryLedgerStore;

beforeEach(() => {
  store = new InMemoryLedgerStore();
  seedChart(store);
});

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err: unknown) {
    return err instanceof LedgerError ? err.code : undefined;
  }
  return undefined;
}

// ─── Units of work ───────────────────────────────────────────────────────

describe("transaction", () => {
  it("returns the callback's result", () => {
    expect(store.transaction(() => 42)).toBe(42);
  });

  it("discards every staged write when the callback throws", () => {
    expect(() =>
      store.transaction((session) => {
        appendTransaction(session, {
          description: "Rent",
          date: "2024-01-01",
          currency: "GBP",
          legs: [debit(1, "500"), credit(2, "500")],
        });
        throw new Error("abort");
      }),
    ).toThrow("abort");

    expect(store.read((reader) => legCount(reader))).toBe(0);
    expect(store.read((reader) => accountBalance(reader, 1)).amount).toBe("0.00");
  });

  it("does not consume ids in a discarded unit", () => {
    expect(() =>
      store.transaction((session) => {
        session.nextId("accounts");
        throw new Error("abort");
      }),
    ).toThrow("abort");

    const next = store.transaction((session) => session.nextId("accounts"));
    expect(next).toBe(5);
  });

  it("shows staged writes inside the unit only", () => {
    store.transaction((session) => {
      session.accounts.insert({
        id: session.nextId("accounts"),
        name: "Wallet",
        type: "current",
        currency: "GBP",
        external: false,
        createdAt: TS,
      });
      expect(session.accounts.count()).toBe(5);
      expect(store.read((reader) => reader.accounts.count())).toBe(4);
    });

    expect(store.read((reader) => reader.accounts.get(5)?.name)).toBe("Wallet");
  });

  it("refuses a nested unit", () => {
    const code = codeOf(() => store.transaction(() => store.transaction(() => 1)));
    expect(code).toBe("STORE_BUSY");
    expect(store.transaction(() => "free again")).toBe("free again");
  });

  it("refuses duplicate inserts and replacing missing records", () => {
    expect(codeOf(() => store.transaction((session) => session.currencies.insert(GBP)))).toBe(
      "RECORD_CONFLICT",
    );
    expect(
      codeOf(() =>
        store.transaction((session) => session.currencies.replace({ ...GBP, code: "EUR" })),
      ),
    ).toBe("RECORD_CONFLICT");
  });

  it("replaces an existing record", () => {
    store.transaction((session) => session.currencies.replace({ ...GBP, active: false }));
    expect(store.read((reader) => reader.currencies.get("GBP")?.active)).toBe(false);
  });
});

describe("close", () => {
  it("rejects reads and writes afterwards", () => {
    store.close();
    expect(codeOf(() => store.read(() => 1))).toBe("STORE_CLOSED");
    expect(codeOf(() => store.transaction(() => 1))).toBe("STORE_CLOSED");
  });
});

// ─── Snapshots ───────────────────────────────────────────────────────────

describe("snapshot", () => {
  beforeEach(() => {
    store.transaction((session) =>
      appendTransaction(
        session,
        {
          description: "Salary",
          date: "2024-01-31",
          currency: "GBP",
          legs: [debit(4, "2500"), credit(1, "2500")],
        },
        TS,
      ),
    );
  });

  it("restores identical state", () => {
    const snapshot = store.snapshot();
    expect(verifySnapshotIntegrity(snapshot)).toBe(true);

    const restored = InMemoryLedgerStore.fromSnapshot(snapshot);
    expect(restored.read((reader) => accountBalance(reader, 1)).amount).toBe("2500.00");
    expect(restored.snapshot().stateHash).toBe(snapshot.stateHash);
  });

  it("continues id sequences after a restore", () => {
    const restored = InMemoryLedgerStore.fromSnapshot(store.snapshot());
    const tx = restored.transaction((session) =>
      appendTransaction(session, {
        description: "Transfer",
        date: "2024-02-01",
        currency: "GBP",
        legs: [debit(1, "10"), credit(2, "10")],
      }),
    );
    expect(tx.id).toBe(2);
    expect(tx.legs.map((leg) => leg.id)).toEqual([3, 4]);
  });

  it("rejects a tampered snapshot", () => {
    const snapshot = store.snapshot();
    const tampered = {
      ...snapshot,
      state: { ...snapshot.state, accounts: snapshot.state.accounts.slice(1) },
    };

    expect(verifySnapshotIntegrity(tampered)).toBe(false);
    expect(codeOf(() => InMemoryLedgerStore.fromSnapshot(tampered))).toBe("SNAPSHOT_INTEGRITY");
  });

  it("rejects a snapshot with no hash", () => {
    expect(verifySnapshotIntegrity({ ...store.snapshot(), stateHash: "" })).toBe(false);
  });
});
