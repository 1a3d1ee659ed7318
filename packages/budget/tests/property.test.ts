/**
 * Property-based tests for ledger-wide invariants under random transfers.
 *
 * Invariants:
 * - Conservation: internal accounts change in total only by what external
 *   accounts inject
 * - Pot containment: a pot never holds more than its account
 * - Idempotent read: a balance read twice without a write agrees
 * - Atomicity: a rejected operation leaves the leg count unchanged
 */

import { describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  LedgerError,
  accountBalance,
  addDecimal,
  legCount,
  potBalance,
  toScaled,
} from "@potledger/ledger";
import { createHarness } from "./fixtures.js";
import type { Harness } from "./fixtures.js";

// ─── Arbitraries ─────────────────────────────────────────────────────────

const amountArb = fc.integer({ min: 1, max: 50_000 }).map((pence) => {
  const pounds = Math.floor(pence / 100);
  const rest = String(pence % 100).padStart(2, "0");
  return `${String(pounds)}.${rest}`;
});

type Op =
  | { readonly kind: "deposit"; readonly to: 1 | 2; readonly amount: string }
  | { readonly kind: "transfer"; readonly from: 1 | 2; readonly amount: string }
  | { readonly kind: "toPot"; readonly amount: string }
  | { readonly kind: "fromPot"; readonly amount: string }
  | { readonly kind: "unbalanced"; readonly amount: string };

const accountArb = fc.constantFrom<1 | 2>(1, 2);

const opArb: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("deposit" as const), to: accountArb, amount: amountArb }),
  fc.record({ kind: fc.constant("transfer" as const), from: accountArb, amount: amountArb }),
  fc.record({ kind: fc.constant("toPot" as const), amount: amountArb }),
  fc.record({ kind: fc.constant("fromPot" as const), amount: amountArb }),
  fc.record({ kind: fc.constant("unbalanced" as const), amount: amountArb }),
);

// ─── Helpers ─────────────────────────────────────────────────────────────

function balanceOf(h: Harness, accountId: number): bigint {
  return toScaled(h.store.read((reader) => accountBalance(reader, accountId)).amount);
}

/**
 * Apply one operation. Returns the amount injected from outside, or 0n.
 * Rejections are expected; any other error fails the property.
 */
function apply(h: Harness, op: Op): bigint {
  try {
    switch (op.kind) {
      case "deposit":
        h.engine.transferBetweenAccounts(4, op.to, op.amount);
        return toScaled(op.amount);
      case "transfer":
        h.engine.transferBetweenAccounts(op.from, op.from === 1 ? 2 : 1, op.amount);
        return 0n;
      case "toPot":
        h.engine.transferToPot(1, 1, op.amount);
        return 0n;
      case "fromPot":
        h.engine.transferFromPot(1, 1, op.amount);
        return 0n;
      case "unbalanced":
        h.engine.createMultiLegTransaction(
          [
            { accountId: 1, type: "debit", amount: op.amount },
            { accountId: 2, type: "credit", amount: addDecimal(op.amount, "0.01") },
          ],
          "Unbalanced",
        );
        return 0n;
    }
  } catch (err: unknown) {
    if (
      err instanceof LedgerError &&
      (err.code === "INSUFFICIENT_FUNDS" || err.code === "UNBALANCED_LEGS")
    ) {
      return 0n;
    }
    throw err;
  }
}

// ─── Properties ──────────────────────────────────────────────────────────

describe("ledger invariants", () => {
  it("conserves money across internal transfers", () => {
    fc.assert(
      fc.property(fc.array(opArb, { maxLength: 30 }), (ops) => {
        const h = createHarness();
        h.registry.createPot(1, "Holiday");
        let injected = 0n;

        for (const op of ops) {
          injected += apply(h, op);
          expect(balanceOf(h, 1) + balanceOf(h, 2)).toBe(injected);
          expect(balanceOf(h, 4)).toBe(-injected);
        }
      }),
      { numRuns: 50 },
    );
  });

  it("keeps every pot within its account when funds are checked", () => {
    fc.assert(
      fc.property(fc.array(opArb, { maxLength: 30 }), (ops) => {
        const h = createHarness({
          overdraft: { blockedTypes: ["current", "savings"] },
          funds: "available",
        });
        h.registry.createPot(1, "Holiday");

        for (const op of ops) {
          apply(h, op);
          const potAmount = toScaled(h.store.read((reader) => potBalance(reader, 1)).amount);
          expect(potAmount >= 0n).toBe(true);
          expect(potAmount <= balanceOf(h, 1)).toBe(true);
        }
      }),
      { numRuns: 50 },
    );
  });

  it("reads the same balance twice without a write in between", () => {
    fc.assert(
      fc.property(fc.array(opArb, { maxLength: 15 }), (ops) => {
        const h = createHarness();
        h.registry.createPot(1, "Holiday");
        for (const op of ops) apply(h, op);

        const first = h.store.read((reader) => accountBalance(reader, 1));
        const second = h.store.read((reader) => accountBalance(reader, 1));
        expect(second).toEqual(first);
      }),
      { numRuns: 30 },
    );
  });

  it("persists no legs for rejected operations", () => {
    fc.assert(
      fc.property(amountArb, (amount) => {
        const h = createHarness();
        h.registry.createPot(1, "Holiday");
        const before = h.store.read((reader) => legCount(reader));

        apply(h, { kind: "unbalanced", amount });
        apply(h, { kind: "fromPot", amount });

        expect(h.store.read((reader) => legCount(reader))).toBe(before);
      }),
      { numRuns: 30 },
    );
  });
});
