/**
 * Tests for errors.ts — envelopes and kind mapping.
 */

import { describe, it, expect } from "vitest";
import { LedgerError } from "@potledger/ledger";
import { CurrencyError } from "@potledger/currency";
import {
  createErrorEnvelope,
  errorKind,
  isDomainError,
  toErrorEnvelope,
} from "../src/errors.js";

describe("errorKind", () => {
  it("groups codes by what the caller can do", () => {
    expect(errorKind("POT_NOT_FOUND")).toBe("NOT_FOUND");
    expect(errorKind("UNKNOWN_CURRENCY")).toBe("NOT_FOUND");
    expect(errorKind("POT_OWNERSHIP_MISMATCH")).toBe("OWNERSHIP_VIOLATION");
    expect(errorKind("SAME_POT")).toBe("VALIDATION");
    expect(errorKind("STORE_BUSY")).toBe("CONFLICT");
    expect(errorKind("STORAGE_FAILURE")).toBe("STORAGE");
  });

  it("falls back to INTERNAL", () => {
    expect(errorKind("SOMETHING_ELSE")).toBe("INTERNAL");
  });
});

describe("createErrorEnvelope", () => {
  it("omits details when none are given", () => {
    expect(createErrorEnvelope("SAME_ACCOUNT", "nope")).toEqual({
      error: { code: "SAME_ACCOUNT", kind: "VALIDATION", message: "nope" },
    });
  });

  it("includes details when given", () => {
    const envelope = createErrorEnvelope("POT_NOT_FOUND", "missing", { potId: 9 });
    expect(envelope.error.details).toEqual({ potId: 9 });
  });
});

describe("toErrorEnvelope", () => {
  it("keeps code and details of a ledger error", () => {
    const err = new LedgerError("INSUFFICIENT_FUNDS", "Not enough", { accountId: 1 });
    expect(toErrorEnvelope(err)).toEqual({
      error: {
        code: "INSUFFICIENT_FUNDS",
        kind: "INSUFFICIENT_FUNDS",
        message: "Not enough",
        details: { accountId: 1 },
      },
    });
  });

  it("keeps code of a currency error", () => {
    const err = new CurrencyError("DUPLICATE_CURRENCY", "GBP exists");
    expect(toErrorEnvelope(err)).toEqual({
      error: { code: "DUPLICATE_CURRENCY", kind: "CONFLICT", message: "GBP exists" },
    });
  });

  it("hides the message of anything else", () => {
    expect(toErrorEnvelope(new TypeError("secret internals"))).toEqual({
      error: { code: "INTERNAL_ERROR", kind: "INTERNAL", message: "Internal error" },
    });
    expect(toErrorEnvelope("a string")).toEqual({
      error: { code: "INTERNAL_ERROR", kind: "INTERNAL", message: "Internal error" },
    });
  });
});

describe("isDomainError", () => {
  it("recognizes both domain error classes", () => {
    expect(isDomainError(new LedgerError("STORE_BUSY", "busy"))).toBe(true);
    expect(isDomainError(new CurrencyError("INVALID_RATE", "bad"))).toBe(true);
    expect(isDomainError(new Error("plain"))).toBe(false);
  });
});
