/**
 * Tests for balance arithmetic.
 *
 * Covers:
 * - Minor-unit conversion
 * - Coercion of malformed stored amounts
 * - Zero floor on balances
 * - Exact sums
 */

import { describe, it, expect } from "vitest";
import {
  MAX_AMOUNT,
  toMinor,
  fromMinor,
  coerceAmount,
  clampBalance,
  applyAmounts,
  sumAmounts,
  hasMinorPrecision,
} from "../src/money-math.js";

// ─── Conversion ──────────────────────────────────────────────────────────

describe("toMinor / fromMinor", () => {
  it("converts to integer minor units", () => {
    expect(toMinor(12.34)).toBe(1234);
    expect(toMinor(0.1 + 0.2)).toBe(30);
  });

  it("converts back to major units", () => {
    expect(fromMinor(1234)).toBe(12.34);
    expect(fromMinor(0)).toBe(0);
  });

  it("never returns negative zero", () => {
    expect(Object.is(fromMinor(-0), 0)).toBe(true);
  });
});

// ─── coerceAmount ────────────────────────────────────────────────────────

describe("coerceAmount", () => {
  it("keeps valid non-negative numbers", () => {
    expect(coerceAmount(500)).toBe(500);
    expect(coerceAmount(19.99)).toBe(19.99);
  });

  it("parses numeric strings", () => {
    expect(coerceAmount("250.50")).toBe(250.5);
    expect(coerceAmount(" 75 ")).toBe(75);
  });

  it("turns malformed values into zero", () => {
    expect(coerceAmount("abc")).toBe(0);
    expect(coerceAmount("")).toBe(0);
    expect(coerceAmount(Number.NaN)).toBe(0);
    expect(coerceAmount(Number.POSITIVE_INFINITY)).toBe(0);
    expect(coerceAmount(null)).toBe(0);
    expect(coerceAmount(undefined)).toBe(0);
    expect(coerceAmount({ amount: 5 })).toBe(0);
  });

  it("turns negative values into zero", () => {
    expect(coerceAmount(-10)).toBe(0);
    expect(coerceAmount("-10")).toBe(0);
  });

  it("rounds to two decimals", () => {
    expect(coerceAmount(10.005)).toBe(10.01);
    expect(coerceAmount(3.14159)).toBe(3.14);
  });
});

// ─── Balances ────────────────────────────────────────────────────────────

describe("clampBalance", () => {
  it("floors at zero", () => {
    expect(clampBalance(-5)).toBe(0);
    expect(clampBalance(0)).toBe(0);
    expect(clampBalance(42)).toBe(42);
  });
});

describe("applyAmounts", () => {
  it("adds credits and subtracts debits", () => {
    expect(applyAmounts(1000, 500, 0)).toBe(1500);
    expect(applyAmounts(1500, 0, 200)).toBe(1300);
  });

  it("floors the result at zero", () => {
    expect(applyAmounts(100, 0, 250)).toBe(0);
  });

  it("does not drift on fractional amounts", () => {
    expect(applyAmounts(0.1, 0.2, 0)).toBe(0.3);
    expect(applyAmounts(100.1, 0, 0.3)).toBe(99.8);
  });
});

describe("sumAmounts", () => {
  it("sums exactly", () => {
    expect(sumAmounts([0.1, 0.2, 0.3])).toBe(0.6);
    expect(sumAmounts([])).toBe(0);
  });
});

describe("MAX_AMOUNT", () => {
  it("keeps a thousand maximal amounts exact in minor units", () => {
    expect(Number.isSafeInteger(toMinor(MAX_AMOUNT) * 1000)).toBe(true);
  });
});

describe("hasMinorPrecision", () => {
  it("accepts at most two fractional digits", () => {
    expect(hasMinorPrecision(10)).toBe(true);
    expect(hasMinorPrecision(10.25)).toBe(true);
    expect(hasMinorPrecision(10.255)).toBe(false);
    expect(hasMinorPrecision(Number.NaN)).toBe(false);
  });
});
