/**
 * Tests for entry ordering.
 */

import { describe, it, expect } from "vitest";
import {
  MIN_TIMESTAMP,
  entryTimestamp,
  normalizeTime,
  compareEntries,
  sortEntries,
} from "../src/ordering.js";

// =============================================================================
// entryTimestamp
// =============================================================================

describe("entryTimestamp", () => {
  it("parses date and time with seconds as wall-clock UTC", () => {
    expect(entryTimestamp("2024-03-10", "14:05:09")).toBe(
      Date.UTC(2024, 2, 10, 14, 5, 9),
    );
  });

  it("falls back to HH:MM", () => {
    expect(entryTimestamp("2024-03-10", "14:05")).toBe(Date.UTC(2024, 2, 10, 14, 5, 0));
  });

  it("accepts single-digit fields", () => {
    expect(entryTimestamp("2024-3-9", "9:5:7")).toBe(Date.UTC(2024, 2, 9, 9, 5, 7));
  });

  it("defaults a missing date and a missing time", () => {
    expect(entryTimestamp(undefined, "10:00:00")).toBe(Date.UTC(1970, 0, 1, 10, 0, 0));
    expect(entryTimestamp("2024-03-10", undefined)).toBe(Date.UTC(2024, 2, 10));
  });

  it("returns MIN_TIMESTAMP for unparseable values", () => {
    expect(entryTimestamp("10/03/2024", "10:00:00")).toBe(MIN_TIMESTAMP);
    expect(entryTimestamp("2024-03-10", "noon")).toBe(MIN_TIMESTAMP);
    expect(entryTimestamp(20240310, "10:00:00")).toBe(MIN_TIMESTAMP);
    expect(entryTimestamp(null, null)).toBe(MIN_TIMESTAMP);
  });

  it("rejects out-of-range calendar fields", () => {
    expect(entryTimestamp("2024-13-01", "10:00:00")).toBe(MIN_TIMESTAMP);
    expect(entryTimestamp("2023-02-29", "10:00:00")).toBe(MIN_TIMESTAMP);
    expect(entryTimestamp("2024-03-10", "24:00:00")).toBe(MIN_TIMESTAMP);
    expect(entryTimestamp("2024-03-10", "10:60")).toBe(MIN_TIMESTAMP);
  });

  it("accepts leap days", () => {
    expect(entryTimestamp("2024-02-29", "00:00:00")).toBe(Date.UTC(2024, 1, 29));
  });
});

describe("normalizeTime", () => {
  it("formats as zero-padded HH:MM:SS", () => {
    expect(normalizeTime(entryTimestamp("2024-03-10", "9:05"))).toBe("09:05:00");
  });

  it("maps MIN_TIMESTAMP to midnight", () => {
    expect(normalizeTime(MIN_TIMESTAMP)).toBe("00:00:00");
  });
});

// =============================================================================
// Comparison
// =============================================================================

function row(id: string, date: string, time: string, createdAt: string) {
  return { id, date, time, createdAt };
}

describe("compareEntries", () => {
  it("orders by date, then time", () => {
    const a = row("a", "2024-03-10", "10:00:00", "2024-03-10T12:00:00.000Z");
    const b = row("b", "2024-03-10", "11:00:00", "2024-03-10T08:00:00.000Z");
    const c = row("c", "2024-03-11", "01:00:00", "2024-03-01T00:00:00.000Z");
    expect(compareEntries(a, b)).toBe(-1);
    expect(compareEntries(c, b)).toBe(1);
  });

  it("breaks timestamp ties by insertion, then id", () => {
    const first = row("z", "2024-03-10", "10:00", "2024-03-10T10:00:00.000Z");
    const second = row("a", "2024-03-10", "10:00:00", "2024-03-10T10:00:01.000Z");
    expect(compareEntries(first, second)).toBe(-1);

    const sameInsert = row("b", "2024-03-10", "10:00:00", "2024-03-10T10:00:01.000Z");
    expect(compareEntries(second, sameInsert)).toBe(-1);
    expect(compareEntries(second, second)).toBe(0);
  });
});

describe("sortEntries", () => {
  it("sorts ascending and puts unparseable entries first", () => {
    const sorted = sortEntries([
      row("late", "2024-03-11", "08:00:00", "2024-03-11T08:00:00.000Z"),
      row("bad", "garbage", "08:00:00", "2024-03-12T08:00:00.000Z"),
      row("early", "2024-03-10", "08:00", "2024-03-10T08:00:00.000Z"),
    ]);
    expect(sorted.map((s) => s.entry.id)).toEqual(["bad", "early", "late"]);
    expect(sorted[0]?.timestamp).toBe(MIN_TIMESTAMP);
    expect(sorted[1]?.timestamp).toBe(Date.UTC(2024, 2, 10, 8, 0, 0));
  });

  it("does not mutate its input", () => {
    const input = [
      row("b", "2024-03-11", "08:00:00", "2024-03-11T08:00:00.000Z"),
      row("a", "2024-03-10", "08:00:00", "2024-03-10T08:00:00.000Z"),
    ];
    sortEntries(input);
    expect(input.map((r) => r.id)).toEqual(["b", "a"]);
  });
});
