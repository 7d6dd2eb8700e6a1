/**
 * Version tags for banks and entries.
 *
 * A tag covers only what a client can see change: a bank's name and
 * opening balance, an entry's amounts, placement and derived balances.
 * Recalculation moves entry balances, so it also moves their tags.
 * PATCH and DELETE honour If-Match and answer 412 on a stale tag.
 */

import { createHash } from "node:crypto";
import type { Context } from "hono";
import type { Bank, Entry } from "@daybook/types";
import { createErrorEnvelope } from "../types/error.js";

export type Versioned = Bank | Entry;

function versionFields(record: Versioned): { kind: "bank" | "entry"; fields: readonly unknown[] } {
  if ("bankId" in record) {
    return {
      kind: "entry",
      fields: [
        record.id,
        record.bankId,
        record.bankName,
        record.date,
        record.time,
        record.credited,
        record.debited,
        record.openingBalance,
        record.remainingBalance,
      ],
    };
  }
  return { kind: "bank", fields: [record.id, record.name, record.openingBalance] };
}

/**
 * Strong tag of a bank or entry, e.g. `"entry-3f9a0c1d2b4e5f60"`.
 */
export function versionTag(record: Versioned): string {
  const { kind, fields } = versionFields(record);
  const hash = createHash("sha256").update(JSON.stringify(fields)).digest("hex").slice(0, 16);
  return `"${kind}-${hash}"`;
}

/**
 * Whether an If-Match header value admits the current tag.
 * Accepts `*` and comma-separated lists; weak tags never match.
 */
export function ifMatchAdmits(header: string, current: string): boolean {
  const candidates = header.split(",").map((part) => part.trim());
  if (candidates.includes("*")) return true;
  return candidates.some((tag) => !tag.startsWith("W/") && tag === current);
}

/**
 * 412 response when the request's If-Match no longer admits the record,
 * undefined when the write may go ahead.
 */
export function rejectStale(c: Context, current: Versioned): Response | undefined {
  const header = c.req.header("If-Match");
  if (header === undefined) return undefined;

  const currentETag = versionTag(current);
  if (ifMatchAdmits(header, currentETag)) return undefined;

  return c.json(
    createErrorEnvelope("PRECONDITION_FAILED", "The record changed since it was read", {
      currentETag,
    }),
    412,
  );
}

export function tagResponse(c: Context, record: Versioned): void {
  c.header("ETag", versionTag(record));
}
