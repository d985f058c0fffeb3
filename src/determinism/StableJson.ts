/**
 * Deterministic JSON stringification with binary key ordering.
 * Array order is preserved (caller must canonicalize before if needed).
 * Non-finite numbers have no JSON form and are written as strings ("Infinity", "-Infinity", "NaN").
 */

import { stringCompareBinary } from "./CanonicalOrder.js";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

export function stableStringify(obj: unknown): string {
  if (obj === null || obj === undefined) return "null";
  if (typeof obj === "boolean") return String(obj);
  if (typeof obj === "number") return Number.isFinite(obj) ? String(obj) : JSON.stringify(String(obj));
  if (typeof obj === "string") return JSON.stringify(obj);

  if (Array.isArray(obj)) {
    const parts = obj.map((v) => stableStringify(v));
    return "[" + parts.join(",") + "]";
  }

  if (isRecord(obj)) {
    const record = obj;
    const keys = Object.keys(record)
      .filter((k) => record[k] !== undefined)
      .sort((a, b) => stringCompareBinary(a, b));
    const parts = keys.map((k) => JSON.stringify(k) + ":" + stableStringify(record[k]));
    return "{" + parts.join(",") + "}";
  }

  return "null";
}
