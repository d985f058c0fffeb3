/**
 * Snapshot persistence for an accumulator. The marginals, joint cells and the
 * joint total are written and read as one document so the count invariants
 * hold on both sides.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "fs";
import { basename, dirname, join } from "path";
import { ElementCooccurrence } from "../cooccurrence/ElementCooccurrence.js";
import type { CooccurrenceState, JointCell } from "../cooccurrence/ElementCooccurrence.js";
import type { CooccurrenceOptions, ElementCount, KeyFn } from "../cooccurrence/types.js";
import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { elementKey } from "../cooccurrence/elementKey.js";
import { stableStringify } from "../determinism/StableJson.js";
import { SNAPSHOT_VERSION, SnapshotError } from "./types.js";
import type { CooccurrenceSnapshot, SnapshotCodec } from "./types.js";

function atomicWrite(path: string, content: string): void {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  const tmp = join(dir, `.tmp-${basename(path)}`);
  writeFileSync(tmp, content, "utf8");
  try {
    renameSync(tmp, path);
  } finally {
    if (existsSync(tmp)) unlinkSync(tmp);
  }
}

function isCount(n: unknown): n is number {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

export function toSnapshot<TRow, TColumn>(acc: ElementCooccurrence<TRow, TColumn>): CooccurrenceSnapshot {
  const rows = Array.from(acc.getRowMultiset(), ([key, v]) => ({ key, element: v.element, count: v.count }))
    .sort((a, b) => stringCompareBinary(a.key, b.key))
    .map((r) => ({ element: r.element, count: r.count }));
  const columns = Array.from(acc.getColumnMultiset(), ([key, v]) => ({ key, element: v.element, count: v.count }))
    .sort((a, b) => stringCompareBinary(a.key, b.key))
    .map((c) => ({ element: c.element, count: c.count }));
  const cells = acc
    .cells()
    .map((c) => ({ rk: acc.rowKeyOf(c.row), ck: acc.columnKeyOf(c.column), cell: c }))
    .sort((a, b) => stringCompareBinary(a.rk, b.rk) || stringCompareBinary(a.ck, b.ck))
    .map(({ cell }) => ({ row: cell.row, column: cell.column, count: cell.count }));

  return {
    version: SNAPSHOT_VERSION,
    totalCooccurrences: acc.getTotalCooccurrences(),
    rows,
    columns,
    cells,
  };
}

function readCounts<T>(
  raw: unknown,
  field: string,
  guard: (v: unknown) => v is T,
  key: KeyFn<T>,
): { list: ElementCount<T>[]; byKey: Map<string, number> } {
  if (!Array.isArray(raw)) throw new SnapshotError(`snapshot: ${field} must be an array`);
  const list: ElementCount<T>[] = [];
  const byKey = new Map<string, number>();
  raw.forEach((entry: unknown, i) => {
    if (!isRecord(entry)) throw new SnapshotError(`snapshot: ${field}[${i}] must be an object`);
    const { element, count } = entry;
    if (!guard(element)) throw new SnapshotError(`snapshot: ${field}[${i}].element has the wrong type`);
    if (!isCount(count) || count === 0) {
      throw new SnapshotError(`snapshot: ${field}[${i}].count must be a positive integer`);
    }
    const k = key(element);
    if (byKey.has(k)) throw new SnapshotError(`snapshot: ${field}[${i}] duplicates element ${k}`);
    byKey.set(k, count);
    list.push({ element, count });
  });
  return { list, byKey };
}

/** Validate a parsed snapshot document and rebuild the accumulator it describes. */
export function fromSnapshot<TRow, TColumn>(
  raw: unknown,
  codec: SnapshotCodec<TRow, TColumn>,
  options?: CooccurrenceOptions<TRow, TColumn>,
): ElementCooccurrence<TRow, TColumn> {
  const rowKey = options?.rowKey ?? elementKey;
  const columnKey = options?.columnKey ?? elementKey;

  if (!isRecord(raw)) throw new SnapshotError("snapshot: root must be an object");
  if (raw.version !== SNAPSHOT_VERSION) {
    throw new SnapshotError(`snapshot: unsupported version ${JSON.stringify(raw.version)}`);
  }
  const total = raw.totalCooccurrences;
  if (!isCount(total)) throw new SnapshotError("snapshot: totalCooccurrences must be a non-negative integer");

  const rows = readCounts(raw.rows, "rows", (v): v is TRow => codec.isRow(v), rowKey);
  const columns = readCounts(raw.columns, "columns", (v): v is TColumn => codec.isColumn(v), columnKey);

  if (!Array.isArray(raw.cells)) throw new SnapshotError("snapshot: cells must be an array");
  const cells: JointCell<TRow, TColumn>[] = [];
  const seen = new Set<string>();
  let jointSum = 0;
  raw.cells.forEach((entry: unknown, i) => {
    if (!isRecord(entry)) throw new SnapshotError(`snapshot: cells[${i}] must be an object`);
    const { row, column, count } = entry;
    if (!codec.isRow(row) || !codec.isColumn(column)) {
      throw new SnapshotError(`snapshot: cells[${i}] has the wrong element type`);
    }
    if (!isCount(count) || count === 0) {
      throw new SnapshotError(`snapshot: cells[${i}].count must be a positive integer`);
    }
    const rk = rowKey(row);
    const ck = columnKey(column);
    const rowCount = rows.byKey.get(rk);
    const columnCount = columns.byKey.get(ck);
    if (rowCount === undefined || columnCount === undefined) {
      throw new SnapshotError(`snapshot: cells[${i}] refers to an element with no marginal count`);
    }
    if (count > Math.min(rowCount, columnCount)) {
      throw new SnapshotError(`snapshot: cells[${i}].count exceeds its marginal counts`);
    }
    const pairKey = JSON.stringify([rk, ck]);
    if (seen.has(pairKey)) throw new SnapshotError(`snapshot: cells[${i}] duplicates pair ${pairKey}`);
    seen.add(pairKey);
    jointSum += count;
    cells.push({ row, column, count });
  });

  if (jointSum > total) {
    throw new SnapshotError(`snapshot: joint cells sum to ${jointSum}, more than totalCooccurrences ${total}`);
  }

  const state: CooccurrenceState<TRow, TColumn> = {
    rows: rows.list,
    columns: columns.list,
    cells,
    totalCooccurrences: total,
  };
  return ElementCooccurrence.fromState(state, options);
}

export function saveSnapshot<TRow, TColumn>(path: string, acc: ElementCooccurrence<TRow, TColumn>): void {
  atomicWrite(path, stableStringify(toSnapshot(acc)) + "\n");
}

export function loadSnapshot<TRow, TColumn>(
  path: string,
  codec: SnapshotCodec<TRow, TColumn>,
  options?: CooccurrenceOptions<TRow, TColumn>,
): ElementCooccurrence<TRow, TColumn> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new SnapshotError(`snapshot: cannot read ${path} — ${msg}`);
  }
  return fromSnapshot(raw, codec, options);
}

/** Codec for accumulators whose rows and columns are both strings. */
export const STRING_CODEC: SnapshotCodec<string, string> = {
  isRow: (v: unknown): v is string => typeof v === "string",
  isColumn: (v: unknown): v is string => typeof v === "string",
};
