import { compareNumbers } from "../determinism/CanonicalOrder.js";
import { hashKey } from "../determinism/hash.js";
import { elementKey } from "./elementKey.js";
import { checkArgument } from "./errors.js";
import type { KeyFn, Lift, MutualInformation } from "./types.js";

export function createMutualInformation<T>(element: T, logProb: number): MutualInformation<T> {
  checkArgument(!Number.isNaN(logProb), "mutual information: logProb must not be NaN");
  return Object.freeze({ element, logProb });
}

export function mutualInformationEquals<T>(
  a: MutualInformation<T>,
  b: MutualInformation<T>,
  key: KeyFn<T> = elementKey,
): boolean {
  if (a === b) return true;
  return key(a.element) === key(b.element) && Object.is(a.logProb, b.logProb);
}

export function createLift<TRow, TColumn>(
  row: TRow,
  column: TColumn,
  lift: number,
  count: number,
): Lift<TRow, TColumn> {
  return Object.freeze({ row, column, lift, count });
}

/** Equality by (lift, row, column); the count does not take part. */
export function liftEquals<TRow, TColumn>(
  a: Lift<TRow, TColumn>,
  b: Lift<TRow, TColumn>,
  rowKey: KeyFn<TRow> = elementKey,
  columnKey: KeyFn<TColumn> = elementKey,
): boolean {
  if (a === b) return true;
  return (
    Object.is(a.lift, b.lift) &&
    rowKey(a.row) === rowKey(b.row) &&
    columnKey(a.column) === columnKey(b.column)
  );
}

/**
 * Ranking comparator: lift descending, then row hash ascending, then the
 * record's own column hash against its row hash. The last link only matters
 * when two records share both lift and row hash.
 */
export function compareLift<TRow, TColumn>(
  rowKey: KeyFn<TRow> = elementKey,
  columnKey: KeyFn<TColumn> = elementKey,
): (a: Lift<TRow, TColumn>, b: Lift<TRow, TColumn>) => number {
  return (a, b) => {
    const liftCmp = compareNumbers(b.lift, a.lift);
    if (liftCmp !== 0) return liftCmp;
    const rowHashA = hashKey(rowKey(a.row));
    const rowCmp = compareNumbers(rowHashA, hashKey(rowKey(b.row)));
    if (rowCmp !== 0) return rowCmp;
    return compareNumbers(hashKey(columnKey(a.column)), rowHashA);
  };
}

export function formatLift<TRow, TColumn>(l: Lift<TRow, TColumn>): string {
  return `${String(l.row)},${String(l.column)}:${l.lift.toFixed(2)}`;
}
