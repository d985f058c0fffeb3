/**
 * Co-occurrence of elements of two different kinds.
 *
 * Keeps marginal counts for rows and columns, a sparse joint table and the
 * running number of joint observations, and derives log-lift / pointwise
 * mutual information from them. The joint table is indexed twice (row-major
 * and column-major) over shared count cells so either side can be walked
 * without a full scan.
 *
 * Not safe for concurrent mutation: one writer at a time, and no query while
 * a write is in progress. Every collection returned is a snapshot.
 */

import { sortByCountDescending } from "../determinism/CanonicalOrder.js";
import { elementKey } from "./elementKey.js";
import { checkArgument } from "./errors.js";
import { compareLift, createLift, createMutualInformation } from "./records.js";
import type { CooccurrenceOptions, ElementCount, KeyFn, Lift, MutualInformation } from "./types.js";

interface Counted<T> {
  element: T;
  count: number;
}

interface Cell {
  count: number;
}

export interface JointCell<TRow, TColumn> {
  row: TRow;
  column: TColumn;
  count: number;
}

/** Full state of an accumulator, as produced by `cells()` and the marginal accessors. */
export interface CooccurrenceState<TRow, TColumn> {
  rows: ElementCount<TRow>[];
  columns: ElementCount<TColumn>[];
  cells: JointCell<TRow, TColumn>[];
  totalCooccurrences: number;
}

export class ElementCooccurrence<TRow, TColumn> {
  private readonly rowKey: KeyFn<TRow>;
  private readonly columnKey: KeyFn<TColumn>;

  private readonly rowCounts = new Map<string, Counted<TRow>>();
  private readonly columnCounts = new Map<string, Counted<TColumn>>();
  private totalRows = 0;
  private totalColumns = 0;

  private readonly byRow = new Map<string, Map<string, Cell>>();
  private readonly byColumn = new Map<string, Map<string, Cell>>();
  private totalCooccurrences = 0;

  constructor(options?: CooccurrenceOptions<TRow, TColumn>) {
    this.rowKey = options?.rowKey ?? elementKey;
    this.columnKey = options?.columnKey ?? elementKey;
  }

  /** Rebuild an accumulator from previously exported state. Callers validate the state first. */
  static fromState<TRow, TColumn>(
    state: CooccurrenceState<TRow, TColumn>,
    options?: CooccurrenceOptions<TRow, TColumn>,
  ): ElementCooccurrence<TRow, TColumn> {
    const acc = new ElementCooccurrence<TRow, TColumn>(options);
    for (const r of state.rows) {
      acc.rowCounts.set(acc.rowKey(r.element), { element: r.element, count: r.count });
      acc.totalRows += r.count;
    }
    for (const c of state.columns) {
      acc.columnCounts.set(acc.columnKey(c.element), { element: c.element, count: c.count });
      acc.totalColumns += c.count;
    }
    for (const cell of state.cells) {
      acc.setCell(acc.rowKey(cell.row), acc.columnKey(cell.column), cell.count);
    }
    acc.totalCooccurrences = state.totalCooccurrences;
    return acc;
  }

  /**
   * Record one observation of a row set and a column set occurring together.
   * Duplicates inside either iterable count once.
   */
  add(rowElements: Iterable<TRow>, columnElements: Iterable<TColumn>): void {
    const rowSet = this.uniqueByKey(rowElements, this.rowKey);
    const columnSet = this.uniqueByKey(columnElements, this.columnKey);

    for (const [key, element] of rowSet) {
      this.increment(this.rowCounts, key, element);
    }
    this.totalRows += rowSet.size;
    for (const [key, element] of columnSet) {
      this.increment(this.columnCounts, key, element);
    }
    this.totalColumns += columnSet.size;

    for (const rk of rowSet.keys()) {
      for (const ck of columnSet.keys()) {
        const cell = this.byRow.get(rk)?.get(ck);
        if (cell) cell.count += 1;
        else this.setCell(rk, ck, 1);
      }
    }
    this.totalCooccurrences += rowSet.size * columnSet.size;
  }

  /**
   * Log lift of a pair: log P(r,c) - log P(c) - log P(r).
   * A pair with no joint cell (never seen together, pruned, or an element never
   * observed at all) has P(r,c) = 0 and gives -Infinity.
   */
  getElementLogLift(row: TRow, column: TColumn): number {
    const rk = this.rowKey(row);
    const ck = this.columnKey(column);
    const cell = this.byRow.get(rk)?.get(ck);
    if (!cell) return Math.log(0);

    const columnProbability = (this.columnCounts.get(ck)?.count ?? 0) / this.totalColumns;
    const rowProbability = (this.rowCounts.get(rk)?.count ?? 0) / this.totalRows;
    const cooccurrenceProbability = cell.count / this.totalCooccurrences;
    return Math.log(cooccurrenceProbability) - Math.log(columnProbability) - Math.log(rowProbability);
  }

  /**
   * Pointwise mutual information of every column seen with `row`.
   * Columns missing from the result have zero joint probability.
   */
  getColumnMutualInformationFor(row: TRow): MutualInformation<TColumn>[] {
    const rk = this.rowKey(row);
    const rowEntry = this.rowCounts.get(rk);
    checkArgument(rowEntry !== undefined, `row ${rk} has never been observed`);

    const partners = this.byRow.get(rk);
    if (!partners) return [];

    const rowLogProb = Math.log(rowEntry.count) - Math.log(this.totalRows);
    const logTotal = Math.log(this.totalCooccurrences);
    const out: MutualInformation<TColumn>[] = [];
    for (const [ck, cell] of partners) {
      const column = this.columnCounts.get(ck);
      if (!column) continue;
      const logProbability = Math.log(cell.count) - logTotal;
      const columnLogProb = Math.log(column.count) - Math.log(this.totalColumns);
      out.push(createMutualInformation(column.element, logProbability - rowLogProb - columnLogProb));
    }
    return out;
  }

  /**
   * Pointwise mutual information of every row seen with `column`.
   *
   * The row term is the row marginal stored under the column's own key and is
   * the same for every entry; it is not each partner's row probability. When
   * no row shares that key the term is -Infinity and every entry is +Infinity.
   */
  getRowMutualInformationFor(column: TColumn): MutualInformation<TRow>[] {
    const ck = this.columnKey(column);
    const columnEntry = this.columnCounts.get(ck);
    checkArgument(columnEntry !== undefined, `column ${ck} has never been observed`);

    const partners = this.byColumn.get(ck);
    if (!partners) return [];

    const columnLogProb = Math.log(columnEntry.count) - Math.log(this.totalColumns);
    const rowLogProb = Math.log(this.rowCounts.get(ck)?.count ?? 0) - Math.log(this.totalRows);
    const logTotal = Math.log(this.totalCooccurrences);
    const out: MutualInformation<TRow>[] = [];
    for (const [rk, cell] of partners) {
      const row = this.rowCounts.get(rk);
      if (!row) continue;
      const logProbability = Math.log(cell.count) - logTotal;
      out.push(createMutualInformation(row.element, logProbability - columnLogProb - rowLogProb));
    }
    return out;
  }

  /** Rows co-occurring with `column`, best lift first. */
  getCooccurringElementsForColumn(column: TColumn): Lift<TRow, TColumn>[] {
    const ck = this.columnKey(column);
    const partners = this.byColumn.get(ck);
    if (!partners) return [];

    const columnLogProbability = Math.log((this.columnCounts.get(ck)?.count ?? 0) / this.totalColumns);
    const out: Lift<TRow, TColumn>[] = [];
    for (const [rk, cell] of partners) {
      const row = this.rowCounts.get(rk);
      if (!row) continue;
      const rowProbability = row.count / this.totalRows;
      const cooccurrenceProbability = cell.count / this.totalCooccurrences;
      const lift = Math.log(cooccurrenceProbability) - Math.log(rowProbability) - columnLogProbability;
      out.push(createLift(row.element, column, lift, cell.count));
    }
    return out.sort(compareLift(this.rowKey, this.columnKey));
  }

  /** Columns co-occurring with `row`, best lift first. */
  getCooccurringElementsForRow(row: TRow): Lift<TRow, TColumn>[] {
    const rk = this.rowKey(row);
    const partners = this.byRow.get(rk);
    if (!partners) return [];

    const rowLogProbability = Math.log((this.rowCounts.get(rk)?.count ?? 0) / this.totalRows);
    const out: Lift<TRow, TColumn>[] = [];
    for (const [ck, cell] of partners) {
      const column = this.columnCounts.get(ck);
      if (!column) continue;
      const columnProbability = column.count / this.totalColumns;
      const cooccurrenceProbability = cell.count / this.totalCooccurrences;
      const lift = Math.log(cooccurrenceProbability) - Math.log(columnProbability) - rowLogProbability;
      out.push(createLift(row, column.element, lift, cell.count));
    }
    return out.sort(compareLift(this.rowKey, this.columnKey));
  }

  /** Row marginals, highest count first; equal counts in binary key order. */
  getMostPopularRowFirst(): ElementCount<TRow>[] {
    const entries = Array.from(this.rowCounts, ([key, v]) => ({ key, element: v.element, count: v.count }));
    return sortByCountDescending(entries).map((e) => ({ element: e.element, count: e.count }));
  }

  getRowMultiset(): ReadonlyMap<string, ElementCount<TRow>> {
    return copyCounts(this.rowCounts);
  }

  getColumnMultiset(): ReadonlyMap<string, ElementCount<TColumn>> {
    return copyCounts(this.columnCounts);
  }

  getRowValues(): TRow[] {
    return Array.from(this.rowCounts.values(), (v) => v.element);
  }

  getColumnValues(): TColumn[] {
    return Array.from(this.columnCounts.values(), (v) => v.element);
  }

  rowKeyOf(row: TRow): string {
    return this.rowKey(row);
  }

  columnKeyOf(column: TColumn): string {
    return this.columnKey(column);
  }

  getRowCount(row: TRow): number {
    return this.rowCounts.get(this.rowKey(row))?.count ?? 0;
  }

  getColumnCount(column: TColumn): number {
    return this.columnCounts.get(this.columnKey(column))?.count ?? 0;
  }

  getJointCount(row: TRow, column: TColumn): number {
    return this.byRow.get(this.rowKey(row))?.get(this.columnKey(column))?.count ?? 0;
  }

  getTotalRowObservations(): number {
    return this.totalRows;
  }

  getTotalColumnObservations(): number {
    return this.totalColumns;
  }

  getTotalCooccurrences(): number {
    return this.totalCooccurrences;
  }

  /** Number of joint cells currently stored. */
  getJointCellCount(): number {
    let n = 0;
    for (const partners of this.byRow.values()) n += partners.size;
    return n;
  }

  /** Joint cells in row-major insertion order. */
  cells(): JointCell<TRow, TColumn>[] {
    const out: JointCell<TRow, TColumn>[] = [];
    for (const [rk, partners] of this.byRow) {
      const row = this.rowCounts.get(rk);
      if (!row) continue;
      for (const [ck, cell] of partners) {
        const column = this.columnCounts.get(ck);
        if (!column) continue;
        out.push({ row: row.element, column: column.element, count: cell.count });
      }
    }
    return out;
  }

  /**
   * Drop every joint cell whose count is at most `threshold`.
   * Marginals and the joint total are left as they are.
   */
  prune(threshold: number): void {
    checkArgument(
      Number.isInteger(threshold) && threshold >= 0,
      `prune threshold must be a non-negative integer, got ${threshold}`,
    );

    const toBeRemoved: [string, string][] = [];
    for (const [rk, partners] of this.byRow) {
      for (const [ck, cell] of partners) {
        if (cell.count <= threshold) toBeRemoved.push([rk, ck]);
      }
    }
    for (const [rk, ck] of toBeRemoved) {
      removeFrom(this.byRow, rk, ck);
      removeFrom(this.byColumn, ck, rk);
    }
  }

  private setCell(rk: string, ck: string, count: number): void {
    const cell: Cell = { count };
    let columns = this.byRow.get(rk);
    if (!columns) {
      columns = new Map();
      this.byRow.set(rk, columns);
    }
    columns.set(ck, cell);
    let rows = this.byColumn.get(ck);
    if (!rows) {
      rows = new Map();
      this.byColumn.set(ck, rows);
    }
    rows.set(rk, cell);
  }

  private increment<T>(counts: Map<string, Counted<T>>, key: string, element: T): void {
    const entry = counts.get(key);
    if (entry) entry.count += 1;
    else counts.set(key, { element, count: 1 });
  }

  private uniqueByKey<T>(elements: Iterable<T>, key: KeyFn<T>): Map<string, T> {
    const out = new Map<string, T>();
    for (const e of elements) {
      const k = key(e);
      if (!out.has(k)) out.set(k, e);
    }
    return out;
  }
}

function copyCounts<T>(counts: Map<string, Counted<T>>): ReadonlyMap<string, ElementCount<T>> {
  const out = new Map<string, ElementCount<T>>();
  for (const [k, v] of counts) out.set(k, { element: v.element, count: v.count });
  return out;
}

function removeFrom(index: Map<string, Map<string, Cell>>, outer: string, inner: string): void {
  const partners = index.get(outer);
  if (!partners) return;
  partners.delete(inner);
  if (partners.size === 0) index.delete(outer);
}
